/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { loadData, detectFormat, isLoadUsable, offsetToPosition } from './loader';
export { navigate, nodeKind, childEntries, childKeys, isRecord, summarize, stringifyValue } from './navigate';
export { formatNode, toXml } from './output';
export type { OutputFormat } from './output';
export type {
  DataFormat,
  DataMap,
  NodeKind,
  LoadError,
  LoadResult,
  LoadOptions,
  NavigateResult,
  ChildEntry,
} from './types';
export { DATA_FORMATS } from './types';
