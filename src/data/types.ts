/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Loaded data tree and navigation results.
*/

export type DataFormat = 'json' | 'ndjson' | 'xml';

export const DATA_FORMATS: readonly DataFormat[] = ['json', 'ndjson', 'xml'];

export type NodeKind = 'map' | 'array' | 'scalar';

export type DataMap = { [key: string]: unknown };

export interface LoadError {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  message: string;
}

/**
 * Result of loading a document: the data root and any errors.
 */
export interface LoadResult {
  /** Parsed value, undefined when loading failed. */
  root: unknown;
  format: DataFormat;
  errors: LoadError[];
}

export interface LoadOptions {
  /** Explicit format; wins over extension and content sniffing. */
  format?: DataFormat;
  /** Used for extension based detection. */
  fileName?: string;
}

export type NavigateResult =
  | { ok: true; node: unknown; path: string }
  | { ok: false; error: string; at: string };

export interface ChildEntry {
  /** Map key, or array index. */
  key: string | number;
  value: unknown;
}
