/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './data';
export {
  ROOT,
  parseSegments,
  splitSegments,
  displayForm,
  normalizedForm,
  buildChildPath,
  stripLastSegment,
  isPathExpression,
  quoteKey,
} from './common/path-utils';
export type { PathSegment } from './common/path-utils';
export type { Logger, LogLevel } from './common/logger';
export { ConsoleLogger } from './common/console-logger';
export { StreamLogger } from './common/stream-logger';

export { loadCatalog, readCatalogFile, defaultCatalog } from './completion/catalog';
export type { CatalogFunction } from './completion/catalog';
export { suggest } from './completion/suggestions';
export type { Suggestion, SuggestionKind } from './completion/suggestions';
export { tab, shiftTab, acceptByCursorMove, EMPTY_COMPLETION } from './completion/cycle';
export type { CompletionState, CompletionContext } from './completion/cycle';

export { parseDisplaySchema, readDisplaySchemaFile, parseDuration } from './views/display-schema';
export type { DisplaySchema, ListConfig, DetailConfig, StatusConfig, StatusAction } from './views/display-schema';
export { KEY_MODES, resolveAction } from './views/keybindings';
export type { KeyMode, LogicalAction } from './views/keybindings';
export { createTheme, PLAIN_THEME } from './views/theme';
export type { Theme } from './views/theme';
export type { CustomView, ViewCommand, ViewEvent, ViewMode, SideEffect } from './views/custom-view';
export { ListView } from './views/list-view';
export { DetailView } from './views/detail-view';
export { StatusView } from './views/status-view';
export { selectView } from './views/view-mode';

export { CompletionChannel } from './tui/completion-channel';
export type { CompletionResult } from './tui/completion-channel';
export { EventLoop } from './tui/event-loop';
export type { EffectRunner, LoopModel } from './tui/event-loop';
export { Explorer } from './tui/explorer';
export type { Evaluator, ExplorerOptions } from './tui/explorer';
export { runExplorer, renderSnapshot } from './tui/run';
export type { RunExplorerOptions } from './tui/run';
export { createSideEffectRunner } from './tui/side-effects';
export { parseStartupKeys } from './tui/startup-keys';
export { Terminal } from './tui/terminal';

export { loadSettingsFile, mergeSettings, DEFAULT_SETTINGS } from './settings';
export type { Settings } from './settings';
