/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Contract shared by the schema-driven views, plus the events they receive
  and the commands they hand back to the event loop.
*/

import type { CompletionChannel, CompletionResult } from '../tui/completion-channel';
import type { DetailView } from './detail-view';
import type { KeyMode, LogicalAction } from './keybindings';
import type { ListView } from './list-view';
import type { StatusView } from './status-view';
import type { Theme } from './theme';

export type ViewKind = 'list' | 'detail' | 'status';

/** 'none' renders the default key/value table. */
export type ViewMode = ViewKind | 'none';

export type SideEffect =
  | { type: 'copy-value'; label: string; value: string }
  | { type: 'open-url'; label: string; url: string };

export type ViewEvent =
  | { type: 'key'; key: string; action?: LogicalAction }
  | { type: 'tick' }
  | { type: 'completion'; result: CompletionResult }
  | { type: 'timeout' }
  | { type: 'done-timer' }
  | { type: 'flash-clear'; id: number }
  | { type: 'effect-done'; effect: SideEffect; error?: string }
  | { type: 'resize'; width: number; height: number }
  | { type: 'search'; query: string; committed: boolean };

/** Commands are data; the event loop executes them. */
export type ViewCommand =
  | { kind: 'quit' }
  | { kind: 'schedule'; delayMs: number; event: ViewEvent }
  | { kind: 'await-completion'; channel: CompletionChannel }
  | { kind: 'effect'; effect: SideEffect }
  | { kind: 'navigate'; path: string }
  | { kind: 'batch'; commands: ViewCommand[] };

export interface Flash {
  message: string;
  isError: boolean;
}

export interface Position {
  count: number;
  /** 1-based */
  selected: number;
  label: string;
}

export type CustomView = ListView | DetailView | StatusView;

export interface ViewUpdate {
  view: CustomView;
  command?: ViewCommand;
}

export interface CustomViewContract {
  readonly kind: ViewKind;
  title(): string;
  footer(mode: KeyMode): string;
  handlesSearch(): boolean;
  searchTitle(): string;
  /** Startup command, run once when the view becomes active. */
  init(): ViewCommand | undefined;
  flash(): Flash | undefined;
  render(width: number, height: number, theme: Theme): string;
  position(): Position;
  update(event: ViewEvent): ViewUpdate;
}

export interface ViewStates {
  list?: ListView;
  detail?: DetailView;
  status?: StatusView;
}

/** The view for the mode, or undefined; never another mode's view. */
export function resolveActiveView(mode: ViewMode, states: ViewStates): CustomView | undefined {
  switch (mode) {
    case 'list':
      return states.list;
    case 'detail':
      return states.detail;
    case 'status':
      return states.status;
    case 'none':
      return undefined;
    default: {
      const unreachable: never = mode;
      return unreachable;
    }
  }
}

export const QUIT: ViewCommand = { kind: 'quit' };

export function schedule(delayMs: number, event: ViewEvent): ViewCommand {
  return { kind: 'schedule', delayMs, event };
}

/** Combine commands, dropping absent ones. */
export function batch(...commands: Array<ViewCommand | undefined>): ViewCommand | undefined {
  const present = commands.filter((c): c is ViewCommand => c !== undefined);
  if (present.length === 0) return undefined;
  if (present.length === 1) return present[0];
  return { kind: 'batch', commands: present };
}
