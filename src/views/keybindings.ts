/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Key modes map physical keys to logical actions. Universal keys resolve in
  every mode; function mode has no letter shortcuts.
*/

export type KeyMode = 'vim' | 'emacs' | 'function';

export const KEY_MODES: readonly KeyMode[] = ['vim', 'emacs', 'function'];

export type LogicalAction =
  | 'up'
  | 'down'
  | 'back'
  | 'forward'
  | 'enter'
  | 'quit'
  | 'help'
  | 'top'
  | 'bottom'
  | 'search';

type Bindings = Partial<Record<string, LogicalAction>>;

const UNIVERSAL: Bindings = {
  up: 'up',
  down: 'down',
  left: 'back',
  right: 'forward',
  enter: 'enter',
  home: 'top',
  end: 'bottom',
  'ctrl+c': 'quit',
  f1: 'help',
};

const MODE_BINDINGS: Record<KeyMode, Bindings> = {
  vim: {
    j: 'down',
    k: 'up',
    h: 'back',
    l: 'forward',
    g: 'top',
    G: 'bottom',
    '/': 'search',
    '?': 'help',
    q: 'quit',
  },
  emacs: {
    'ctrl+n': 'down',
    'ctrl+p': 'up',
    'ctrl+b': 'back',
    'ctrl+f': 'forward',
    'alt+<': 'top',
    'alt+>': 'bottom',
    'ctrl+s': 'search',
    'alt+h': 'help',
    'ctrl+q': 'quit',
  },
  function: {
    f3: 'search',
    f10: 'quit',
  },
};

const QUIT_KEYS: Record<KeyMode, string> = { vim: 'q', emacs: 'ctrl+q', function: 'f10' };

export function isKeyMode(value: string): value is KeyMode {
  return KEY_MODES.some((m) => m === value);
}

/** Unknown modes fall back to vim. */
export function toKeyMode(value: string | undefined): KeyMode {
  return value !== undefined && isKeyMode(value) ? value : 'vim';
}

export function resolveAction(key: string, mode: KeyMode): LogicalAction | undefined {
  return MODE_BINDINGS[mode][key] ?? UNIVERSAL[key];
}

export function quitKey(mode: KeyMode): string {
  return QUIT_KEYS[mode];
}

/** First key bound to the action in this mode, mode bindings before universal ones. */
export function keyFor(action: LogicalAction, mode: KeyMode): string | undefined {
  for (const bindings of [MODE_BINDINGS[mode], UNIVERSAL]) {
    const hit = Object.keys(bindings).find((k) => bindings[k] === action);
    if (hit) return hit;
  }
  return undefined;
}

/** Footer label: C-q, M-w, F10, ↑, or the key itself. */
export function formatKeyLabel(key: string): string {
  if (key.startsWith('ctrl+')) return 'C-' + key.slice(5);
  if (key.startsWith('alt+')) return 'M-' + key.slice(4);
  if (/^f\d+$/.test(key)) return key.toUpperCase();
  switch (key) {
    case 'up':
      return '↑';
    case 'down':
      return '↓';
    case 'left':
      return '←';
    case 'right':
      return '→';
    case 'enter':
      return '⏎';
    case 'esc':
      return 'Esc';
    default:
      return key;
  }
}
