/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Keys given with --press, e.g. "<F3>search" or "_.items<Tab><CR>".
*/

const SPECIAL: Record<string, string> = {
  esc: 'esc',
  escape: 'esc',
  'c-[': 'esc',
  cr: 'enter',
  enter: 'enter',
  return: 'enter',
  tab: 'tab',
  's-tab': 'shift+tab',
  space: 'space',
  bs: 'backspace',
  backspace: 'backspace',
  del: 'delete',
  left: 'left',
  right: 'right',
  up: 'up',
  down: 'down',
  home: 'home',
  end: 'end',
};

/** Key name for a `<...>` token body, undefined when unknown. */
export function specialKey(inner: string): string | undefined {
  const lower = inner.toLowerCase();
  if (SPECIAL[lower]) return SPECIAL[lower];
  if (/^f([1-9]|1[0-2])$/.test(lower)) return lower;
  const chord = /^([cm])-(.)$/.exec(lower);
  if (chord) return `${chord[1] === 'c' ? 'ctrl' : 'alt'}+${inner.slice(2)}`;
  return undefined;
}

/**
 * Key names for the tokens in order. `<...>` names a key, other text types
 * character by character; a leading backslash makes the whole token literal.
 * Unknown `<...>` names are skipped.
 */
export function parseStartupKeys(tokens: string[]): string[] {
  const keys: string[] = [];
  for (const raw of tokens) {
    const token = raw.trim();
    if (token === '') continue;
    if (token.startsWith('\\')) {
      keys.push(...[...token.slice(1)]);
      continue;
    }
    let rest = token;
    while (rest.length > 0) {
      const open = rest.indexOf('<');
      const close = open >= 0 ? rest.indexOf('>', open) : -1;
      if (open < 0 || close < 0) {
        keys.push(...[...rest]);
        break;
      }
      keys.push(...[...rest.slice(0, open)]);
      const key = specialKey(rest.slice(open + 1, close));
      if (key) keys.push(key);
      rest = rest.slice(close + 1);
    }
  }
  return keys.map((k) => (k === ' ' ? 'space' : k));
}
