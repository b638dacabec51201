/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { parseStartupKeys, specialKey } from './startup-keys';

describe('specialKey', () => {
  it('maps key names case-insensitively', () => {
    expect(specialKey('CR')).toBe('enter');
    expect(specialKey('Esc')).toBe('esc');
    expect(specialKey('S-Tab')).toBe('shift+tab');
    expect(specialKey('F10')).toBe('f10');
  });

  it('maps control and meta chords', () => {
    expect(specialKey('C-c')).toBe('ctrl+c');
    expect(specialKey('M-<')).toBe('alt+<');
  });

  it('rejects unknown names', () => {
    expect(specialKey('F13')).toBeUndefined();
    expect(specialKey('hyper')).toBeUndefined();
  });
});

describe('parseStartupKeys', () => {
  it('mixes keys and literal text', () => {
    expect(parseStartupKeys(['<F3>ab', '_.x<Tab><CR>'])).toEqual(['f3', 'a', 'b', '_', '.', 'x', 'tab', 'enter']);
  });

  it('types a backslash token literally', () => {
    expect(parseStartupKeys(['\\<F1>'])).toEqual(['<', 'F', '1', '>']);
  });

  it('types an unclosed bracket as text', () => {
    expect(parseStartupKeys(['a<b'])).toEqual(['a', '<', 'b']);
  });

  it('names spaces and skips unknown keys and blank tokens', () => {
    expect(parseStartupKeys(['a b', '<Nope>c', '  '])).toEqual(['a', 'space', 'b', 'c']);
  });
});
