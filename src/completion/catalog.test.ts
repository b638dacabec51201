/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { compatibleKinds, defaultCatalog, isCompatible, loadCatalog, usageStyle } from './catalog';

describe('catalog', () => {
  describe('usageStyle', () => {
    it('detects receiver calls', () => {
      expect(usageStyle({ name: 'join', usage: 'list.join(string) -> string' })).toBe('method');
      expect(usageStyle({ name: 'size', usage: 'size(list) -> int' })).toBe('global');
    });
    it('falls back to the description after " - "', () => {
      expect(usageStyle({ name: 'trim', description: 'trim() - string.trim()' })).toBe('method');
    });
    it('treats functions without usage as global', () => {
      expect(usageStyle({ name: 'now' })).toBe('global');
    });
  });

  describe('compatibleKinds', () => {
    it('infers from the receiver or first parameter', () => {
      expect(compatibleKinds({ name: 'join', usage: 'list.join(string)' })).toEqual(['array']);
      expect(compatibleKinds({ name: 'keys', usage: 'keys(map) -> list' })).toEqual(['map']);
      expect(compatibleKinds({ name: 'trim', usage: 'string.trim()' })).toEqual(['scalar']);
      expect(compatibleKinds({ name: 'sort', usage: 'sort(list<int>) -> list' })).toEqual(['array']);
    });
    it('treats any, dyn and unknown types as universal', () => {
      expect(compatibleKinds({ name: 'size', usage: 'size(any)' })).toBe('any');
      expect(compatibleKinds({ name: 'type', usage: 'dyn.type()' })).toBe('any');
      expect(compatibleKinds({ name: 'now' })).toBe('any');
    });
    it('prefers explicit kinds', () => {
      expect(compatibleKinds({ name: 'map', usage: 'list.map(x, e)', kinds: ['array', 'map'] })).toEqual([
        'array',
        'map',
      ]);
    });
  });

  it('excludes list-only functions for scalars', () => {
    const join = { name: 'join', usage: 'list.join(string)' };
    expect(isCompatible(join, 'array')).toBe(true);
    expect(isCompatible(join, 'scalar')).toBe(false);
    expect(isCompatible({ name: 'size', usage: 'size(any)' }, 'scalar')).toBe(true);
  });

  describe('loadCatalog', () => {
    it('keeps valid entries and reports invalid ones', () => {
      const r = loadCatalog([
        { name: 'size', usage: 'size(any)' },
        { usage: 'nameless()' },
        'text',
        { name: 'pick', kinds: ['tree'] },
      ]);
      expect(r.functions).toEqual([{ name: 'size', usage: 'size(any)' }]);
      expect(r.errors).toHaveLength(3);
      expect(r.errors[0]).toMatch(/^entry 1: at name: /);
      expect(r.errors[1]).toMatch(/^entry 2: /);
      expect(r.errors[2]).toMatch(/^entry 3: at kinds\.0: /);
    });
    it('rejects documents that are not lists', () => {
      expect(loadCatalog({}).errors).toEqual(['catalog must be a list of functions']);
    });
  });

  it('ships a default catalog', () => {
    const names = defaultCatalog().map((f) => f.name);
    expect(names).toContain('size');
    expect(names).toContain('join');
  });
});
