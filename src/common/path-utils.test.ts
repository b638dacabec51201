/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { navigate } from '../data/navigate';
import {
  isValidIdentifier,
  parseSegments,
  splitSegments,
  displayForm,
  normalizedForm,
  buildChildPath,
  isCompletePath,
  lastUnquotedDotIndex,
  stripLastSegment,
  baseForGlobal,
  wrapGlobalCall,
} from './path-utils';

describe('path-utils', () => {
  describe('isValidIdentifier', () => {
    it('accepts identifiers', () => {
      expect(isValidIdentifier('name')).toBe(true);
      expect(isValidIdentifier('_internal')).toBe(true);
      expect(isValidIdentifier('a1_b2')).toBe(true);
    });
    it('rejects keys that need quoting', () => {
      expect(isValidIdentifier('build-windows')).toBe(false);
      expect(isValidIdentifier('1abc')).toBe(false);
      expect(isValidIdentifier('')).toBe(false);
      expect(isValidIdentifier('a.b')).toBe(false);
    });
  });

  describe('parseSegments', () => {
    it('returns no segments for the root', () => {
      expect(parseSegments('')).toEqual([]);
      expect(parseSegments('_')).toEqual([]);
    });
    it('parses dot, index and quoted steps', () => {
      expect(parseSegments('_.tasks["build-windows"][2]')).toEqual([
        { key: 'tasks', index: false },
        { key: 'build-windows', index: false },
        { key: '2', index: true },
      ]);
    });
    it('does not split on separators inside quotes', () => {
      expect(splitSegments('_["a.b[c]"].d')).toEqual(['a.b[c]', 'd']);
    });
    it('unescapes quoted keys', () => {
      expect(splitSegments('_["say \\"hi\\""]')).toEqual(['say "hi"']);
    });
    it('treats underscore-prefixed names as keys, not the root', () => {
      expect(splitSegments('_internal.x')).toEqual(['_internal', 'x']);
      expect(splitSegments('__x')).toEqual(['__x']);
      expect(splitSegments('_._x')).toEqual(['_x']);
    });
  });

  describe('displayForm', () => {
    it('returns the root marker for empty input', () => {
      expect(displayForm('')).toBe('_');
      expect(displayForm('  _ ')).toBe('_');
    });
    it('roots bare paths and quotes non-identifier keys', () => {
      expect(displayForm('tasks.build-windows')).toBe('_.tasks["build-windows"]');
    });
    it('renders index steps with brackets', () => {
      expect(displayForm('_.items[3].name')).toBe('_.items[3].name');
    });
    it('keeps numeric dot keys quoted', () => {
      expect(displayForm('_.items.0')).toBe('_.items["0"]');
    });
    it('leaves literals and call expressions unchanged', () => {
      expect(displayForm('"text"')).toBe('"text"');
      expect(displayForm('{"a": 1}')).toBe('{"a": 1}');
      expect(displayForm('[1, 2]')).toBe('[1, 2]');
      expect(displayForm('size(_.items)')).toBe('size(_.items)');
    });
  });

  describe('normalizedForm', () => {
    it('turns numeric segments into index steps', () => {
      expect(normalizedForm('_.items.0')).toBe('_.items[0]');
      expect(normalizedForm('_.items["0"]')).toBe('_.items[0]');
    });
    it('quotes non-identifier keys', () => {
      expect(normalizedForm('tasks.build-windows')).toBe('_.tasks["build-windows"]');
    });
    it('roots a leading index step', () => {
      expect(normalizedForm('[0]')).toBe('_[0]');
      expect(normalizedForm('[0].name')).toBe('_[0].name');
    });
    it('keeps leading zeros so zero-padded keys stay reachable', () => {
      const path = normalizedForm('_.zips["007"]');
      expect(path).toBe('_.zips[007]');
      expect(navigate({ zips: { '007': 'bond', '7': 'other' } }, path)).toEqual({
        ok: true,
        node: 'bond',
        path: '_.zips[007]',
      });
    });
    it('is stable across a display round trip', () => {
      const inputs = [
        'tasks.build-windows',
        '_.items.0.name',
        '_["a.b"]["c\\"d"]',
        '_.x[""]',
        '_internal',
        '[0]',
      ];
      for (const x of inputs) {
        const n = normalizedForm(x);
        expect(normalizedForm(displayForm(n))).toBe(n);
      }
    });
  });

  describe('buildChildPath', () => {
    it('appends identifiers with a dot', () => {
      expect(buildChildPath('_.a', 'name')).toBe('_.a.name');
    });
    it('quotes keys that are not identifiers', () => {
      expect(buildChildPath('_.tasks', 'build-windows')).toBe('_.tasks["build-windows"]');
      expect(buildChildPath('_', 'say "hi"')).toBe('_["say \\"hi\\""]');
    });
    it('appends numbers and prebuilt steps verbatim', () => {
      expect(buildChildPath('_.items', 2)).toBe('_.items[2]');
      expect(buildChildPath('_.items', '[4]')).toBe('_.items[4]');
      expect(buildChildPath('_.m', '["x y"]')).toBe('_.m["x y"]');
    });
    it('treats an empty base as the root', () => {
      expect(buildChildPath('', 'name')).toBe('_.name');
      expect(buildChildPath('', 0)).toBe('_[0]');
    });
    it('ignores a trailing dot on the base', () => {
      expect(buildChildPath('_.a.', 'b')).toBe('_.a.b');
    });
  });

  describe('isCompletePath', () => {
    it('accepts finished paths', () => {
      expect(isCompletePath('_')).toBe(true);
      expect(isCompletePath('_.a.b')).toBe(true);
      expect(isCompletePath('_.a[0]')).toBe(true);
      expect(isCompletePath('_.a["x.y"]')).toBe(true);
      expect(isCompletePath('size(_.a)')).toBe(true);
    });
    it('rejects pending separators and open groups', () => {
      expect(isCompletePath('')).toBe(false);
      expect(isCompletePath('_.a.')).toBe(false);
      expect(isCompletePath('_.a[')).toBe(false);
      expect(isCompletePath('_.a["x')).toBe(false);
      expect(isCompletePath('size(_.a')).toBe(false);
      expect(isCompletePath('_.a]')).toBe(false);
    });
  });

  describe('lastUnquotedDotIndex', () => {
    it('finds the last dot outside quotes and brackets', () => {
      expect(lastUnquotedDotIndex('_.a.b')).toBe(3);
      expect(lastUnquotedDotIndex('_.a["x.y"]')).toBe(1);
      expect(lastUnquotedDotIndex('abc')).toBe(-1);
    });
  });

  describe('stripLastSegment', () => {
    it('removes the final step', () => {
      expect(stripLastSegment('_.a.b')).toBe('_.a');
      expect(stripLastSegment('_.a[3]')).toBe('_.a');
      expect(stripLastSegment('_.a["x.y"]')).toBe('_.a');
      expect(stripLastSegment('_.a.')).toBe('_.a');
    });
    it('keeps the root', () => {
      expect(stripLastSegment('_')).toBe('_');
      expect(stripLastSegment('_.a')).toBe('_');
      expect(stripLastSegment('')).toBe('_');
    });
  });

  describe('baseForGlobal', () => {
    it('drops a trailing dot', () => {
      expect(baseForGlobal('_.pd1001.platform.')).toBe('_.pd1001.platform');
    });
    it('drops the partial token after the last dot', () => {
      expect(baseForGlobal('_.pd1001.plat')).toBe('_.pd1001');
    });
    it('drops a trailing open bracket', () => {
      expect(baseForGlobal('_.items[')).toBe('_.items');
    });
    it('keeps input ending in a closed step', () => {
      expect(baseForGlobal('_.items[0]')).toBe('_.items[0]');
    });
    it('falls back to the root', () => {
      expect(baseForGlobal('na')).toBe('_');
      expect(baseForGlobal('')).toBe('_');
    });
    it('roots unrooted bases', () => {
      expect(baseForGlobal('a.b.')).toBe('_.a.b');
    });
  });

  describe('wrapGlobalCall', () => {
    it('wraps the base in a call', () => {
      expect(wrapGlobalCall('has()', '_.pd1001.platform')).toBe('has(_.pd1001.platform)');
      expect(wrapGlobalCall('size', '_.items')).toBe('size(_.items)');
    });
  });
});
