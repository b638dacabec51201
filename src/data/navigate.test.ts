/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { childKeys, navigate, nodeKind, stringifyValue, summarize } from './navigate';
import { formatNode } from './output';

const data = {
  tasks: { 'build-windows': { steps: ['fetch', 'compile'] } },
  items: [{ name: 'a' }, { name: 'b' }],
  byId: { '7': 'seven' },
  count: 2,
};

describe('navigate', () => {
  it('resolves the root', () => {
    expect(navigate(data, '_')).toEqual({ ok: true, node: data, path: '_' });
  });

  it('resolves quoted keys and indices', () => {
    const r = navigate(data, 'tasks.build-windows.steps.1');
    expect(r).toEqual({ ok: true, node: 'compile', path: '_.tasks["build-windows"].steps[1]' });
  });

  it('looks numeric steps up as keys on maps', () => {
    expect(navigate(data, '_.byId[7]')).toEqual({ ok: true, node: 'seven', path: '_.byId[7]' });
  });

  it('reports a missing key with the last resolved path', () => {
    expect(navigate(data, '_.items[0].missing')).toEqual({
      ok: false,
      error: 'key "missing" not found',
      at: '_.items[0]',
    });
  });

  it('bounds-checks indices', () => {
    expect(navigate(data, '_.items[5]')).toEqual({
      ok: false,
      error: 'index 5 out of range (length 2)',
      at: '_.items',
    });
  });

  it('refuses to step into scalars', () => {
    const r = navigate(data, '_.count.x');
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toBe('cannot step into number value');
  });

  it('refuses call expressions', () => {
    expect(navigate(data, 'size(_.items)').ok).toBe(false);
  });
});

describe('node helpers', () => {
  it('classifies node kinds', () => {
    expect(nodeKind({})).toBe('map');
    expect(nodeKind([])).toBe('array');
    expect(nodeKind(null)).toBe('scalar');
    expect(nodeKind('x')).toBe('scalar');
  });

  it('lists child keys in data order', () => {
    expect(childKeys(data)).toEqual(['tasks', 'items', 'byId', 'count']);
    expect(childKeys(data.items)).toEqual(['0', '1']);
    expect(childKeys(3)).toEqual([]);
  });

  it('summarizes values', () => {
    expect(summarize(data.items)).toBe('[2 items]');
    expect(summarize(data.tasks)).toBe('{1 keys}');
    expect(summarize('a\nb')).toBe('a b');
    expect(summarize('abcdef', 4)).toBe('abc…');
    expect(summarize(null)).toBe('null');
  });

  it('stringifies values for copying', () => {
    expect(stringifyValue('x')).toBe('x');
    expect(stringifyValue(12)).toBe('12');
    expect(stringifyValue(undefined)).toBe('');
    expect(stringifyValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('formatNode', () => {
  it('pretty prints json', () => {
    expect(formatNode({ a: [1] }, 'json')).toBe('{\n  "a": [\n    1\n  ]\n}');
  });

  it('keeps a single document element for xml', () => {
    expect(formatNode({ port: { '@_id': '1', mtu: 1500 } }, 'xml')).toBe(
      '<port id="1">\n  <mtu>1500</mtu>\n</port>'
    );
  });
});
