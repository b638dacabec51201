/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { KeyValueTable, keyColumnWidth, tableRows } from './key-value-table';
import { PLAIN_THEME } from './theme';

const person = { name: 'Ada', tags: ['a', 'b'], nested: { x: 1 } };

describe('tableRows', () => {
  it('labels list entries with their index', () => {
    expect(tableRows(['x', 'y']).map((r) => r.label)).toEqual(['[0]', '[1]']);
    expect(tableRows(person).map((r) => r.key)).toEqual(['name', 'tags', 'nested']);
    expect(tableRows('scalar')).toEqual([]);
  });
});

describe('keyColumnWidth', () => {
  it('fits the longest key within a third of the width', () => {
    const rows = tableRows(person);
    expect(keyColumnWidth(rows, 40)).toBe(6);
    expect(keyColumnWidth(rows, 12)).toBe(4);
    expect(keyColumnWidth(tableRows(['x']), 40)).toBe(3);
  });
});

describe('KeyValueTable', () => {
  it('renders the header and one row per child', () => {
    const table = new KeyValueTable(person);
    expect(table.render(40, 10, PLAIN_THEME, false).split('\n')).toEqual([
      'KEY     VALUE',
      'name    Ada',
      'tags    [2 items]',
      'nested  {1 keys}',
    ]);
  });

  it('renders scalars as wrapped text', () => {
    expect(new KeyValueTable('hello world').render(5, 3, PLAIN_THEME, false)).toBe('hello\nworld');
  });

  it('marks empty containers', () => {
    expect(new KeyValueTable({}).render(40, 5, PLAIN_THEME, false)).toBe('  (empty)');
  });

  it('moves the selection within bounds', () => {
    const table = new KeyValueTable(person);
    expect(table.move('up')).toBe(true);
    expect(table.selectedRow()?.label).toBe('name');
    table.move('bottom');
    table.move('down');
    expect(table.selectedRow()?.label).toBe('nested');
    expect(table.position()).toEqual({ count: 3, selected: 3, label: 'rows' });
    expect(table.move('enter')).toBe(false);
  });

  it('scrolls to keep the selection visible', () => {
    const table = new KeyValueTable(['a', 'b', 'c', 'd', 'e']);
    table.move('bottom');
    expect(table.render(20, 3, PLAIN_THEME, false).split('\n')).toEqual(['KEY  VALUE', '[3]  d', '[4]  e']);
  });
});
