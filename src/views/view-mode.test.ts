/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import type { DisplaySchema } from './display-schema';
import { selectView } from './view-mode';

const people = [
  { name: 'Ada', role: 'engineer' },
  { name: 'Linus', role: 'maintainer' },
];

const schema: DisplaySchema = {
  list: { titleField: 'name' },
  detail: { titleField: 'name' },
};

describe('selectView', () => {
  it('uses the default table without a schema', () => {
    const sel = selectView({ node: people, path: '_', schema: undefined, previous: 'none', keyMode: 'vim' });
    expect(sel.mode).toBe('none');
    expect(sel.states).toEqual({});
  });

  it('picks the list view for an array of objects', () => {
    const sel = selectView({ node: people, path: '_.people', schema, previous: 'none', keyMode: 'vim' });
    expect(sel.mode).toBe('list');
    expect(sel.states.list?.visibleItems().map((i) => i.title)).toEqual(['Ada', 'Linus']);
    expect(sel.states.detail).toBeUndefined();
  });

  it('needs a list title field', () => {
    const sel = selectView({ node: people, path: '_', schema: { detail: {} }, previous: 'none', keyMode: 'vim' });
    expect(sel.mode).toBe('none');
  });

  it('falls back to the table for mixed arrays', () => {
    const sel = selectView({ node: [{ name: 'a' }, 3], path: '_', schema, previous: 'none', keyMode: 'vim' });
    expect(sel.mode).toBe('none');
  });

  it('opens the detail view only after a list drill-in', () => {
    const drilled = selectView({ node: people[0], path: '_[0]', schema, previous: 'list', keyMode: 'vim' });
    expect(drilled.mode).toBe('detail');
    expect(drilled.states.detail?.title()).toBe('Ada');

    const direct = selectView({ node: people[0], path: '_[0]', schema, previous: 'none', keyMode: 'vim' });
    expect(direct.mode).toBe('none');
  });

  it('gives the status view priority for maps', () => {
    const statusSchema: DisplaySchema = { ...schema, status: { titleField: 'name' } };
    const sel = selectView({ node: people[0], path: '_', schema: statusSchema, previous: 'list', keyMode: 'vim' });
    expect(sel.mode).toBe('status');
    expect(sel.states.status?.title()).toBe('Ada');
  });

  it('keeps an existing status view', () => {
    const statusSchema: DisplaySchema = { status: { titleField: 'name' } };
    const first = selectView({ node: people[0], path: '_', schema: statusSchema, previous: 'none', keyMode: 'vim' });
    const again = selectView({
      node: people[0],
      path: '_',
      schema: statusSchema,
      previous: first.mode,
      keyMode: 'vim',
      current: first.states,
    });
    expect(again.states.status).toBe(first.states.status);
  });
});
