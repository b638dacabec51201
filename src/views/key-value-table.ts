/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Default KEY/VALUE table for nodes without a custom view.
*/

import { childEntries, nodeKind, stringifyValue, summarize } from '../data/navigate';
import { strings } from '../strings';
import type { Position } from './custom-view';
import type { LogicalAction } from './keybindings';
import { displayWidth, fitLine, padRight, scrollWindow, truncate, wrapText } from './text';
import type { Theme } from './theme';

const MIN_KEY_WIDTH = 3;
const SAMPLE_ROWS = 100;

export interface TableRow {
  /** Child key, or the index for list entries. */
  key: string | number;
  label: string;
  value: unknown;
}

export function tableRows(node: unknown): TableRow[] {
  return childEntries(node).map((entry) => ({
    key: entry.key,
    label: typeof entry.key === 'number' ? `[${entry.key}]` : entry.key,
    value: entry.value,
  }));
}

/** Key column width from the header and the first rows, at most a third of the width. */
export function keyColumnWidth(rows: TableRow[], width: number): number {
  let max = Math.max(MIN_KEY_WIDTH, displayWidth(strings.tableKey));
  for (const row of rows.slice(0, SAMPLE_ROWS)) max = Math.max(max, displayWidth(row.label));
  return Math.max(MIN_KEY_WIDTH, Math.min(max, Math.floor(width / 3)));
}

export class KeyValueTable {
  private node: unknown;
  private rows: TableRow[];
  private selected = 0;

  constructor(node: unknown) {
    this.node = node;
    this.rows = tableRows(node);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  selectedRow(): TableRow | undefined {
    return this.rows[this.selected];
  }

  position(): Position {
    const count = this.rows.length;
    return { count, selected: count === 0 ? 0 : this.selected + 1, label: strings.tablePositionLabel };
  }

  /** Moves the selection; other actions are not the table's. */
  move(action: LogicalAction): boolean {
    const last = Math.max(0, this.rows.length - 1);
    switch (action) {
      case 'up':
        this.selected = Math.max(0, this.selected - 1);
        return true;
      case 'down':
        this.selected = Math.min(last, this.selected + 1);
        return true;
      case 'top':
        this.selected = 0;
        return true;
      case 'bottom':
        this.selected = last;
        return true;
      default:
        return false;
    }
  }

  render(width: number, height: number, theme: Theme, highlight: boolean): string {
    if (height <= 0) return '';
    if (nodeKind(this.node) === 'scalar') {
      return wrapText(stringifyValue(this.node), width, height).join('\n');
    }
    if (this.rows.length === 0) return '  ' + strings.tableEmpty;

    const keyWidth = keyColumnWidth(this.rows, width);
    const valueWidth = Math.max(1, width - keyWidth - 2);
    const lines = [theme.muted(padRight(strings.tableKey, keyWidth) + '  ' + strings.tableValue)];
    const { start, end } = scrollWindow(this.rows.length, this.selected, height - 1);
    for (let i = start; i < end; i++) {
      const row = this.rows[i];
      const line = padRight(truncate(row.label, keyWidth), keyWidth) + '  ' + summarize(row.value, valueWidth);
      lines.push(i === this.selected && highlight ? theme.selected(padRight(line, width)) : line);
    }
    return lines.map((l) => fitLine(l, width)).join('\n');
  }
}
