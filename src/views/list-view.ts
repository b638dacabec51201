/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  List view: card rows for a list of objects, with a live filter on
  title/subtitle and a committed search across all fields.
*/

import { buildChildPath } from '../common/path-utils';
import { isRecord, stringifyValue } from '../data/navigate';
import { strings } from '../strings';
import type { CustomViewContract, Flash, Position, ViewCommand, ViewEvent, ViewUpdate } from './custom-view';
import type { DisplaySchema, ListConfig } from './display-schema';
import { formatKeyLabel, keyFor, quitKey, type KeyMode, type LogicalAction } from './keybindings';
import { fitLine, wrapText } from './text';
import type { Theme } from './theme';

export interface ListItem {
  /** Index in the source list. */
  index: number;
  title: string;
  subtitle: string;
  badges: string[];
  secondary: string[];
  /** All field values, for the committed search. */
  searchText: string;
}

function badgeValues(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map((v: unknown) => stringifyValue(v)).filter((s) => s !== '');
  const s = stringifyValue(value);
  return s ? [s] : [];
}

/** Object entries become items; other entries are skipped. */
export function buildListItems(node: unknown[], config: ListConfig): ListItem[] {
  const items: ListItem[] = [];
  node.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) return;
    items.push({
      index,
      title: stringifyValue(entry[config.titleField]),
      subtitle: config.subtitleField ? stringifyValue(entry[config.subtitleField]) : '',
      badges: (config.badgeFields ?? []).flatMap((f) => badgeValues(entry[f])),
      secondary: (config.secondaryFields ?? [])
        .map((f) => stringifyValue(entry[f]))
        .filter((s) => s !== ''),
      searchText: Object.keys(entry)
        .sort()
        .map((k) => stringifyValue(entry[k]))
        .join(' '),
    });
  });
  return items;
}

/** true when every entry is an object, so the list view can show it */
export function isObjectList(node: unknown): node is unknown[] {
  return Array.isArray(node) && node.length > 0 && node.every(isRecord);
}

export interface ListViewOptions {
  node: unknown[];
  schema: DisplaySchema;
  config: ListConfig;
  /** Path of the list, for drill-in. */
  path: string;
}

export class ListView implements CustomViewContract {
  readonly kind = 'list';

  private items: ListItem[];
  private schema: DisplaySchema;
  private config: ListConfig;
  private path: string;
  private selected = 0;
  private scrollTop = 0;
  private filter = '';
  private searchQuery = '';

  constructor(options: ListViewOptions) {
    this.items = buildListItems(options.node, options.config);
    this.schema = options.schema;
    this.config = options.config;
    this.path = options.path;
  }

  /** Items passing the committed search and the live filter. */
  visibleItems(): ListItem[] {
    const query = this.searchQuery.toLowerCase();
    const filter = this.filter.toLowerCase();
    return this.items.filter((item) => {
      if (query && !item.searchText.toLowerCase().includes(query)) return false;
      if (
        filter &&
        !item.title.toLowerCase().includes(filter) &&
        !item.subtitle.toLowerCase().includes(filter)
      ) {
        return false;
      }
      return true;
    });
  }

  selectedItem(): ListItem | undefined {
    return this.visibleItems()[this.selected];
  }

  title(): string {
    const header = [this.schema.icon, this.schema.collectionTitle].filter(Boolean).join(' ');
    return header || strings.appDefaultTitle;
  }

  footer(mode: KeyMode): string {
    const parts: string[] = [];
    const open = keyFor('enter', mode);
    const search = keyFor('search', mode);
    if (open) parts.push(`${formatKeyLabel(open)} ${strings.footerOpen}`);
    if (search) parts.push(`${formatKeyLabel(search)} ${strings.footerSearch}`);
    parts.push(`${formatKeyLabel(quitKey(mode))} ${strings.footerQuit}`);
    return parts.join('  ');
  }

  handlesSearch(): boolean {
    return true;
  }

  searchTitle(): string {
    return strings.listSearchTitle;
  }

  init(): ViewCommand | undefined {
    return undefined;
  }

  flash(): Flash | undefined {
    return undefined;
  }

  position(): Position {
    const count = this.visibleItems().length;
    return { count, selected: count === 0 ? 0 : this.selected + 1, label: strings.listPositionLabel };
  }

  update(event: ViewEvent): ViewUpdate {
    switch (event.type) {
      case 'key':
        return { view: this, command: event.action ? this.act(event.action) : undefined };
      case 'search':
        if (event.committed) {
          this.searchQuery = event.query;
          this.filter = '';
        } else {
          this.filter = event.query;
        }
        this.selected = 0;
        this.scrollTop = 0;
        return { view: this };
      default:
        return { view: this };
    }
  }

  private act(action: LogicalAction): ViewCommand | undefined {
    const count = this.visibleItems().length;
    switch (action) {
      case 'up':
        this.selected = Math.max(0, this.selected - 1);
        return undefined;
      case 'down':
        this.selected = Math.max(0, Math.min(count - 1, this.selected + 1));
        return undefined;
      case 'top':
        this.selected = 0;
        return undefined;
      case 'bottom':
        this.selected = Math.max(0, count - 1);
        return undefined;
      case 'forward':
      case 'enter': {
        const item = this.selectedItem();
        return item ? { kind: 'navigate', path: buildChildPath(this.path, item.index) } : undefined;
      }
      default:
        return undefined;
    }
  }

  render(width: number, height: number, theme: Theme): string {
    if (this.items.length === 0) return '  ' + strings.listEmpty;
    const items = this.visibleItems();
    if (items.length === 0) return '  ' + strings.listNoMatches;

    const contentWidth = Math.max(10, width - 4);
    const subtitleLines = this.config.subtitleMaxLines ?? 1;
    const hasSecondary = (this.config.secondaryFields ?? []).length > 0;
    const perItem = 1 + subtitleLines + (hasSecondary ? 1 : 0) + 1;

    const lines: string[] = [];
    if (this.schema.icon || this.schema.collectionTitle) {
      lines.push('  ' + theme.title(this.title()));
      lines.push(
        '  ' +
          theme.muted(
            items.length === this.items.length
              ? strings.listItemCount(items.length)
              : strings.listFiltered(items.length, this.items.length)
          )
      );
      lines.push('');
    }

    const visibleCount = Math.max(1, Math.floor((height - lines.length) / perItem));
    if (this.selected < this.scrollTop) this.scrollTop = this.selected;
    if (this.selected >= this.scrollTop + visibleCount) this.scrollTop = this.selected - visibleCount + 1;

    const end = Math.min(items.length, this.scrollTop + visibleCount);
    for (let i = this.scrollTop; i < end; i++) {
      const item = items[i];
      const marker = i === this.selected ? theme.accent('│') + ' ' : '  ';
      const badges = item.badges.map((b) => theme.badge(` ${b} `)).join(' ');
      const title = theme.key(item.title || `[${item.index}]`);
      lines.push(fitLine(marker + title + (badges ? ' ' + badges : ''), contentWidth + 2));
      if (item.subtitle) {
        for (const sub of wrapText(item.subtitle, contentWidth - 2, subtitleLines)) {
          lines.push('  ' + sub);
        }
      }
      if (item.secondary.length > 0) {
        lines.push(fitLine('  ' + theme.muted(item.secondary.join(' · ')), contentWidth + 2));
      }
      lines.push('');
    }
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return lines.slice(0, Math.max(0, height)).join('\n');
  }
}
