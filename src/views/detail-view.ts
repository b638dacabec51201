/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Detail view: one object rendered as titled sections. Fields that no
  section names end up in a trailing table section.
*/

import { stringifyValue, summarize } from '../data/navigate';
import type { DataMap } from '../data/types';
import { strings } from '../strings';
import type { CustomViewContract, Flash, Position, ViewCommand, ViewEvent, ViewUpdate } from './custom-view';
import type { DetailConfig, DetailSection, SectionLayout } from './display-schema';
import { formatKeyLabel, keyFor, quitKey, type KeyMode } from './keybindings';
import { displayWidth, fitLine, padRight, truncate, wrapText } from './text';
import type { Theme } from './theme';

interface RenderedSection {
  title: string;
  lines: string[];
}

export interface DetailViewOptions {
  node: DataMap;
  config: DetailConfig;
}

export class DetailView implements CustomViewContract {
  readonly kind = 'detail';

  private node: DataMap;
  private config: DetailConfig;
  private hidden: Set<string>;
  private scrollTop = 0;

  constructor(options: DetailViewOptions) {
    this.node = options.node;
    this.config = options.config;
    this.hidden = new Set(options.config.hiddenFields ?? []);
    if (options.config.titleField) this.hidden.add(options.config.titleField);
  }

  title(): string {
    const field = this.config.titleField;
    return (field && stringifyValue(this.node[field])) || strings.detailPositionLabel;
  }

  footer(mode: KeyMode): string {
    const back = keyFor('back', mode);
    const parts = back ? [`${formatKeyLabel(back)} ${strings.footerBack}`] : [];
    parts.push(`${formatKeyLabel(quitKey(mode))} ${strings.footerQuit}`);
    return parts.join('  ');
  }

  handlesSearch(): boolean {
    return false;
  }

  searchTitle(): string {
    return '';
  }

  init(): ViewCommand | undefined {
    return undefined;
  }

  flash(): Flash | undefined {
    return undefined;
  }

  position(): Position {
    return { count: 1, selected: 1, label: strings.detailPositionLabel };
  }

  update(event: ViewEvent): ViewUpdate {
    if (event.type !== 'key') return { view: this };
    switch (event.action) {
      case 'up':
        this.scrollTop = Math.max(0, this.scrollTop - 1);
        break;
      case 'down':
        this.scrollTop++;
        break;
      case 'top':
        this.scrollTop = 0;
        break;
      case 'bottom':
        this.scrollTop = Number.MAX_SAFE_INTEGER;
        break;
      default:
        break;
    }
    return { view: this };
  }

  /** Sections in schema order, then the implicit one for uncovered fields. */
  sections(width: number, theme: Theme): RenderedSection[] {
    const covered = new Set<string>();
    const out: RenderedSection[] = [];
    for (const section of this.config.sections ?? []) {
      section.fields.forEach((f) => covered.add(f));
      const lines = this.renderSection(section, width, theme);
      if (lines.length > 0) out.push({ title: section.title ?? '', lines });
    }
    const rest = Object.keys(this.node).filter((k) => !covered.has(k) && !this.hidden.has(k));
    if (rest.length > 0) {
      const lines = this.renderSection({ fields: rest, layout: 'table' }, width, theme);
      if (lines.length > 0) {
        const title = (this.config.sections ?? []).length > 0 ? strings.detailOtherSection : '';
        out.push({ title, lines });
      }
    }
    return out;
  }

  private values(fields: string[]): Array<{ field: string; value: unknown }> {
    return fields
      .filter((f) => !this.hidden.has(f))
      .map((f) => ({ field: f, value: this.node[f] }))
      .filter((e) => e.value !== undefined && e.value !== null && stringifyValue(e.value) !== '');
  }

  private renderSection(section: DetailSection, width: number, theme: Theme): string[] {
    const layout: SectionLayout = section.layout ?? 'table';
    const entries = this.values(section.fields);
    if (entries.length === 0) return [];
    switch (layout) {
      case 'inline': {
        const line = entries.map((e) => stringifyValue(e.value)).join(' · ');
        return [displayWidth(line) > width ? truncate(line, width) : line];
      }
      case 'paragraph':
        return entries.flatMap((e) => wrapText(stringifyValue(e.value), width));
      case 'tags':
        return this.renderTags(entries.map((e) => e.value), width, theme);
      case 'table': {
        const keyWidth = Math.min(
          Math.max(...entries.map((e) => displayWidth(e.field))),
          Math.floor(width / 3)
        );
        return entries.map((e) => {
          const key = padRight(truncate(e.field, keyWidth), keyWidth);
          const value = summarize(e.value, Math.max(3, width - keyWidth - 2));
          return theme.accent(key) + '  ' + value;
        });
      }
    }
  }

  private renderTags(values: unknown[], width: number, theme: Theme): string[] {
    const tags = values.flatMap((v) => (Array.isArray(v) ? v.map((x: unknown) => stringifyValue(x)) : [stringifyValue(v)]));
    const lines: string[] = [];
    let current = '';
    let currentWidth = 0;
    for (const tag of tags.filter((t) => t !== '')) {
      const tagWidth = displayWidth(tag) + 2;
      if (currentWidth > 0 && currentWidth + 1 + tagWidth > width) {
        lines.push(current);
        current = '';
        currentWidth = 0;
      }
      current += (currentWidth > 0 ? ' ' : '') + theme.badge(` ${tag} `);
      currentWidth += (currentWidth > 0 ? 1 : 0) + tagWidth;
    }
    if (current) lines.push(current);
    return lines;
  }

  render(width: number, height: number, theme: Theme): string {
    const contentWidth = Math.max(10, width - 4);
    const lines: string[] = [];
    for (const section of this.sections(contentWidth, theme)) {
      if (lines.length > 0) lines.push('');
      if (section.title) lines.push(theme.title(section.title));
      lines.push(...section.lines.map((l) => '  ' + l));
    }
    if (lines.length === 0) return '  ' + strings.tableEmpty;
    const maxTop = Math.max(0, lines.length - height);
    this.scrollTop = Math.min(this.scrollTop, maxTop);
    return lines
      .slice(this.scrollTop, this.scrollTop + Math.max(0, height))
      .map((l) => fitLine(l, width))
      .join('\n');
  }
}
