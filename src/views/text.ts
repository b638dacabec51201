/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Terminal text measuring, clipping and wrapping.
*/

import stringWidth from 'string-width';

// eslint-disable-next-line no-control-regex -- ANSI escape sequences
const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}

export function displayWidth(text: string): number {
  return stringWidth(text);
}

/** Clip plain text to width columns, ending in … when cut. */
export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (stringWidth(text) <= width) return text;
  let out = '';
  for (const ch of text) {
    if (stringWidth(out + ch) > width - 1) break;
    out += ch;
  }
  return out + '…';
}

/** Clip a possibly colored line; colors are dropped only when the line is cut. */
export function fitLine(line: string, width: number): string {
  if (stringWidth(line) <= width) return line;
  return truncate(stripAnsi(line), width);
}

export function padRight(text: string, width: number): string {
  const w = stringWidth(text);
  return w >= width ? text : text + ' '.repeat(width - w);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** UTF-16 index of the code point after the one at `index`. */
export function nextCharIndex(text: string, index: number): number {
  if (index >= text.length) return text.length;
  if (isHighSurrogate(text.charCodeAt(index)) && isLowSurrogate(text.charCodeAt(index + 1))) return index + 2;
  return index + 1;
}

/** UTF-16 index of the code point before `index`. */
export function prevCharIndex(text: string, index: number): number {
  if (index <= 0) return 0;
  if (index >= 2 && isLowSurrogate(text.charCodeAt(index - 1)) && isHighSurrogate(text.charCodeAt(index - 2))) {
    return index - 2;
  }
  return index - 1;
}

/**
 * Word-wrap plain text to width. With maxLines, the last kept line ends in
 * "..." when text was dropped.
 */
export function wrapText(text: string, width: number, maxLines?: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split(/\r?\n/)) {
    let current = '';
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      const candidate = current ? `${current} ${word}` : word;
      if (stringWidth(candidate) <= width || current === '') {
        current = stringWidth(candidate) > width ? truncate(candidate, width) : candidate;
      } else {
        lines.push(current);
        current = stringWidth(word) > width ? truncate(word, width) : word;
      }
    }
    lines.push(current);
  }
  if (maxLines !== undefined && lines.length > maxLines) {
    const kept = lines.slice(0, maxLines);
    const last = kept[maxLines - 1];
    kept[maxLines - 1] = stringWidth(last) + 3 <= width ? last + '...' : truncate(last, width - 3) + '...';
    return kept;
  }
  return lines;
}

/** Keep the window of `height` rows that shows `selected`. */
export function scrollWindow(total: number, selected: number, height: number): { start: number; end: number } {
  if (height <= 0) return { start: 0, end: 0 };
  if (total <= height) return { start: 0, end: total };
  const start = Math.min(Math.max(0, selected - Math.floor(height / 2)), total - height);
  return { start, end: start + height };
}
