/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ROOT, buildChildPath, isPathExpression, normalizedForm, parseSegments } from '../common/path-utils';
import type { ChildEntry, DataMap, NavigateResult, NodeKind } from './types';

export function isRecord(value: unknown): value is DataMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nodeKind(value: unknown): NodeKind {
  if (Array.isArray(value)) return 'array';
  if (isRecord(value)) return 'map';
  return 'scalar';
}

export function childEntries(value: unknown): ChildEntry[] {
  if (Array.isArray(value)) return value.map((v: unknown, i) => ({ key: i, value: v }));
  if (isRecord(value)) return Object.keys(value).map((k) => ({ key: k, value: value[k] }));
  return [];
}

/** Keys in data order; array indices as decimal strings. */
export function childKeys(value: unknown): string[] {
  return childEntries(value).map((e) => String(e.key));
}

function typeLabel(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

/**
 * Resolve a path against the data root.
 * A numeric step on a map looks the key up as a string; a numeric key step on a list indexes it.
 */
export function navigate(root: unknown, path: string): NavigateResult {
  if (!isPathExpression(path)) {
    return { ok: false, error: `not a path: ${path.trim()}`, at: ROOT };
  }
  let node = root;
  let at = ROOT;
  for (const seg of parseSegments(path)) {
    if (Array.isArray(node)) {
      if (!/^\d+$/.test(seg.key)) {
        return { ok: false, error: `cannot select key "${seg.key}" on a list`, at };
      }
      const idx = Number(seg.key);
      if (idx >= node.length) {
        return { ok: false, error: `index ${idx} out of range (length ${node.length})`, at };
      }
      const next: unknown = node[idx];
      node = next;
      at = buildChildPath(at, idx);
    } else if (isRecord(node)) {
      if (!Object.prototype.hasOwnProperty.call(node, seg.key)) {
        return { ok: false, error: `key "${seg.key}" not found`, at };
      }
      node = node[seg.key];
      at = buildChildPath(at, seg.key);
    } else {
      return { ok: false, error: `cannot step into ${typeLabel(node)} value`, at };
    }
  }
  return { ok: true, node, path: normalizedForm(at) };
}

/** One-line preview used in tables and detail rows. */
export function summarize(value: unknown, maxLength = 60): string {
  let text: string;
  if (Array.isArray(value)) text = `[${value.length} items]`;
  else if (isRecord(value)) text = `{${Object.keys(value).length} keys}`;
  else if (typeof value === 'string') text = value;
  else if (value === undefined) text = '';
  else text = String(value);
  text = text.replace(/\s+/g, ' ');
  return text.length > maxLength ? text.slice(0, maxLength - 1) + '…' : text;
}

/** Plain string for copy actions and display fields; maps and lists as compact JSON. */
export function stringifyValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
