/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Function catalog consumed by completion. The catalog content is data;
  only usage style and structural applicability are derived here.
*/

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage, formatIssues } from '../common/validation';
import type { NodeKind } from '../data/types';

export interface CatalogFunction {
  name: string;
  /** Call pattern, e.g. "size(list) -> int" or "string.trim() -> string". */
  usage?: string;
  description?: string;
  /** Explicit applicability; inferred from the usage when absent. */
  kinds?: NodeKind[];
}

export type UsageStyle = 'global' | 'method';

export interface CatalogLoadResult {
  functions: CatalogFunction[];
  errors: string[];
}

const TYPE_KINDS: Record<string, NodeKind> = {
  list: 'array',
  array: 'array',
  map: 'map',
  object: 'map',
  string: 'scalar',
  int: 'scalar',
  uint: 'scalar',
  double: 'scalar',
  number: 'scalar',
  bool: 'scalar',
  bytes: 'scalar',
  timestamp: 'scalar',
  duration: 'scalar',
};

export const DEFAULT_CATALOG_FILE = path.resolve(__dirname, '..', '..', 'catalog', 'functions.json');

/** Usage text, falling back to the part of the description after " - ". */
function usageText(fn: CatalogFunction): string {
  if (fn.usage) return fn.usage;
  const description = fn.description ?? '';
  const sep = description.indexOf(' - ');
  return sep >= 0 ? description.slice(sep + 3) : '';
}

/** method when the usage shows a receiver call like `list.join(` */
export function usageStyle(fn: CatalogFunction): UsageStyle {
  const usage = usageText(fn);
  const paren = usage.indexOf('(');
  if (paren < 0) return 'global';
  return usage.slice(0, paren).includes('.') ? 'method' : 'global';
}

function typeKind(typeName: string): NodeKind | undefined {
  const base = typeName.trim().replace(/<.*$/, '').replace(/[^A-Za-z]/g, '').toLowerCase();
  return TYPE_KINDS[base];
}

/**
 * Node kinds a function applies to, or 'any' when it is universal.
 * Inferred from the receiver (method style) or first parameter (global style).
 */
export function compatibleKinds(fn: CatalogFunction): NodeKind[] | 'any' {
  if (fn.kinds && fn.kinds.length > 0) return fn.kinds;
  const usage = usageText(fn);
  const paren = usage.indexOf('(');
  if (paren < 0) return 'any';
  let typeName: string;
  if (usageStyle(fn) === 'method') {
    const head = usage.slice(0, paren);
    typeName = head.slice(0, head.lastIndexOf('.'));
  } else {
    const close = usage.indexOf(')', paren);
    const params = usage.slice(paren + 1, close >= 0 ? close : undefined);
    typeName = params.split(',')[0];
  }
  const kind = typeKind(typeName);
  return kind ? [kind] : 'any';
}

export function isCompatible(fn: CatalogFunction, kind: NodeKind): boolean {
  const kinds = compatibleKinds(fn);
  return kinds === 'any' || kinds.includes(kind);
}

const catalogEntrySchema = z.object({
  name: z.string().trim().min(1),
  usage: z.string().optional(),
  description: z.string().optional(),
  kinds: z.array(z.enum(['map', 'array', 'scalar'])).optional(),
});

/**
 * Validate a parsed catalog document (array of entries). Invalid entries are
 * skipped and reported.
 */
export function loadCatalog(doc: unknown): CatalogLoadResult {
  const functions: CatalogFunction[] = [];
  const errors: string[] = [];
  if (!Array.isArray(doc)) {
    return { functions, errors: ['catalog must be a list of functions'] };
  }
  doc.forEach((entry: unknown, idx) => {
    const parsed = catalogEntrySchema.safeParse(entry);
    if (parsed.success) functions.push(parsed.data);
    else errors.push(...formatIssues(parsed.error).map((msg) => `entry ${idx}: ${msg}`));
  });
  return { functions, errors };
}

export function readCatalogFile(file: string): CatalogLoadResult {
  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    return { functions: [], errors: [`${file}: ${errorMessage(e)}`] };
  }
  return loadCatalog(doc);
}

export function defaultCatalog(): CatalogFunction[] {
  return readCatalogFile(DEFAULT_CATALOG_FILE).functions;
}
