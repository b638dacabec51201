/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ROOT, lastUnquotedDotIndex } from '../common/path-utils';
import { childEntries, nodeKind } from '../data/navigate';
import { isCompatible, usageStyle, type CatalogFunction } from './catalog';

export type SuggestionKind = 'child-key' | 'child-index' | 'global-function' | 'method-function';

export interface Suggestion {
  /** Key, `[N]` or `name()` */
  label: string;
  kind: SuggestionKind;
  /** Usage text for functions */
  detail?: string;
}

export interface InputParts {
  /** Expression the partial token hangs off. */
  base: string;
  /** Partially typed last token, '' right after a separator. */
  token: string;
  trailingDot: boolean;
}

/**
 * Split the expression bar input into the completion base and the partial token.
 * e.g. '_.tasks.bu' → { base: '_.tasks', token: 'bu' }
 */
export function splitInput(input: string): InputParts {
  const s = input.trim();
  if (s === '' || s === ROOT) return { base: ROOT, token: '', trailingDot: false };
  if (s.endsWith('.')) return { base: s.slice(0, -1) || ROOT, token: '', trailingDot: true };
  if (s.endsWith('[')) return { base: s.slice(0, -1) || ROOT, token: '', trailingDot: false };
  if (s.endsWith(']') || s.endsWith(')')) return { base: s, token: '', trailingDot: false };
  const dot = lastUnquotedDotIndex(s);
  const base = dot > 0 ? s.slice(0, dot) : ROOT;
  const token = dot >= 0 ? s.slice(dot + 1) : s;
  if (/[[("']/.test(token)) return { base, token: '', trailingDot: false };
  return { base, token, trailingDot: false };
}

export function partialToken(input: string): string {
  return splitInput(input).token;
}

function matchesToken(text: string, token: string): boolean {
  return token === '' || text.toLowerCase().startsWith(token.toLowerCase());
}

/**
 * Suggestions for the input given the node its base resolves to.
 * Keys (or indices) come first, except right after a dot, where functions lead.
 */
export function suggest(input: string, focus: unknown, catalog: CatalogFunction[]): Suggestion[] {
  const { token, trailingDot } = splitInput(input);
  const kind = nodeKind(focus);

  const children: Suggestion[] = [];
  for (const entry of childEntries(focus)) {
    if (typeof entry.key === 'number') {
      if (matchesToken(String(entry.key), token)) {
        children.push({ label: `[${entry.key}]`, kind: 'child-index' });
      }
    } else if (matchesToken(entry.key, token)) {
      children.push({ label: entry.key, kind: 'child-key' });
    }
  }

  const functions: Suggestion[] = [];
  for (const fn of catalog) {
    if (!isCompatible(fn, kind) || !matchesToken(fn.name, token)) continue;
    functions.push({
      label: `${fn.name}()`,
      kind: usageStyle(fn) === 'method' ? 'method-function' : 'global-function',
      detail: fn.usage ?? fn.description,
    });
  }

  return trailingDot ? [...functions, ...children] : [...children, ...functions];
}

export function isFunctionSuggestion(s: Suggestion): boolean {
  return s.kind === 'global-function' || s.kind === 'method-function';
}

/** Status line summary of function candidates, e.g. ".join() size()" */
export function summarizeFunctions(suggestions: Suggestion[], max = 8): string {
  const fns = suggestions.filter(isFunctionSuggestion);
  const shown = fns
    .slice(0, max)
    .map((s) => (s.kind === 'method-function' ? '.' + s.label : s.label));
  if (fns.length > max) shown.push('…');
  return shown.join(' ');
}
