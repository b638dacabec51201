/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Tab completion cycling. A cycle starts from the current input (the anchor)
  and continues while the input still equals the value the last step wrote.
*/

import { ROOT, baseForGlobal, buildChildPath, normalizedForm, wrapGlobalCall } from '../common/path-utils';
import type { CatalogFunction } from './catalog';
import { isFunctionSuggestion, splitInput, suggest, type Suggestion } from './suggestions';

export interface CompletionState {
  anchor: string;
  candidates: Suggestion[];
  /** -1: no candidate applied, the input shows the anchor */
  cursor: number;
  /** Input value written by the last cycle step. */
  applied: string;
}

export interface CompletionContext {
  catalog: CatalogFunction[];
  /** Node at a normalized path, undefined when it does not resolve. */
  resolve(path: string): unknown;
}

export interface CycleResult {
  state: CompletionState;
  input: string;
}

export const EMPTY_COMPLETION: CompletionState = { anchor: '', candidates: [], cursor: -1, applied: '' };

type Direction = 1 | -1;

/** Deduplicated by label; keys and indices ahead of functions. */
export function cycleCandidates(suggestions: Suggestion[]): Suggestion[] {
  const seen = new Set<string>();
  const unique = suggestions.filter((s) => {
    if (seen.has(s.label)) return false;
    seen.add(s.label);
    return true;
  });
  return [...unique.filter((s) => !isFunctionSuggestion(s)), ...unique.filter(isFunctionSuggestion)];
}

/** Input after choosing `s` while the anchor was typed. */
export function commitSuggestion(anchor: string, s: Suggestion): string {
  const { base } = splitInput(anchor);
  switch (s.kind) {
    case 'child-key':
    case 'child-index':
      return buildChildPath(base, s.label);
    case 'global-function':
      return wrapGlobalCall(s.label, baseForGlobal(anchor));
    case 'method-function':
      return `${base || ROOT}.${s.label}`;
  }
}

export function isCycling(state: CompletionState, input: string): boolean {
  return state.candidates.length > 0 && input === state.applied;
}

export function selectedSuggestion(state: CompletionState): Suggestion | undefined {
  return state.cursor >= 0 ? state.candidates[state.cursor] : undefined;
}

function stepCursor(cursor: number, length: number, dir: Direction): number {
  if (dir === 1) return cursor + 1 >= length ? 0 : cursor + 1;
  return cursor <= 0 ? length - 1 : cursor - 1;
}

function applyCursor(state: CompletionState, cursor: number): CycleResult {
  const chosen = cursor >= 0 ? state.candidates[cursor] : undefined;
  const input = chosen ? commitSuggestion(state.anchor, chosen) : state.anchor;
  return { state: { ...state, cursor, applied: input }, input };
}

/**
 * Index stepping inside a list: `name[` opens at the first (or last) index,
 * `name[n]` moves to the neighbouring index, wrapping within bounds.
 */
function indexCycle(input: string, ctx: CompletionContext, dir: Direction): string | undefined {
  const s = input.trim();
  let parent: string;
  let current: number | undefined;
  if (s.endsWith('[')) {
    parent = s.slice(0, -1);
  } else {
    const m = /\[(\d+)\]$/.exec(s);
    if (!m) return undefined;
    parent = s.slice(0, m.index);
    current = Number(m[1]);
  }
  if (parent === '') return undefined;
  const node = ctx.resolve(normalizedForm(parent));
  if (!Array.isArray(node) || node.length === 0) return undefined;
  let next: number;
  if (current === undefined) next = dir === 1 ? 0 : node.length - 1;
  else next = (((current + dir) % node.length) + node.length) % node.length;
  return `${parent}[${next}]`;
}

function step(state: CompletionState, input: string, ctx: CompletionContext, dir: Direction): CycleResult {
  if (isCycling(state, input)) {
    return applyCursor(state, stepCursor(state.cursor, state.candidates.length, dir));
  }
  const indexed = indexCycle(input, ctx, dir);
  if (indexed !== undefined) return { state: EMPTY_COMPLETION, input: indexed };

  const { base } = splitInput(input);
  const focus = ctx.resolve(normalizedForm(base));
  const candidates = cycleCandidates(suggest(input, focus, ctx.catalog));
  if (candidates.length === 0) return { state: EMPTY_COMPLETION, input };
  const fresh: CompletionState = { anchor: input, candidates, cursor: -1, applied: input };
  return applyCursor(fresh, stepCursor(-1, candidates.length, dir));
}

export function tab(state: CompletionState, input: string, ctx: CompletionContext): CycleResult {
  return step(state, input, ctx, 1);
}

/** Backward step; from the first candidate it wraps to the last. */
export function shiftTab(state: CompletionState, input: string, ctx: CompletionContext): CycleResult {
  return step(state, input, ctx, -1);
}

/**
 * Accept with a cursor movement key (Right, End): the text stays as it is
 * and only the cursor moves to the end. No call syntax is inserted.
 */
export function acceptByCursorMove(input: string): { input: string; cursor: number } {
  return { input, cursor: input.length };
}
