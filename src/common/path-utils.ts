/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Path addressing for the expression bar: parsing, display and normalized
  rendering, child path construction and the helpers completion needs to find
  the base of a partially typed path.
  All functions are total; malformed input yields a best-effort string.
*/

export const ROOT = '_';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INDEX_STEP = /^\[\s*\d+\s*\]$/;
const QUOTED_STEP = /^\[\s*"(?:[^"\\]|\\.)*"\s*\]$/;

export interface PathSegment {
  key: string;
  /** true for `[N]` steps */
  index: boolean;
}

export function isValidIdentifier(s: string): boolean {
  return IDENTIFIER.test(s);
}

/** Quote a key for bracket notation, escaping `\` and `"`. */
export function quoteKey(key: string): string {
  return '"' + key.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
}

interface ScanResult {
  /** per character: outside quotes and at bracket/paren/brace depth 0 (openers count as top-level) */
  topLevel: boolean[];
  depth: number;
  inQuote: boolean;
  unbalanced: boolean;
}

function scan(input: string): ScanResult {
  const topLevel: boolean[] = [];
  let depth = 0;
  let quote: string | undefined;
  let escaped = false;
  let unbalanced = false;
  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (quote) {
      topLevel.push(false);
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      topLevel.push(depth === 0);
      quote = ch;
    } else if (ch === '[' || ch === '(' || ch === '{') {
      topLevel.push(depth === 0);
      depth++;
    } else if (ch === ']' || ch === ')' || ch === '}') {
      depth--;
      if (depth < 0) {
        unbalanced = true;
        depth = 0;
      }
      topLevel.push(false);
    } else {
      topLevel.push(depth === 0);
    }
  }
  return { topLevel, depth, inQuote: quote !== undefined, unbalanced };
}

function isRooted(s: string): boolean {
  return s === ROOT || s.startsWith(ROOT + '.') || s.startsWith(ROOT + '[');
}

function hasTopLevel(s: string, pred: (ch: string) => boolean): boolean {
  const { topLevel } = scan(s);
  for (let i = 0; i < s.length; i++) {
    if (topLevel[i] && pred(s[i])) return true;
  }
  return false;
}

/**
 * Literal or composite expressions are never rewritten: quoted strings, map
 * literals, list literals and anything containing a call or whitespace.
 */
function isLiteralExpression(s: string): boolean {
  if (s.startsWith('"') || s.startsWith("'") || s.startsWith('{')) return true;
  if (s.startsWith('[')) {
    const close = s.indexOf(']');
    const first = close >= 0 ? s.slice(0, close + 1) : s;
    if (!INDEX_STEP.test(first) && !QUOTED_STEP.test(first)) return true;
  }
  return hasTopLevel(s, (ch) => ch === '(' || /\s/.test(ch));
}

function readQuoted(chars: string[], start: number): { value: string; end: number } {
  const quote = chars[start];
  let value = '';
  let i = start + 1;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch === '\\' && i + 1 < chars.length) {
      value += chars[i + 1];
      i += 2;
      continue;
    }
    if (ch === quote) return { value, end: i + 1 };
    value += ch;
    i++;
  }
  return { value, end: i };
}

/**
 * Parse a path into typed segments.
 * e.g. '_.tasks["build-windows"][0]' → [{tasks}, {build-windows}, {0, index}]
 */
export function parseSegments(path: string): PathSegment[] {
  const s = path.trim();
  if (s === '' || s === ROOT) return [];
  const chars = [...s];
  const segs: PathSegment[] = [];
  let i = isRooted(s) ? 1 : 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch === '[') {
      let j = i + 1;
      while (j < chars.length && chars[j] === ' ') j++;
      if (chars[j] === '"' || chars[j] === "'") {
        const { value, end } = readQuoted(chars, j);
        segs.push({ key: value, index: false });
        j = end;
        while (j < chars.length && chars[j] !== ']') j++;
        i = j + 1;
        continue;
      }
      let content = '';
      while (j < chars.length && chars[j] !== ']') content += chars[j++];
      content = content.trim();
      if (/^\d+$/.test(content)) segs.push({ key: content, index: true });
      else if (content !== '') segs.push({ key: content, index: false });
      i = j + 1;
      continue;
    }
    if (ch === '.') i++;
    let token = '';
    while (i < chars.length && chars[i] !== '.' && chars[i] !== '[') token += chars[i++];
    if (token !== '') segs.push({ key: token, index: false });
  }
  return segs;
}

/** Segment keys only; quoted keys unescaped, indices as decimal strings. */
export function splitSegments(path: string): string[] {
  return parseSegments(path).map((seg) => seg.key);
}

function renderSegments(segs: PathSegment[], numericAsIndex: boolean): string {
  let out = ROOT;
  for (const seg of segs) {
    if (seg.index || (numericAsIndex && /^\d+$/.test(seg.key))) {
      out += '[' + seg.key + ']';
    } else if (isValidIdentifier(seg.key)) {
      out += '.' + seg.key;
    } else {
      out += '[' + quoteKey(seg.key) + ']';
    }
  }
  return out;
}

/** Human-facing form: dot notation where the key allows it, quoted brackets otherwise. */
export function displayForm(raw: string): string {
  const s = raw.trim();
  if (s === '' || s === ROOT) return ROOT;
  if (isLiteralExpression(s)) return s;
  return renderSegments(parseSegments(s), false);
}

/** Canonical form: like displayForm, with every purely numeric segment as `[N]`. */
export function normalizedForm(raw: string): string {
  const s = raw.trim();
  if (s === '' || s === ROOT) return ROOT;
  if (isLiteralExpression(s)) return s;
  return renderSegments(parseSegments(s), true);
}

/**
 * Append one segment to basePath. key may be a number, an `[N]` or `["quoted"]`
 * step, or a plain key (quoted when it is not an identifier).
 */
export function buildChildPath(basePath: string, key: string | number): string {
  let base = basePath.trim();
  if (base.endsWith('.')) base = base.slice(0, -1);
  if (base === '') base = ROOT;
  if (typeof key === 'number') return `${base}[${key}]`;
  if (INDEX_STEP.test(key) || QUOTED_STEP.test(key)) return base + key;
  if (isValidIdentifier(key)) return `${base}.${key}`;
  return `${base}[${quoteKey(key)}]`;
}

/** False while a separator, bracket, parenthesis or quote is still pending. */
export function isCompletePath(input: string): boolean {
  const s = input.trim();
  if (s === '') return false;
  if (s.endsWith('.') || s.endsWith('[')) return false;
  const { depth, inQuote, unbalanced } = scan(s);
  return depth === 0 && !inQuote && !unbalanced;
}

export function lastUnquotedDotIndex(input: string): number {
  const { topLevel } = scan(input);
  for (let i = input.length - 1; i >= 0; i--) {
    if (input[i] === '.' && topLevel[i]) return i;
  }
  return -1;
}

/** Parent path: input without its final dot or bracket step. The root stays `_`. */
export function stripLastSegment(input: string): string {
  const s = input.trim();
  if (s === '' || s === ROOT) return ROOT;
  const { topLevel } = scan(s);
  for (let i = s.length - 1; i > 0; i--) {
    if ((s[i] === '.' || s[i] === '[') && topLevel[i]) return s.slice(0, i);
  }
  return ROOT;
}

function normalizeExprBase(base: string): string {
  const s = base.trim();
  if (s === '') return ROOT;
  if (isRooted(s)) return s;
  if (s.startsWith('"') || s.startsWith("'") || s.startsWith('[') || s.startsWith('{')) return s;
  if (hasTopLevel(s, (ch) => ch === '(')) return s;
  return ROOT + '.' + s;
}

/**
 * The expression a global function should wrap: the input without its
 * trailing `[`, trailing `.` or partially typed last token. Input ending in a
 * closed bracket or call is already complete.
 * e.g. '_.pd1001.platform.' → '_.pd1001.platform'
 */
export function baseForGlobal(input: string): string {
  let s = input.trim();
  if (s.endsWith('[')) return normalizeExprBase(s.slice(0, -1));
  if (s.endsWith(']') || s.endsWith(')')) return normalizeExprBase(s);
  if (s.endsWith('.')) {
    s = s.slice(0, -1);
  } else {
    const dot = lastUnquotedDotIndex(s);
    s = dot >= 0 ? s.slice(0, dot) : '';
  }
  return normalizeExprBase(s);
}

/** e.g. ('has()', '_.a') → 'has(_.a)' */
export function wrapGlobalCall(name: string, baseExpr: string): string {
  const fn = name.trim().replace(/\(\)$/, '');
  return `${fn}(${baseExpr})`;
}

/** true when raw addresses the data tree rather than being a literal or call expression */
export function isPathExpression(raw: string): boolean {
  const s = raw.trim();
  return s === '' || s === ROOT || !isLiteralExpression(s);
}
