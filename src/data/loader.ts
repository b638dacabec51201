/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Load JSON, NDJSON and XML text into a plain data tree.
*/

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { errorMessage } from '../common/validation';
import type { DataFormat, LoadError, LoadOptions, LoadResult } from './types';

const XML_OPTIONS = {
  attributeNamePrefix: '@_',
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: true,
};

function extensionFormat(fileName: string | undefined): DataFormat | undefined {
  if (!fileName) return undefined;
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.ndjson') || lower.endsWith('.jsonl')) return 'ndjson';
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.xml')) return 'xml';
  return undefined;
}

function parsesAsJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick the input format: explicit option, then file extension, then content.
 * Several lines that each parse on their own are NDJSON.
 */
export function detectFormat(text: string, options: LoadOptions = {}): DataFormat {
  if (options.format) return options.format;
  const byExtension = extensionFormat(options.fileName);
  if (byExtension) return byExtension;
  const trimmed = text.trim();
  if (trimmed.startsWith('<')) return 'xml';
  const lines = trimmed.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length > 1 && parsesAsJson(lines[0]) && !parsesAsJson(trimmed)) return 'ndjson';
  return 'json';
}

/** Map a character offset to a 1-based line/column pair. */
export function offsetToPosition(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, Math.max(0, offset));
  const lines = before.split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

function loadJson(text: string): LoadResult {
  try {
    const root: unknown = JSON.parse(text);
    return { root, format: 'json', errors: [] };
  } catch (e) {
    const message = errorMessage(e);
    const match = /position (\d+)/.exec(message);
    const pos = match ? offsetToPosition(text, Number(match[1])) : { line: 1, column: 1 };
    return { root: undefined, format: 'json', errors: [{ ...pos, message }] };
  }
}

function loadNdjson(text: string): LoadResult {
  const root: unknown[] = [];
  const errors: LoadError[] = [];
  text.split(/\r?\n/).forEach((line, idx) => {
    if (line.trim() === '') return;
    try {
      root.push(JSON.parse(line));
    } catch (e) {
      errors.push({ line: idx + 1, column: 1, message: errorMessage(e) });
    }
  });
  return { root: errors.length > 0 ? undefined : root, format: 'ndjson', errors };
}

function loadXml(text: string): LoadResult {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    return {
      root: undefined,
      format: 'xml',
      errors: [{ line, column: col, message: `${code}: ${msg}` }],
    };
  }
  try {
    const root: unknown = new XMLParser(XML_OPTIONS).parse(text);
    return { root, format: 'xml', errors: [] };
  } catch (e) {
    return { root: undefined, format: 'xml', errors: [{ line: 1, column: 1, message: errorMessage(e) }] };
  }
}

export function loadData(text: string, options: LoadOptions = {}): LoadResult {
  const format = detectFormat(text, options);
  if (text.trim() === '') {
    return { root: undefined, format, errors: [{ line: 1, column: 1, message: 'empty input' }] };
  }
  switch (format) {
    case 'json':
      return loadJson(text);
    case 'ndjson':
      return loadNdjson(text);
    case 'xml':
      return loadXml(text);
  }
}

/**
 * Whether the load result can be explored (no errors and a root value).
 */
export function isLoadUsable(result: LoadResult): boolean {
  return result.errors.length === 0 && result.root !== undefined;
}
