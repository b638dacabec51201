/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Display schema: optional JSON document that selects and configures the
  list, detail and status views for a data set.
*/

import * as fs from 'fs';
import { z } from 'zod';
import { errorMessage, formatIssues } from '../common/validation';

const DURATION_TOKEN = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;
const UNIT_MS: Record<string, number> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };

/**
 * Duration text to milliseconds, e.g. "30s", "1m30s", "500ms".
 * Returns undefined for anything else.
 */
export function parseDuration(text: string): number | undefined {
  const s = text.trim();
  if (s === '') return undefined;
  let total = 0;
  let consumed = 0;
  for (const m of s.matchAll(DURATION_TOKEN)) {
    if (m.index !== consumed) return undefined;
    total += Number(m[1]) * UNIT_MS[m[2]];
    consumed += m[0].length;
  }
  return consumed === s.length ? Math.round(total) : undefined;
}

const duration = z.string().refine((s) => parseDuration(s) !== undefined, {
  message: 'expected a duration like 30s, 2m or 1m30s',
});

const actionKeysSchema = z.object({
  vim: z.string().optional(),
  emacs: z.string().optional(),
  function: z.string().optional(),
});

const statusActionSchema = z.object({
  label: z.string().min(1),
  type: z.enum(['copy-value', 'open-url']),
  field: z.string().min(1),
  keys: actionKeysSchema.optional(),
});

const statusConfigSchema = z.object({
  titleField: z.string().optional(),
  messageField: z.string().optional(),
  waitMessage: z.string().optional(),
  successMessage: z.string().optional(),
  timeout: duration.optional(),
  displayFields: z.array(z.object({ label: z.string(), field: z.string() })).optional(),
  actions: z.array(statusActionSchema).optional(),
  doneBehavior: z.enum(['exit-after-delay', 'wait-for-key']).optional(),
  doneDelay: duration.optional(),
});

const listConfigSchema = z.object({
  titleField: z.string().min(1),
  subtitleField: z.string().optional(),
  subtitleMaxLines: z.number().int().positive().optional(),
  badgeFields: z.array(z.string()).optional(),
  secondaryFields: z.array(z.string()).optional(),
});

const detailSectionSchema = z.object({
  title: z.string().optional(),
  fields: z.array(z.string()),
  layout: z.enum(['inline', 'paragraph', 'tags', 'table']).optional(),
});

const detailConfigSchema = z.object({
  titleField: z.string().optional(),
  sections: z.array(detailSectionSchema).optional(),
  hiddenFields: z.array(z.string()).optional(),
});

const displaySchemaSchema = z.object({
  version: z.literal('v1').optional(),
  icon: z.string().optional(),
  collectionTitle: z.string().optional(),
  list: listConfigSchema.optional(),
  detail: detailConfigSchema.optional(),
  status: statusConfigSchema.optional(),
});

export type DisplaySchema = z.infer<typeof displaySchemaSchema>;
export type ListConfig = z.infer<typeof listConfigSchema>;
export type DetailConfig = z.infer<typeof detailConfigSchema>;
export type DetailSection = z.infer<typeof detailSectionSchema>;
export type SectionLayout = NonNullable<DetailSection['layout']>;
export type StatusConfig = z.infer<typeof statusConfigSchema>;
export type StatusAction = z.infer<typeof statusActionSchema>;
export type ActionType = StatusAction['type'];
export type DoneBehavior = NonNullable<StatusConfig['doneBehavior']>;

export interface SchemaLoadResult {
  schema: DisplaySchema | undefined;
  errors: string[];
}

export function parseDisplaySchema(doc: unknown): SchemaLoadResult {
  const parsed = displaySchemaSchema.safeParse(doc);
  if (parsed.success) return { schema: parsed.data, errors: [] };
  return { schema: undefined, errors: formatIssues(parsed.error) };
}

export function readDisplaySchemaFile(file: string): SchemaLoadResult {
  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    return { schema: undefined, errors: [`${file}: ${errorMessage(e)}`] };
  }
  const result = parseDisplaySchema(doc);
  return { ...result, errors: result.errors.map((err) => `${file}: ${err}`) };
}
