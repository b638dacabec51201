/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Settings file (JSON) merged with command-line options. Command-line
  values win; the file fills in what the command line leaves open.
*/

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { LogLevel } from './common/logger';
import { errorMessage, formatIssues } from './common/validation';
import { KEY_MODES, type KeyMode } from './views/keybindings';

const keyModeSchema = z.enum(['vim', 'emacs', 'function']);
const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']);

const settingsFileSchema = z
  .object({
    keyMode: keyModeSchema.optional(),
    color: z.boolean().optional(),
    schema: z.string().min(1).optional(),
    functions: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export interface Settings {
  keyMode: KeyMode;
  color: boolean;
  schema?: string;
  functions?: string;
  logFile?: string;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: Settings = { keyMode: 'vim', color: true, logLevel: 'info' };

export function defaultSettingsPath(home: string = os.homedir()): string {
  return path.join(home, '.config', 'treelens', 'config.json');
}

export interface SettingsLoadResult {
  settings: SettingsFile;
  errors: string[];
}

/** Relative paths in the file resolve against the file's directory. */
export function parseSettings(doc: unknown, baseDir = ''): SettingsLoadResult {
  const parsed = settingsFileSchema.safeParse(doc);
  if (!parsed.success) return { settings: {}, errors: formatIssues(parsed.error) };
  const settings = { ...parsed.data };
  if (baseDir) {
    for (const key of ['schema', 'functions', 'logFile'] as const) {
      const value = settings[key];
      if (value !== undefined) settings[key] = path.resolve(baseDir, value);
    }
  }
  return { settings, errors: [] };
}

/**
 * Read the settings file. A missing default file is not an error; a missing
 * file named on the command line is.
 */
export function loadSettingsFile(file: string | undefined): SettingsLoadResult {
  const target = file ?? defaultSettingsPath();
  if (!fs.existsSync(target)) {
    return file ? { settings: {}, errors: [`${file}: file not found`] } : { settings: {}, errors: [] };
  }
  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(target, 'utf8'));
  } catch (e) {
    return { settings: {}, errors: [`${target}: ${errorMessage(e)}`] };
  }
  const result = parseSettings(doc, path.dirname(target));
  return { ...result, errors: result.errors.map((err) => `${target}: ${err}`) };
}

export interface SettingsOverrides {
  keyMode?: string;
  color?: boolean;
  schema?: string;
  functions?: string;
  logFile?: string;
  logLevel?: LogLevel;
}

export interface MergeResult {
  settings: Settings;
  errors: string[];
}

export function mergeSettings(file: SettingsFile, overrides: SettingsOverrides): MergeResult {
  const errors: string[] = [];
  let keyMode = file.keyMode ?? DEFAULT_SETTINGS.keyMode;
  if (overrides.keyMode !== undefined) {
    const parsed = keyModeSchema.safeParse(overrides.keyMode);
    if (parsed.success) keyMode = parsed.data;
    else errors.push(`invalid key mode: ${overrides.keyMode} (expected ${KEY_MODES.join(', ')})`);
  }
  return {
    settings: {
      keyMode,
      color: overrides.color ?? file.color ?? DEFAULT_SETTINGS.color,
      schema: overrides.schema ?? file.schema,
      functions: overrides.functions ?? file.functions,
      logFile: overrides.logFile ?? file.logFile,
      logLevel: overrides.logLevel ?? file.logLevel ?? DEFAULT_SETTINGS.logLevel,
    },
    errors,
  };
}
