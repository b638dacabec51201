/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS, defaultSettingsPath, loadSettingsFile, mergeSettings, parseSettings } from './settings';

describe('settings', () => {
  describe('parseSettings', () => {
    it('accepts a valid document', () => {
      expect(parseSettings({ keyMode: 'emacs', color: false })).toEqual({
        settings: { keyMode: 'emacs', color: false },
        errors: [],
      });
    });

    it('resolves file paths against the base directory', () => {
      const { settings } = parseSettings({ schema: 'views.json', logFile: '/var/log/t.log' }, '/home/u/.config/treelens');
      expect(settings.schema).toBe(path.resolve('/home/u/.config/treelens', 'views.json'));
      expect(settings.logFile).toBe(path.resolve('/var/log/t.log'));
    });

    it('reports invalid values with their location', () => {
      const result = parseSettings({ keyMode: 'nano' });
      expect(result.settings).toEqual({});
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^at keyMode: /);
    });

    it('rejects unknown keys', () => {
      const result = parseSettings({ theme: 'dark' });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/theme/);
    });
  });

  describe('loadSettingsFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'treelens-settings-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads and validates the named file', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ keyMode: 'function', functions: 'fns.json' }));
      expect(loadSettingsFile(file)).toEqual({
        settings: { keyMode: 'function', functions: path.join(dir, 'fns.json') },
        errors: [],
      });
    });

    it('reports a missing named file', () => {
      const file = path.join(dir, 'nope.json');
      expect(loadSettingsFile(file).errors).toEqual([`${file}: file not found`]);
    });

    it('prefixes parse errors with the file name', () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ nope');
      const { errors } = loadSettingsFile(file);
      expect(errors).toHaveLength(1);
      expect(errors[0].startsWith(`${file}: `)).toBe(true);
    });
  });

  describe('mergeSettings', () => {
    it('uses defaults when nothing is set', () => {
      expect(mergeSettings({}, {})).toEqual({ settings: DEFAULT_SETTINGS, errors: [] });
    });

    it('lets the command line win over the file', () => {
      const { settings } = mergeSettings(
        { keyMode: 'emacs', color: false, schema: '/a.json' },
        { keyMode: 'function', schema: '/b.json' }
      );
      expect(settings).toMatchObject({ keyMode: 'function', color: false, schema: '/b.json' });
    });

    it('reports an unknown key mode and keeps the file value', () => {
      const result = mergeSettings({ keyMode: 'emacs' }, { keyMode: 'nano' });
      expect(result.settings.keyMode).toBe('emacs');
      expect(result.errors).toEqual(['invalid key mode: nano (expected vim, emacs, function)']);
    });
  });

  it('places the default file under the home directory', () => {
    expect(defaultSettingsPath('/home/u')).toBe(path.join('/home/u', '.config', 'treelens', 'config.json'));
  });
});
