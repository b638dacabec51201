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
import { main, type CliIO } from './cli';

interface Captured {
  io: CliIO;
  out: () => string;
  err: () => string;
}

function capture(): Captured {
  let out = '';
  let err = '';
  return {
    io: {
      stdout: { write: (s: string) => (out += s) },
      stderr: { write: (s: string) => (err += s) },
      stdin: process.stdin,
      colorSupported: false,
    },
    out: () => out,
    err: () => err,
  };
}

describe('cli', () => {
  let dir: string;
  let dataFile: string;
  let configFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'treelens-cli-'));
    dataFile = path.join(dir, 'data.json');
    configFile = path.join(dir, 'config.json');
    fs.writeFileSync(dataFile, JSON.stringify({ name: 'demo', items: [{ id: 1, label: 'a' }, { id: 2, label: 'b' }] }));
    fs.writeFileSync(configFile, '{}');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function treelens(...args: string[]): { run: Promise<number>; captured: Captured } {
    const captured = capture();
    return { run: main(['node', 'treelens', dataFile, '--config', configFile, ...args], captured.io), captured };
  }

  it('prints the node at a path as JSON', async () => {
    const { run, captured } = treelens('--output', 'json', '--path', '_.items[1]');
    expect(await run).toBe(0);
    expect(captured.out()).toBe('{\n  "id": 2,\n  "label": "b"\n}\n');
  });

  it('prints the node at a path as XML', async () => {
    const { run, captured } = treelens('-o', 'xml', '-p', '_.items[0]');
    expect(await run).toBe(0);
    expect(captured.out()).toBe('<root>\n  <id>1</id>\n  <label>a</label>\n</root>\n');
  });

  it('fails on a path that does not resolve', async () => {
    const { run, captured } = treelens('--output', 'json', '--path', '_.missing');
    expect(await run).toBe(1);
    expect(captured.err()).toBe('treelens: _: key "missing" not found\n');
  });

  it('logs to stderr at debug level', async () => {
    const { run, captured } = treelens('--output', 'json', '--debug');
    expect(await run).toBe(0);
    expect(captured.err()).toMatch(/^\S+ DEBUG loaded json input\n$/);
  });

  it('prints a snapshot frame', async () => {
    const { run, captured } = treelens('--snapshot', '--no-color', '--width', '60', '--height', '8');
    expect(await run).toBe(0);
    const lines = captured.out().split('\n');
    expect(lines.slice(0, 4)).toEqual(['_  1/2 rows', 'KEY    VALUE', 'name   demo', 'items  [2 items]']);
    expect(lines).toHaveLength(9);
  });

  it('applies startup keys before the snapshot', async () => {
    const { run, captured } = treelens('--snapshot', '--width', '60', '--height', '8', '--press', '_.items<CR>');
    expect(await run).toBe(0);
    expect(captured.out().split('\n')[0]).toBe('_.items  1/2 rows');
  });

  it('rejects an unparseable input file', async () => {
    fs.writeFileSync(dataFile, '{ nope');
    const { run, captured } = treelens('--output', 'json');
    expect(await run).toBe(1);
    expect(captured.err().startsWith(`treelens: ${dataFile}:1:`)).toBe(true);
  });

  it('rejects a missing settings file', async () => {
    const missing = path.join(dir, 'none.json');
    const captured = capture();
    const code = await main(['node', 'treelens', dataFile, '--config', missing, '--output', 'json'], captured.io);
    expect(code).toBe(1);
    expect(captured.err()).toBe(`treelens: ${missing}: file not found\n`);
  });

  it('rejects an invalid option value', async () => {
    const { run, captured } = treelens('--output', 'yaml');
    expect(await run).toBe(1);
    expect(captured.err()).toMatch(/option '-o, --output <format>' argument 'yaml' is invalid/);
  });

  it('prints the version', async () => {
    const { run, captured } = treelens('--version');
    expect(await run).toBe(0);
    expect(captured.out()).toBe('0.1.0\n');
  });
});
