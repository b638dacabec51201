/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ChildProcess } from 'child_process';
import { Writable } from 'stream';
import { describe, it, expect, vi } from 'vitest';
import { clipboardCommand, createSideEffectRunner } from './side-effects';

describe('clipboardCommand', () => {
  it('uses the platform tool on macOS and Windows', () => {
    const none = () => false;
    expect(clipboardCommand('darwin', none)).toEqual({ ok: true, command: { command: 'pbcopy', args: [] } });
    expect(clipboardCommand('win32', none)).toEqual({ ok: true, command: { command: 'clip', args: [] } });
  });

  it('takes the first available tool on Linux', () => {
    expect(clipboardCommand('linux', (c) => c === 'xsel' || c === 'wl-copy')).toEqual({
      ok: true,
      command: { command: 'xsel', args: ['--clipboard', '--input'] },
    });
    expect(clipboardCommand('linux', (c) => c === 'xclip')).toEqual({
      ok: true,
      command: { command: 'xclip', args: ['-selection', 'clipboard'] },
    });
  });

  it('reports a missing tool', () => {
    expect(clipboardCommand('linux', () => false)).toEqual({
      ok: false,
      error: 'no clipboard command found (install xclip, xsel or wl-clipboard)',
    });
    expect(clipboardCommand('aix', () => true)).toEqual({ ok: false, error: 'unsupported platform: aix' });
  });
});

describe('createSideEffectRunner', () => {
  it('opens URLs through the injected opener', async () => {
    const openUrl = vi.fn(() => Promise.resolve());
    const run = createSideEffectRunner({ openUrl });
    await run({ type: 'open-url', label: 'Open page', url: 'https://example.test/' });
    expect(openUrl).toHaveBeenCalledWith('https://example.test/');
  });

  function fakeTool(write: (chunk: string) => Error | null, exitCode: number): { child: ChildProcess; received: string[] } {
    const child = new ChildProcess();
    const received: string[] = [];
    child.stdin = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        received.push(chunk.toString());
        callback(write(chunk.toString()));
      },
      final(callback) {
        callback();
        setImmediate(() => child.emit('close', exitCode));
      },
    });
    return { child, received };
  }

  it('pipes the value to the clipboard tool', async () => {
    const { child, received } = fakeTool(() => null, 0);
    const spawn = vi.fn(() => child);
    const run = createSideEffectRunner({ platform: 'darwin', spawn });
    await run({ type: 'copy-value', label: 'Copy', value: 'test-value' });
    expect(spawn).toHaveBeenCalledWith('pbcopy', []);
    expect(received).toEqual(['test-value']);
  });

  it('rejects when the tool exits before reading the value', async () => {
    const { child } = fakeTool(() => new Error('write EPIPE'), 0);
    setTimeout(() => child.emit('close', 0), 5);
    const run = createSideEffectRunner({ platform: 'darwin', spawn: () => child });
    await expect(run({ type: 'copy-value', label: 'Copy', value: 'x'.repeat(1024) })).rejects.toThrow('write EPIPE');
  });

  it('rejects when the tool fails', async () => {
    const { child } = fakeTool(() => null, 1);
    const run = createSideEffectRunner({ platform: 'darwin', spawn: () => child });
    await expect(run({ type: 'copy-value', label: 'Copy', value: 'x' })).rejects.toThrow('pbcopy exited with code 1');
  });

  it('rejects a copy without a clipboard tool', async () => {
    const run = createSideEffectRunner({ platform: 'linux', available: () => false });
    await expect(run({ type: 'copy-value', label: 'Copy', value: 'x' })).rejects.toThrow(
      'no clipboard command found (install xclip, xsel or wl-clipboard)'
    );
  });
});
