/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Host side effects requested by the views: clipboard copy and opening a URL.
*/

import { spawn, spawnSync, type ChildProcess } from 'child_process';
import open from 'open';
import type { Logger } from '../common/logger';
import type { SideEffect } from '../views/custom-view';

export interface ClipboardCommand {
  command: string;
  args: string[];
}

export type ClipboardChoice = { ok: true; command: ClipboardCommand } | { ok: false; error: string };

const LINUX_CLIPBOARD: ClipboardCommand[] = [
  { command: 'xclip', args: ['-selection', 'clipboard'] },
  { command: 'xsel', args: ['--clipboard', '--input'] },
  { command: 'wl-copy', args: [] },
];

/** Clipboard writer for the platform; on Linux the first available tool. */
export function clipboardCommand(
  platform: NodeJS.Platform,
  available: (command: string) => boolean
): ClipboardChoice {
  switch (platform) {
    case 'darwin':
      return { ok: true, command: { command: 'pbcopy', args: [] } };
    case 'win32':
      return { ok: true, command: { command: 'clip', args: [] } };
    case 'linux': {
      const found = LINUX_CLIPBOARD.find((c) => available(c.command));
      return found
        ? { ok: true, command: found }
        : { ok: false, error: 'no clipboard command found (install xclip, xsel or wl-clipboard)' };
    }
    default:
      return { ok: false, error: `unsupported platform: ${platform}` };
  }
}

function onPath(command: string): boolean {
  return spawnSync('which', [command], { stdio: 'ignore' }).status === 0;
}

const CLIPBOARD_TIMEOUT_MS = 2000;

export type SpawnClipboard = (command: string, args: string[]) => ChildProcess;

function spawnClipboard(command: string, args: string[]): ChildProcess {
  return spawn(command, args, { stdio: ['pipe', 'ignore', 'ignore'], timeout: CLIPBOARD_TIMEOUT_MS });
}

/** Resolves once the tool exits cleanly after reading all of `text`. */
function pipeTo(cmd: ClipboardCommand, text: string, spawnTool: SpawnClipboard): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawnTool(cmd.command, cmd.args);
    const stdin = child.stdin;
    if (!stdin) {
      reject(new Error(`${cmd.command}: no input stream`));
      return;
    }
    // a tool that exits before reading everything fails the write with EPIPE
    let writeError: Error | undefined;
    stdin.on('error', (e) => {
      writeError = e;
      reject(e);
    });
    child.on('error', reject);
    child.on('close', (code) => {
      if (writeError) reject(writeError);
      else if (code === 0) resolve();
      else reject(new Error(`${cmd.command} exited with code ${code ?? 'null'}`));
    });
    stdin.end(text);
  });
}

export interface SideEffectRunnerOptions {
  platform?: NodeJS.Platform;
  available?: (command: string) => boolean;
  openUrl?: (url: string) => Promise<unknown>;
  spawn?: SpawnClipboard;
  logger?: Logger;
}

/** Runner for the event loop; rejects with the reason a side effect failed. */
export function createSideEffectRunner(options: SideEffectRunnerOptions = {}): (effect: SideEffect) => Promise<void> {
  const platform = options.platform ?? process.platform;
  const available = options.available ?? onPath;
  const openUrl = options.openUrl ?? ((url: string) => open(url));
  const spawnTool = options.spawn ?? spawnClipboard;

  return async (effect) => {
    options.logger?.debug(`side effect ${effect.type}`, effect.label);
    switch (effect.type) {
      case 'copy-value': {
        const choice = clipboardCommand(platform, available);
        if (!choice.ok) throw new Error(choice.error);
        await pipeTo(choice.command, effect.value, spawnTool);
        return;
      }
      case 'open-url':
        await openUrl(effect.url);
        return;
    }
  };
}
