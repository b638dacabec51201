/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Raw-mode terminal adapter: keypresses in, frames out.
*/

import * as readline from 'readline';

/** Keypress details as emitted by readline. */
export interface Keypress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

const NAMED: Record<string, string> = {
  return: 'enter',
  enter: 'enter',
  escape: 'esc',
  backspace: 'backspace',
  delete: 'delete',
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  home: 'home',
  end: 'end',
  pageup: 'pageup',
  pagedown: 'pagedown',
  space: 'space',
};

/**
 * Key identifier used by the key bindings: 'enter', 'ctrl+c', 'alt+<',
 * 'shift+tab', 'f10', or the printable character itself.
 */
export function keyName(str: string | undefined, key: Keypress | undefined): string | undefined {
  const name = key?.name;
  if (name === 'tab') return key?.shift ? 'shift+tab' : 'tab';
  if (key?.ctrl && name) return `ctrl+${name}`;
  if (key?.meta) {
    const seq = key.sequence ?? '';
    const last = name ?? (seq.length > 1 ? seq.slice(-1) : undefined);
    return last && last !== 'escape' ? `alt+${last}` : 'esc';
  }
  if (name && /^f\d{1,2}$/.test(name)) return name;
  if (name && NAMED[name]) return NAMED[name];
  if (str !== undefined && [...str].length === 1 && str >= ' ') return str;
  return undefined;
}

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?25h\x1b[?1049l';
const HOME = '\x1b[H';
const CLEAR_LINE = '\x1b[K';
const CLEAR_BELOW = '\x1b[J';

export interface TerminalHandlers {
  onKey(key: string): void;
  onResize(width: number, height: number): void;
}

export class Terminal {
  private input: NodeJS.ReadStream;
  private output: NodeJS.WriteStream;
  private started = false;
  private keyListener: ((str: string | undefined, key: Keypress | undefined) => void) | undefined;
  private resizeListener: (() => void) | undefined;

  constructor(input: NodeJS.ReadStream = process.stdin, output: NodeJS.WriteStream = process.stdout) {
    this.input = input;
    this.output = output;
  }

  get isInteractive(): boolean {
    return Boolean(this.input.isTTY && this.output.isTTY);
  }

  get width(): number {
    return this.output.columns || 80;
  }

  get height(): number {
    return this.output.rows || 24;
  }

  start(handlers: TerminalHandlers): void {
    if (this.started) return;
    this.started = true;
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.keyListener = (str, key) => {
      const name = keyName(str, key);
      if (name !== undefined) handlers.onKey(name);
    };
    this.resizeListener = () => handlers.onResize(this.width, this.height);
    this.input.on('keypress', this.keyListener);
    this.output.on('resize', this.resizeListener);
    this.input.resume();
    this.output.write(ENTER_ALT_SCREEN);
  }

  draw(frame: string): void {
    const body = frame
      .split('\n')
      .map((line) => line + CLEAR_LINE)
      .join('\r\n');
    this.output.write(HOME + body + CLEAR_BELOW);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    if (this.keyListener) this.input.off('keypress', this.keyListener);
    if (this.resizeListener) this.output.off('resize', this.resizeListener);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
    this.output.write(LEAVE_ALT_SCREEN);
  }
}
