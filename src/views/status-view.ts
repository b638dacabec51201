/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Status view: tracks one background operation (waiting → success | error)
  with an optional deadline, action keys and short-lived flash messages.
*/

import { stringifyValue } from '../data/navigate';
import type { DataMap } from '../data/types';
import { strings } from '../strings';
import { completionErrorText, type CompletionChannel, type CompletionResult } from '../tui/completion-channel';
import {
  QUIT,
  batch,
  schedule,
  type CustomViewContract,
  type Flash,
  type Position,
  type SideEffect,
  type ViewCommand,
  type ViewEvent,
  type ViewUpdate,
} from './custom-view';
import { parseDuration, type DoneBehavior, type StatusAction, type StatusConfig } from './display-schema';
import { formatKeyLabel, quitKey, type KeyMode } from './keybindings';
import { fitLine, wrapText } from './text';
import type { Theme } from './theme';

export type StatusPhase = 'waiting' | 'success' | 'error';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
export const SPINNER_INTERVAL_MS = 100;
export const FLASH_DURATION_MS = 2000;
export const DEFAULT_DONE_DELAY_MS = 2000;

export interface StatusViewOptions {
  /** Node the view describes. */
  data: DataMap;
  config: StatusConfig;
  keyMode: KeyMode;
  /** Completion of the background operation; takes part alongside the deadline. */
  channel?: CompletionChannel;
}

export class StatusView implements CustomViewContract {
  readonly kind = 'status';

  private data: DataMap;
  private config: StatusConfig;
  private keyMode: KeyMode;
  private channel: CompletionChannel | undefined;
  private timeoutMs: number | undefined;
  private doneDelayMs: number;
  private doneBehavior: DoneBehavior;

  private _phase: StatusPhase = 'waiting';
  private _result = '';
  private spinnerFrame = 0;
  private flashText: string | undefined;
  private flashIsError = false;
  private flashGeneration = 0;

  constructor(options: StatusViewOptions) {
    this.data = options.data;
    this.config = options.config;
    this.keyMode = options.keyMode;
    this.channel = options.channel;
    this.timeoutMs = options.config.timeout ? parseDuration(options.config.timeout) : undefined;
    const delay = options.config.doneDelay ? parseDuration(options.config.doneDelay) : undefined;
    this.doneDelayMs = delay ?? DEFAULT_DONE_DELAY_MS;
    this.doneBehavior = options.config.doneBehavior ?? 'exit-after-delay';
  }

  get phase(): StatusPhase {
    return this._phase;
  }

  get resultMessage(): string {
    return this._result;
  }

  /** Current flash generation; a flash-clear with an older id is stale. */
  get generation(): number {
    return this.flashGeneration;
  }

  /** true when a completion channel or a deadline can end the waiting phase */
  get tracksCompletion(): boolean {
    return this.channel !== undefined || this.timeoutMs !== undefined;
  }

  private get isTerminal(): boolean {
    return this._phase !== 'waiting';
  }

  private field(name: string | undefined): string {
    return name ? stringifyValue(this.data[name]) : '';
  }

  title(): string {
    return this.field(this.config.titleField) || strings.statusDefaultTitle;
  }

  footer(mode: KeyMode): string {
    const parts: string[] = [];
    for (const action of this.config.actions ?? []) {
      const key = action.keys?.[mode];
      if (key) parts.push(`${formatKeyLabel(key)} ${action.label}`);
    }
    parts.push(`${formatKeyLabel(quitKey(mode))} ${strings.footerQuit}`);
    return parts.join('  ');
  }

  handlesSearch(): boolean {
    return false;
  }

  searchTitle(): string {
    return '';
  }

  init(): ViewCommand | undefined {
    if (this._phase !== 'waiting' || !this.tracksCompletion) return undefined;
    return batch(
      schedule(SPINNER_INTERVAL_MS, { type: 'tick' }),
      this.channel ? { kind: 'await-completion', channel: this.channel } : undefined,
      this.timeoutMs !== undefined ? schedule(this.timeoutMs, { type: 'timeout' }) : undefined
    );
  }

  flash(): Flash | undefined {
    return this.flashText !== undefined ? { message: this.flashText, isError: this.flashIsError } : undefined;
  }

  position(): Position {
    return { count: 1, selected: 1, label: strings.statusPositionLabel };
  }

  update(event: ViewEvent): ViewUpdate {
    return { view: this, command: this.handle(event) };
  }

  private handle(event: ViewEvent): ViewCommand | undefined {
    switch (event.type) {
      case 'key':
        return this.handleKey(event.key);
      case 'tick':
        if (this._phase !== 'waiting') return undefined;
        this.spinnerFrame = (this.spinnerFrame + 1) % SPINNER_FRAMES.length;
        return schedule(SPINNER_INTERVAL_MS, { type: 'tick' });
      case 'completion':
        return this.complete(event.result);
      case 'timeout':
        if (this._phase !== 'waiting') return undefined;
        return this.finish('success', this.config.successMessage || strings.statusDone);
      case 'done-timer':
        return QUIT;
      case 'flash-clear':
        if (event.id === this.flashGeneration) {
          this.flashText = undefined;
          this.flashIsError = false;
        }
        return undefined;
      case 'effect-done':
        return this.effectDone(event.effect, event.error);
      case 'resize':
      case 'search':
        return undefined;
    }
  }

  private complete(result: CompletionResult): ViewCommand | undefined {
    if (this._phase !== 'waiting') return undefined;
    const error = completionErrorText(result);
    if (error !== undefined) return this.finish('error', error);
    return this.finish('success', result.message || this.config.successMessage || strings.statusDone);
  }

  private finish(phase: StatusPhase, message: string): ViewCommand | undefined {
    this._phase = phase;
    this._result = message;
    if (this.doneBehavior === 'exit-after-delay') {
      return schedule(this.doneDelayMs, { type: 'done-timer' });
    }
    return undefined;
  }

  private handleKey(key: string): ViewCommand | undefined {
    if (key === 'ctrl+c' || key === 'esc') return QUIT;
    if (this.isTerminal && this.doneBehavior === 'wait-for-key') return QUIT;
    if (key === quitKey(this.keyMode)) return QUIT;
    const action = (this.config.actions ?? []).find((a) => a.keys?.[this.keyMode] === key);
    return action ? this.runAction(action) : undefined;
  }

  private runAction(action: StatusAction): ViewCommand | undefined {
    const value = this.field(action.field);
    if (value === '') {
      return this.setFlash(strings.flashFieldMissing(action.label, action.field), true);
    }
    const effect: SideEffect =
      action.type === 'copy-value'
        ? { type: 'copy-value', label: action.label, value }
        : { type: 'open-url', label: action.label, url: value };
    return { kind: 'effect', effect };
  }

  private effectDone(effect: SideEffect, error: string | undefined): ViewCommand {
    if (error !== undefined) return this.setFlash(strings.flashActionFailed(effect.label, error), true);
    return this.setFlash(effect.type === 'copy-value' ? strings.flashCopied : strings.flashOpened, false);
  }

  /** Every flash bumps the generation so only its own clear timer removes it. */
  private setFlash(message: string, isError: boolean): ViewCommand {
    this.flashGeneration++;
    this.flashText = message;
    this.flashIsError = isError;
    return schedule(FLASH_DURATION_MS, { type: 'flash-clear', id: this.flashGeneration });
  }

  private messages(): string[] {
    const name = this.config.messageField;
    if (!name) return [];
    const value = this.data[name];
    if (Array.isArray(value)) return value.map((v: unknown) => stringifyValue(v)).filter((s) => s !== '');
    const text = stringifyValue(value);
    return text ? [text] : [];
  }

  render(width: number, height: number, theme: Theme): string {
    const lines: string[] = [];
    for (const message of this.messages()) lines.push(...wrapText(message, width));

    const fields = (this.config.displayFields ?? [])
      .map((f) => ({ label: f.label, value: this.field(f.field) }))
      .filter((f) => f.value !== '');
    if (fields.length > 0) {
      if (lines.length > 0) lines.push('');
      for (const f of fields) lines.push(`${theme.muted(f.label + ':')} ${f.value}`);
    }

    if (this.tracksCompletion) {
      if (lines.length > 0) lines.push('');
      if (this._phase === 'waiting') {
        if (this.config.waitMessage) {
          lines.push(`${theme.accent(SPINNER_FRAMES[this.spinnerFrame])} ${this.config.waitMessage}`);
        }
      } else {
        lines.push(
          this._phase === 'success' ? theme.success('✓ ' + this._result) : theme.error('✗ ' + this._result)
        );
        if (this.doneBehavior === 'wait-for-key') {
          lines.push('', theme.muted(strings.statusPressAnyKey));
        }
      }
    }
    return lines
      .slice(0, Math.max(0, height))
      .map((line) => fitLine(line, width))
      .join('\n');
  }
}
