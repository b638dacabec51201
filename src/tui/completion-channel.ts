/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  One-shot completion signal from a background operation to the status view.
  Capacity one: the first send wins, later sends are refused without blocking.
*/

import { errorMessage } from '../common/validation';

export interface CompletionResult {
  /** Success text shown in the status view. */
  message?: string;
  /** Set when the operation failed. */
  error?: Error | string;
}

export function completionErrorText(result: CompletionResult): string | undefined {
  if (result.error === undefined) return undefined;
  const text = typeof result.error === 'string' ? result.error : errorMessage(result.error);
  return text || 'failed';
}

export class CompletionChannel {
  private result: CompletionResult | undefined;
  private consumed = false;
  private deliver: ((result: CompletionResult) => void) | undefined;

  /** Channel that completes when the promise settles. */
  static fromPromise(operation: Promise<string | void>): CompletionChannel {
    const channel = new CompletionChannel();
    void operation.then(
      (message) => channel.send(typeof message === 'string' && message !== '' ? { message } : {}),
      (e: unknown) => channel.send({ error: e instanceof Error ? e : String(e) })
    );
    return channel;
  }

  /** Never blocks; false when a result was already sent. */
  send(result: CompletionResult): boolean {
    if (this.result !== undefined) return false;
    this.result = result;
    if (this.deliver) {
      this.deliver(result);
      this.deliver = undefined;
    }
    return true;
  }

  get isSent(): boolean {
    return this.result !== undefined;
  }

  /** Resolves with the single result. May be called once. */
  receive(): Promise<CompletionResult> {
    if (this.consumed) return Promise.reject(new Error('completion channel already consumed'));
    this.consumed = true;
    if (this.result !== undefined) return Promise.resolve(this.result);
    return new Promise((resolve) => {
      this.deliver = resolve;
    });
  }
}
