/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Line-oriented logger for --log-file and stderr. The terminal UI owns stdout,
  so diagnostics never go through console while the explorer is running.
*/

import { format } from 'util';
import { isEnabled, type LogLevel, type Logger } from './logger';

export interface LineSink {
  write(chunk: string): unknown;
}

export interface StreamLoggerOptions {
  threshold?: LogLevel;
  now?: () => Date;
}

export class StreamLogger implements Logger {
  private sink: LineSink;
  private threshold: LogLevel;
  private now: () => Date;
  private context: string | undefined;

  constructor(sink: LineSink, options: StreamLoggerOptions = {}) {
    this.sink = sink;
    this.threshold = options.threshold ?? 'info';
    this.now = options.now ?? (() => new Date());
    this.context = undefined;
  }

  /** Clones share the sink; only the context is per instance. */
  clone(): StreamLogger {
    return new StreamLogger(this.sink, { threshold: this.threshold, now: this.now });
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  private emit(level: LogLevel, message: string, attributes: unknown[]): void {
    if (!isEnabled(level, this.threshold)) return;
    const parts = [this.now().toISOString(), level.toUpperCase().padEnd(5)];
    if (this.context) parts.push(`[${this.context}]`);
    parts.push(attributes.length > 0 ? format(message, ...attributes) : message);
    this.sink.write(parts.join(' ') + '\n');
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.emit('trace', message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.emit('debug', message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.emit('info', message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.emit('warn', message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.emit('error', message, attributes);
  }
}
