/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isEnabled, type LogLevel, type Logger } from './logger';

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private threshold: LogLevel;

  constructor(threshold: LogLevel = 'info') {
    this.context = undefined;
    this.threshold = threshold;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.threshold);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  private emit(
    level: LogLevel,
    sink: (...data: unknown[]) => void,
    message: string,
    attributes: unknown[]
  ): void {
    if (!isEnabled(level, this.threshold)) return;
    if (this.context) sink(`[${this.context}]`, message, ...attributes);
    else sink(message, ...attributes);
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.emit('trace', console.debug, message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.emit('debug', console.debug, message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.emit('info', console.info, message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.emit('warn', console.warn, message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.emit('error', console.error, message, attributes);
  }
}
