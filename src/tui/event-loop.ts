/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Cooperative event loop. Events are processed one at a time through the
  model's update; timers, channel receipt and finished side effects
  re-enter the queue as events. Emits 'update' after the queue drains and
  'quit' once.
*/

import { EventEmitter } from 'events';
import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { errorMessage } from '../common/validation';
import type { SideEffect, ViewCommand, ViewEvent } from '../views/custom-view';

export type EffectRunner = (effect: SideEffect) => Promise<void>;

export interface LoopModel {
  update(event: ViewEvent): ViewCommand | undefined;
  navigate(path: string): ViewCommand | undefined;
}

export interface EventLoopOptions {
  runEffect?: EffectRunner;
  logger?: Logger;
}

export class EventLoop extends EventEmitter {
  private model: LoopModel;
  private runEffect: EffectRunner | undefined;
  private logger: Logger;
  private queue: ViewEvent[] = [];
  private timers = new Set<NodeJS.Timeout>();
  private draining = false;
  private stopped = false;
  private finished: Promise<void>;
  private resolveFinished: () => void = () => undefined;

  constructor(model: LoopModel, options: EventLoopOptions = {}) {
    super();
    this.model = model;
    this.runEffect = options.runEffect;
    if (options.logger) this.logger = options.logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('loop');
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  /** Runs the startup command; resolves when the loop quits. */
  start(command?: ViewCommand): Promise<void> {
    this.execute(command);
    if (!this.stopped) this.emit('update');
    return this.finished;
  }

  dispatch(event: ViewEvent): void {
    if (this.stopped) {
      this.logger.debug(`dropped ${event.type} after quit`);
      return;
    }
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        this.logger.trace(`event ${next.type}`);
        this.execute(this.model.update(next));
        if (this.stopped) break;
      }
    } finally {
      this.draining = false;
    }
    if (!this.stopped) this.emit('update');
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.queue.length = 0;
    this.logger.debug('quit');
    this.emit('quit');
    this.resolveFinished();
  }

  private execute(command: ViewCommand | undefined): void {
    if (!command || this.stopped) return;
    switch (command.kind) {
      case 'quit':
        this.stop();
        return;
      case 'schedule': {
        const timer = setTimeout(() => {
          this.timers.delete(timer);
          this.dispatch(command.event);
        }, command.delayMs);
        this.timers.add(timer);
        return;
      }
      case 'await-completion':
        void command.channel.receive().then(
          (result) => this.dispatch({ type: 'completion', result }),
          (e: unknown) => this.logger.error('completion channel failed', errorMessage(e))
        );
        return;
      case 'effect':
        this.effect(command.effect);
        return;
      case 'navigate':
        this.execute(this.model.navigate(command.path));
        return;
      case 'batch':
        for (const c of command.commands) this.execute(c);
        return;
    }
  }

  private effect(effect: SideEffect): void {
    const runEffect = this.runEffect;
    if (!runEffect) {
      this.dispatch({ type: 'effect-done', effect, error: 'not available' });
      return;
    }
    void runEffect(effect).then(
      () => this.dispatch({ type: 'effect-done', effect }),
      (e: unknown) => {
        this.logger.warn(`${effect.type} failed`, errorMessage(e));
        this.dispatch({ type: 'effect-done', effect, error: errorMessage(e) });
      }
    );
  }
}
