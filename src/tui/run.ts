/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { ViewCommand } from '../views/custom-view';
import { Explorer, type ExplorerOptions } from './explorer';
import { EventLoop, type EffectRunner } from './event-loop';
import { createSideEffectRunner } from './side-effects';
import { Terminal } from './terminal';

export interface RunExplorerOptions extends Omit<ExplorerOptions, 'width' | 'height'> {
  terminal?: Terminal;
  /** Key names dispatched once the first frame is drawn. */
  startupKeys?: string[];
  runEffect?: EffectRunner;
}

/**
 * Interactive session on the terminal. Resolves with the path shown when
 * the user quits.
 */
export async function runExplorer(options: RunExplorerOptions): Promise<string> {
  const terminal = options.terminal ?? new Terminal();
  const explorer = new Explorer({ ...options, width: terminal.width, height: terminal.height });
  const loop = new EventLoop(explorer, {
    runEffect: options.runEffect ?? createSideEffectRunner({ logger: options.logger }),
    logger: options.logger,
  });

  loop.on('update', () => terminal.draw(explorer.render()));
  terminal.start({
    onKey: (key) => loop.dispatch({ type: 'key', key }),
    onResize: (width, height) => loop.dispatch({ type: 'resize', width, height }),
  });
  try {
    const finished = loop.start(explorer.init());
    for (const key of options.startupKeys ?? []) loop.dispatch({ type: 'key', key });
    await finished;
  } finally {
    terminal.stop();
  }
  return explorer.path;
}

/** Runs the navigation a command asks for; timers and effects need a live loop. */
function follow(explorer: Explorer, command: ViewCommand | undefined): void {
  if (command?.kind === 'navigate') follow(explorer, explorer.navigate(command.path));
  else if (command?.kind === 'batch') command.commands.forEach((c) => follow(explorer, c));
}

/** One frame after applying the keys, for --snapshot. */
export function renderSnapshot(options: ExplorerOptions, keys: string[] = []): string {
  const explorer = new Explorer(options);
  for (const key of keys) follow(explorer, explorer.update({ type: 'key', key }));
  return explorer.render();
}
