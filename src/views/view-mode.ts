/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isRecord } from '../data/navigate';
import type { CompletionChannel } from '../tui/completion-channel';
import type { ViewMode, ViewStates } from './custom-view';
import { DetailView } from './detail-view';
import type { DisplaySchema } from './display-schema';
import type { KeyMode } from './keybindings';
import { ListView, isObjectList } from './list-view';
import { StatusView } from './status-view';

export interface ViewSelection {
  mode: ViewMode;
  states: ViewStates;
}

export interface SelectViewOptions {
  node: unknown;
  path: string;
  schema: DisplaySchema | undefined;
  /** Mode before this navigation; detail only follows a list or detail. */
  previous: ViewMode;
  keyMode: KeyMode;
  channel?: CompletionChannel;
  /** Views of the previous selection; a status view is kept, not rebuilt. */
  current?: ViewStates;
}

const NONE: ViewSelection = { mode: 'none', states: {} };

/**
 * Picks the view for a node. Status wins as a top-level screen, detail
 * follows a drill-in from a list, list needs an array of objects; anything
 * else uses the default table.
 */
export function selectView(options: SelectViewOptions): ViewSelection {
  const { node, schema, previous } = options;
  if (!schema) return NONE;

  if (schema.status?.titleField && isRecord(node)) {
    const status =
      previous === 'status' && options.current?.status
        ? options.current.status
        : new StatusView({ data: node, config: schema.status, keyMode: options.keyMode, channel: options.channel });
    return { mode: 'status', states: { status } };
  }

  if ((previous === 'list' || previous === 'detail') && isRecord(node) && schema.detail) {
    return { mode: 'detail', states: { detail: new DetailView({ node, config: schema.detail }) } };
  }

  if (schema.list?.titleField && isObjectList(node)) {
    return {
      mode: 'list',
      states: { list: new ListView({ node, schema, config: schema.list, path: options.path }) },
    };
  }

  return NONE;
}
