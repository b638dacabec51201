/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Root model of the terminal explorer. Owns the expression bar with its
  completion cycle, the current node and the active view, and composes
  the frame: title, content, bar, info line and footer.
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import {
  ROOT,
  buildChildPath,
  displayForm,
  isCompletePath,
  isPathExpression,
  normalizedForm,
  stripLastSegment,
} from '../common/path-utils';
import { errorMessage } from '../common/validation';
import type { CatalogFunction } from '../completion/catalog';
import {
  EMPTY_COMPLETION,
  acceptByCursorMove,
  isCycling,
  selectedSuggestion,
  shiftTab,
  tab,
  type CompletionContext,
  type CompletionState,
} from '../completion/cycle';
import { splitInput, suggest, summarizeFunctions } from '../completion/suggestions';
import { navigate } from '../data/navigate';
import { strings } from '../strings';
import {
  QUIT,
  resolveActiveView,
  type CustomView,
  type Flash,
  type Position,
  type ViewCommand,
  type ViewEvent,
  type ViewMode,
  type ViewStates,
} from '../views/custom-view';
import type { DisplaySchema } from '../views/display-schema';
import { KEY_MODES, formatKeyLabel, keyFor, quitKey, resolveAction, type KeyMode, type LogicalAction } from '../views/keybindings';
import { KeyValueTable } from '../views/key-value-table';
import { fitLine, nextCharIndex, padRight, prevCharIndex } from '../views/text';
import { PLAIN_THEME, type Theme } from '../views/theme';
import { selectView } from '../views/view-mode';
import type { CompletionChannel } from './completion-channel';
import type { LoopModel } from './event-loop';

/** Evaluates a complete expression that is not a plain path. May throw. */
export interface Evaluator {
  evaluate(expression: string, root: unknown): unknown;
}

export type Focus = 'input' | 'browse' | 'search';

export interface ExplorerOptions {
  root: unknown;
  catalog: CatalogFunction[];
  schema?: DisplaySchema;
  keyMode?: KeyMode;
  theme?: Theme;
  channel?: CompletionChannel;
  evaluator?: Evaluator;
  /** Initial path; falls back to the root when it does not resolve. */
  path?: string;
  width?: number;
  height?: number;
  logger?: Logger;
}

const HELP_ACTIONS: LogicalAction[] = ['up', 'down', 'back', 'forward', 'top', 'bottom', 'search', 'help', 'quit'];

/** Rows outside the content area: title, bar, info line and footer. */
const CHROME_ROWS = 4;

export class Explorer implements LoopModel {
  private root: unknown;
  private catalog: CatalogFunction[];
  private schema: DisplaySchema | undefined;
  private keyMode: KeyMode;
  private theme: Theme;
  private channel: CompletionChannel | undefined;
  private evaluator: Evaluator | undefined;
  private logger: Logger;

  private width: number;
  private height: number;

  private _path = ROOT;
  private node: unknown;
  /** Set while an evaluated expression is shown instead of the node at the path. */
  private expression: string | undefined;
  private mode: ViewMode = 'none';
  private views: ViewStates = {};
  private table: KeyValueTable;

  private _input = '';
  private _cursor = 0;
  private completion: CompletionState = EMPTY_COMPLETION;
  private _focus: Focus = 'input';
  private searchQuery = '';
  private showHelp = false;
  private barFlash: Flash | undefined;

  constructor(options: ExplorerOptions) {
    this.root = options.root;
    this.catalog = options.catalog;
    this.schema = options.schema;
    this.keyMode = options.keyMode ?? 'vim';
    this.theme = options.theme ?? PLAIN_THEME;
    this.channel = options.channel;
    this.evaluator = options.evaluator;
    this.width = options.width ?? 80;
    this.height = options.height ?? 24;
    if (options.logger) this.logger = options.logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('explorer');

    this.node = this.root;
    this.table = new KeyValueTable(this.root);
    const start = options.path ? navigate(this.root, options.path) : undefined;
    if (start && !start.ok) this.logger.warn(`start path ${options.path ?? ''}: ${start.error}`);
    if (start?.ok) this.show(start.path, start.node, 'none');
    else this.show(ROOT, this.root, 'none');
  }

  get path(): string {
    return this._path;
  }

  get input(): string {
    return this._input;
  }

  get cursor(): number {
    return this._cursor;
  }

  get focus(): Focus {
    return this._focus;
  }

  get viewMode(): ViewMode {
    return this.mode;
  }

  get currentNode(): unknown {
    return this.node;
  }

  activeView(): CustomView | undefined {
    return resolveActiveView(this.mode, this.views);
  }

  /** Startup command of the first view. */
  init(): ViewCommand | undefined {
    return this.activeView()?.init();
  }

  private completionContext(): CompletionContext {
    return {
      catalog: this.catalog,
      resolve: (path) => {
        const result = navigate(this.root, path);
        return result.ok ? result.node : undefined;
      },
    };
  }

  /** `previous` is the mode the node is reached from; detail only follows a list. */
  private show(path: string, node: unknown, previous: ViewMode): ViewCommand | undefined {
    this._path = path;
    this.node = node;
    this.table = new KeyValueTable(node);
    const selection = selectView({
      node,
      path,
      schema: this.schema,
      previous,
      keyMode: this.keyMode,
      channel: this.channel,
      current: this.views,
    });
    const reused = selection.mode === 'status' && selection.states.status === this.views.status;
    this.mode = selection.mode;
    this.views = selection.states;
    if (this.mode !== 'none' && this._focus === 'input' && this._input === '') this._focus = 'browse';
    if (this.mode === 'none' && this._focus === 'search') this._focus = 'browse';
    this.logger.debug(`show ${path} as ${this.mode}`);
    return reused ? undefined : this.activeView()?.init();
  }

  /** Go to a path; a failure leaves the current node and flashes the reason. */
  navigate(path: string): ViewCommand | undefined {
    return this.go(path, this.mode);
  }

  private go(path: string, previous: ViewMode): ViewCommand | undefined {
    const result = navigate(this.root, path);
    if (!result.ok) {
      this.logger.debug(`navigate ${path}: ${result.error} at ${result.at}`);
      this.barFlash = { message: strings.flashError(result.error), isError: true };
      return undefined;
    }
    this.expression = undefined;
    return this.show(result.path, result.node, previous);
  }

  private goBack(): ViewCommand | undefined {
    if (this.expression !== undefined) {
      this.expression = undefined;
      return this.go(this._path, 'none');
    }
    if (this._path === ROOT) return undefined;
    return this.go(stripLastSegment(this._path), 'none');
  }

  private submit(): ViewCommand | undefined {
    const text = this._input.trim();
    if (text === '') {
      const view = this.activeView();
      return view ? view.update({ type: 'key', key: 'enter', action: 'enter' }).command : this.openSelected();
    }
    // a trailing separator, open bracket or open quote waits for more input
    if (!isCompletePath(text)) return undefined;
    if (isPathExpression(text)) {
      const typed = this._input;
      this.setInput('');
      const command = this.navigate(normalizedForm(text));
      if (this.barFlash !== undefined) this.setInput(typed);
      return command;
    }
    if (!this.evaluator) {
      this.barFlash = { message: strings.flashNoEvaluator, isError: true };
      return undefined;
    }
    try {
      const value = this.evaluator.evaluate(text, this.root);
      this.logger.debug(`evaluated ${text}`);
      this.expression = text;
      this.setInput('');
      return this.show(this._path, value, 'none');
    } catch (e) {
      this.barFlash = { message: strings.flashError(errorMessage(e)), isError: true };
      return undefined;
    }
  }

  private openSelected(): ViewCommand | undefined {
    const row = this.table.selectedRow();
    if (!row || this.expression !== undefined) return undefined;
    return this.navigate(buildChildPath(this._path, row.key));
  }

  private setInput(value: string, cursor = value.length): void {
    this._input = value;
    this._cursor = Math.max(0, Math.min(cursor, value.length));
  }

  update(event: ViewEvent): ViewCommand | undefined {
    switch (event.type) {
      case 'key':
        return this.handleKey(event.key);
      case 'resize':
        this.width = event.width;
        this.height = event.height;
        return this.activeView()?.update(event).command;
      default:
        return this.activeView()?.update(event).command;
    }
  }

  private handleKey(key: string): ViewCommand | undefined {
    const view = this.activeView();
    if (view?.kind === 'status') {
      return view.update({ type: 'key', key, action: resolveAction(key, this.keyMode) }).command;
    }
    this.barFlash = undefined;
    if (key === 'ctrl+c') return QUIT;
    if (this.showHelp) {
      this.showHelp = false;
      return undefined;
    }
    switch (this._focus) {
      case 'search':
        return this.handleSearchKey(key, view);
      case 'input':
        return this.handleInputKey(key, view);
      case 'browse':
        return this.handleBrowseKey(key, view);
    }
  }

  private handleInputKey(key: string, view: CustomView | undefined): ViewCommand | undefined {
    const ctx = this.completionContext();
    switch (key) {
      case 'tab': {
        const result = tab(this.completion, this._input, ctx);
        this.completion = result.state;
        this.setInput(result.input);
        return undefined;
      }
      case 'shift+tab': {
        const result = shiftTab(this.completion, this._input, ctx);
        this.completion = result.state;
        this.setInput(result.input);
        return undefined;
      }
      case 'right':
        if (this._cursor < this._input.length) this._cursor = nextCharIndex(this._input, this._cursor);
        else this.accept();
        return undefined;
      case 'end':
        this.accept();
        return undefined;
      case 'left':
        this._cursor = prevCharIndex(this._input, this._cursor);
        return undefined;
      case 'home':
        this._cursor = 0;
        return undefined;
      case 'backspace':
        if (this._input === '') return this.goBack();
        if (this._cursor > 0) {
          const start = prevCharIndex(this._input, this._cursor);
          this.setInput(this._input.slice(0, start) + this._input.slice(this._cursor), start);
        }
        return undefined;
      case 'delete':
        this.setInput(this._input.slice(0, this._cursor) + this._input.slice(nextCharIndex(this._input, this._cursor)), this._cursor);
        return undefined;
      case 'enter':
        return this.submit();
      case 'esc':
        if (this._input !== '') this.setInput('');
        else this._focus = 'browse';
        return undefined;
      case 'up':
      case 'down':
      case 'pageup':
      case 'pagedown':
        return this.moveSelection(key === 'up' || key === 'pageup' ? 'up' : 'down', view);
      case 'f1':
        this.showHelp = true;
        return undefined;
      default: {
        const ch = key === 'space' ? ' ' : key;
        if ([...ch].length !== 1) return undefined;
        this.setInput(this._input.slice(0, this._cursor) + ch + this._input.slice(this._cursor), this._cursor + ch.length);
        return undefined;
      }
    }
  }

  private accept(): void {
    const accepted = acceptByCursorMove(this._input);
    this.completion = EMPTY_COMPLETION;
    this.setInput(accepted.input, accepted.cursor);
  }

  private moveSelection(action: LogicalAction, view: CustomView | undefined): ViewCommand | undefined {
    if (view) return view.update({ type: 'key', key: action, action }).command;
    this.table.move(action);
    return undefined;
  }

  private handleBrowseKey(key: string, view: CustomView | undefined): ViewCommand | undefined {
    if (key === 'tab' || key === ':' || (key === 'i' && this.keyMode === 'vim')) {
      this._focus = 'input';
      return undefined;
    }
    const action = resolveAction(key, this.keyMode);
    switch (action) {
      case 'quit':
        return QUIT;
      case 'help':
        this.showHelp = true;
        return undefined;
      case 'back':
        return this.goBack();
      case 'search':
        if (view?.handlesSearch()) {
          this._focus = 'search';
          this.searchQuery = '';
        }
        return undefined;
      default:
        break;
    }
    if (!action && (key === 'esc' || key === 'backspace')) return this.goBack();
    if (view) return view.update({ type: 'key', key, action }).command;
    if (action === 'forward' || action === 'enter') return this.openSelected();
    if (action) this.table.move(action);
    return undefined;
  }

  private handleSearchKey(key: string, view: CustomView | undefined): ViewCommand | undefined {
    if (!view) {
      this._focus = 'browse';
      return undefined;
    }
    switch (key) {
      case 'enter':
        this._focus = 'browse';
        return view.update({ type: 'search', query: this.searchQuery, committed: true }).command;
      case 'esc':
        this._focus = 'browse';
        this.searchQuery = '';
        return view.update({ type: 'search', query: '', committed: false }).command;
      case 'backspace':
        this.searchQuery = [...this.searchQuery].slice(0, -1).join('');
        return view.update({ type: 'search', query: this.searchQuery, committed: false }).command;
      default: {
        const ch = key === 'space' ? ' ' : key;
        if ([...ch].length !== 1) return undefined;
        this.searchQuery += ch;
        return view.update({ type: 'search', query: this.searchQuery, committed: false }).command;
      }
    }
  }

  position(): Position {
    return this.activeView()?.position() ?? this.table.position();
  }

  private title(view: CustomView | undefined): string {
    if (this.expression !== undefined) return this.expression;
    return view ? view.title() : displayForm(this._path);
  }

  private titleLine(view: CustomView | undefined): string {
    const pos = this.position();
    const counter = pos.count > 0 ? `${pos.selected}/${pos.count} ${pos.label}` : '';
    const title = this.theme.title(this.title(view));
    return counter ? `${title}  ${this.theme.muted(counter)}` : title;
  }

  private barLine(view: CustomView | undefined): string {
    if (this._focus === 'search' && view) {
      return `${this.theme.accent(view.searchTitle() + ': ')}${this.searchQuery}`;
    }
    const prompt = this.theme.accent(strings.barPrompt);
    if (this._focus !== 'input') return prompt + this.theme.muted(this._input);
    const before = this._input.slice(0, this._cursor);
    const next = nextCharIndex(this._input, this._cursor);
    const at = this._input.slice(this._cursor, next);
    const after = this._input.slice(next);
    return prompt + before + this.theme.selected(at || ' ') + after;
  }

  /** Completion candidates while cycling, otherwise the functions that fit the input. */
  private hintLine(): string {
    if (this._focus !== 'input') return '';
    if (isCycling(this.completion, this._input)) {
      const current = selectedSuggestion(this.completion);
      return this.completion.candidates
        .map((s) => (s === current ? this.theme.selected(s.label) : this.theme.muted(s.label)))
        .join(' ');
    }
    if (this._input.trim() === '') return '';
    const focus = this.completionContext().resolve(normalizedForm(splitInput(this._input).base));
    return this.theme.muted(summarizeFunctions(suggest(this._input, focus, this.catalog)));
  }

  private infoLine(view: CustomView | undefined): string {
    const flash = this.barFlash ?? view?.flash();
    if (flash) return flash.isError ? this.theme.error(flash.message) : this.theme.success(flash.message);
    return this.hintLine();
  }

  private footer(view: CustomView | undefined): string {
    if (view) return view.footer(this.keyMode);
    const parts: string[] = [];
    if (this._focus === 'input') parts.push(`Tab ${strings.footerComplete}`);
    parts.push(`${formatKeyLabel('enter')} ${strings.footerOpen}`);
    const back = keyFor('back', this.keyMode);
    if (back && this._focus !== 'input') parts.push(`${formatKeyLabel(back)} ${strings.footerBack}`);
    parts.push(`${formatKeyLabel('f1')} ${strings.footerHelp}`);
    const quit = this._focus === 'input' ? 'ctrl+c' : quitKey(this.keyMode);
    parts.push(`${formatKeyLabel(quit)} ${strings.footerQuit}`);
    return parts.join('  ');
  }

  private helpLines(): string[] {
    const lines = [this.theme.title(strings.helpTitle), ''];
    for (const line of strings.helpLines) lines.push('  ' + line);
    lines.push('');
    for (const action of HELP_ACTIONS) {
      const key = keyFor(action, this.keyMode);
      if (key) lines.push('  ' + padRight(formatKeyLabel(key), 18) + action);
    }
    lines.push('', '  ' + this.theme.muted(`key mode: ${this.keyMode} (${KEY_MODES.join(', ')})`));
    return lines;
  }

  render(): string {
    const view = this.activeView();
    const contentHeight = Math.max(1, this.height - (view?.kind === 'status' ? CHROME_ROWS - 1 : CHROME_ROWS));
    let content: string[];
    if (this.showHelp) content = this.helpLines().slice(0, contentHeight);
    else if (view) content = view.render(this.width, contentHeight, this.theme).split('\n');
    else content = this.table.render(this.width, contentHeight, this.theme, this._focus === 'browse').split('\n');
    while (content.length < contentHeight) content.push('');

    const lines = [this.titleLine(view), ...content];
    if (view?.kind !== 'status') lines.push(this.barLine(view));
    lines.push(this.infoLine(view), this.theme.muted(this.footer(view)));
    return lines.map((l) => fitLine(l, this.width)).join('\n');
  }
}
