/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  UI text for the terminal explorer.

  Naming: prefix by usage (app*, status*, flash*, list*, detail*, footer*, error*). Group by usage.
  Text only; callers compose separators.
*/

export const strings = {
  // App
  appName: 'treelens',
  appDescription: 'Explore nested JSON, NDJSON and XML data in the terminal',
  appDefaultTitle: 'data',

  // Expression bar
  barPrompt: '› ',

  // Status view
  statusDefaultTitle: 'Status',
  statusDone: 'Done',
  statusPressAnyKey: 'Press any key to exit',
  statusPositionLabel: 'status',

  // Flash messages
  flashCopied: '✓ Copied to clipboard',
  flashOpened: '✓ Opened in browser',
  flashFieldMissing: (label: string, field: string) => `⚠ ${label}: field "${field}" not found`,
  flashActionFailed: (label: string, error: string) => `⚠ ${label}: ${error}`,
  flashError: (error: string) => `⚠ ${error}`,
  flashNoEvaluator: '⚠ expressions need an evaluator',

  // List view
  listItemCount: (n: number) => (n === 1 ? '1 item' : `${n} items`),
  listFiltered: (shown: number, total: number) => `${shown} of ${total} items`,
  listEmpty: '(empty)',
  listNoMatches: '(no matches)',
  listPositionLabel: 'items',
  listSearchTitle: 'Filter',

  // Detail view
  detailOtherSection: 'Other',
  detailPositionLabel: 'detail',

  // Default table
  tableKey: 'KEY',
  tableValue: 'VALUE',
  tablePositionLabel: 'rows',
  tableEmpty: '(empty)',

  // Footer
  footerQuit: 'quit',
  footerBack: 'back',
  footerOpen: 'open',
  footerSearch: 'search',
  footerHelp: 'help',
  footerComplete: 'complete',

  // Help
  helpTitle: 'Keys',
  helpLines: [
    'Tab / Shift+Tab   cycle completions',
    '→ / End           accept and move to end of input',
    'Enter             go to path or evaluate expression',
    'Esc               clear input',
    'Backspace         delete / go to parent on empty input',
  ],

  // Errors
  errorLoad: (where: string, message: string) => `${where}: ${message}`,
  errorNoInput: 'no input: pass a file or pipe data on stdin',
  errorNotTerminal: 'interactive mode needs a terminal; use --output',
  errorInvalidOption: (name: string, value: string) => `invalid ${name}: ${value}`,
} as const;
