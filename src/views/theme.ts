/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Render theme. A value passed into every render call, never a global.
*/

import pc from 'picocolors';

type Paint = (text: string) => string;

export interface Theme {
  readonly colorEnabled: boolean;
  title: Paint;
  accent: Paint;
  muted: Paint;
  selected: Paint;
  success: Paint;
  error: Paint;
  warning: Paint;
  key: Paint;
  badge: Paint;
}

export function createTheme(colorEnabled: boolean): Theme {
  const c = pc.createColors(colorEnabled);
  return {
    colorEnabled,
    title: (s) => c.bold(c.cyan(s)),
    accent: (s) => c.cyan(s),
    muted: (s) => c.dim(s),
    selected: (s) => c.inverse(s),
    success: (s) => c.green(s),
    error: (s) => c.red(s),
    warning: (s) => c.yellow(s),
    key: (s) => c.bold(s),
    badge: (s) => c.magenta(s),
  };
}

/** Theme without escape sequences, for tests and --no-color. */
export const PLAIN_THEME: Theme = createTheme(false);
