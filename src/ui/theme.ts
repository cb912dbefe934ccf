// ANSI palette for the clock display
import type { DisplayConfig } from '../types/index.js';

export const colors = {
  reset: '\x1b[0m',
  red: '\x1b[91m',
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  blue: '\x1b[94m',
  magenta: '\x1b[95m',
  cyan: '\x1b[96m',
  gray: '\x1b[90m',
  white: '\x1b[97m',
  black: '\x1b[30m',
} as const;

export type Color = (typeof colors)[keyof typeof colors];

// Per-mode defaults, before --white/--black overrides
export const modeColors = {
  clock: colors.cyan,
  stopwatch: colors.blue,
  timer: colors.yellow,
  work: colors.red,
  break: colors.green,
  label: colors.magenta,
  muted: colors.gray,
} as const;

/**
 * Returns the color to draw with, honouring a forced white or black
 * override from the display config.
 */
export function resolveColor(config: DisplayConfig, defaultColor: Color): Color {
  switch (config.colorOverride) {
    case 'white':
      return colors.white;
    case 'black':
      return colors.black;
    case 'none':
      return defaultColor;
  }
}

export function paint(text: string, color: Color): string {
  return `${color}${text}${colors.reset}`;
}
