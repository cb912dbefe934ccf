import { CliOptionsSchema } from '../types/index.js';
import type { CliOptions, ClockMode, DisplayConfig, RunPlan } from '../types/index.js';
import { parseCountdownDuration, parsePomodoro } from './duration.js';
import { ValidationError } from './errors.js';

function resolveMode(options: CliOptions): ClockMode {
  if (options.pomodoro !== undefined) {
    return { kind: 'pomodoro', ...parsePomodoro(options.pomodoro) };
  }
  if (options.stopwatch) {
    return { kind: 'stopwatch' };
  }
  if (options.timer !== undefined) {
    return { kind: 'timer', totalSeconds: parseCountdownDuration(options.timer) };
  }
  return { kind: 'clock' };
}

function resolveDisplayConfig(options: CliOptions): DisplayConfig {
  return {
    focus: options.focus,
    bold: options.bold,
    colorOverride: options.white ? 'white' : options.black ? 'black' : 'none',
    bellEnabled: options.bell,
  };
}

/**
 * Turns raw option values (as collected by commander) into a validated
 * run plan. Throws ValidationError for anything the user has to fix.
 */
export function resolveRunPlan(rawOptions: unknown): RunPlan {
  const parsed = CliOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue ? issue.message : 'Invalid options');
  }

  return {
    mode: resolveMode(parsed.data),
    config: resolveDisplayConfig(parsed.data),
  };
}
