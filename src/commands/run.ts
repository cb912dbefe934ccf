import type { DisplayConfig, RunPlan } from '../types/index.js';
import type { PomodoroMinutes } from '../services/duration.js';
import { isTerminalError, isValidationError } from '../services/errors.js';
import { resolveRunPlan } from '../services/options.js';
import { clockCommand } from './clock.js';
import { pomodoroCommand } from './pomodoro.js';
import { stopwatchCommand } from './stopwatch.js';
import { timerCommand } from './timer.js';

export interface ModeRunners {
  clock(config: DisplayConfig): Promise<void>;
  stopwatch(config: DisplayConfig): Promise<void>;
  timer(config: DisplayConfig, totalSeconds: number): Promise<void>;
  pomodoro(config: DisplayConfig, minutes: PomodoroMinutes): Promise<void>;
}

export const defaultRunners: ModeRunners = {
  clock: clockCommand,
  stopwatch: stopwatchCommand,
  timer: timerCommand,
  pomodoro: pomodoroCommand,
};

function dispatch(plan: RunPlan, runners: ModeRunners): Promise<void> {
  const { mode, config } = plan;
  switch (mode.kind) {
    case 'clock':
      return runners.clock(config);
    case 'stopwatch':
      return runners.stopwatch(config);
    case 'timer':
      return runners.timer(config, mode.totalSeconds);
    case 'pomodoro':
      return runners.pomodoro(config, {
        workMinutes: mode.workMinutes,
        breakMinutes: mode.breakMinutes,
      });
  }
}

function reportError(message: string): void {
  console.error(`\x1b[31mx ${message}\x1b[0m`);
}

/**
 * Validates the raw options, runs the selected mode and returns the process
 * exit code. Interrupting a mode is a normal exit.
 */
export async function runCli(rawOptions: unknown, runners: ModeRunners = defaultRunners): Promise<number> {
  try {
    // Throws before any mode starts, so a bad flag never touches the terminal
    const plan = resolveRunPlan(rawOptions);
    await dispatch(plan, runners);
    return 0;
  } catch (error) {
    if (isValidationError(error) || isTerminalError(error)) {
      reportError(error.message);
    } else {
      reportError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}
