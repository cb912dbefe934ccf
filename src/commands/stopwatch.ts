import type { DisplayConfig, SessionResult } from '../types/index.js';
import { createStopwatchEngine } from '../services/timer.js';
import { stopwatchFrame } from '../ui/frame.js';
import { STOPWATCH_CADENCE_MS, runSession } from '../ui/session.js';
import { withModeContext, type ModeContext } from './context.js';

export async function runStopwatch(context: ModeContext): Promise<SessionResult> {
  context.surface.clearScreen();
  return runSession(context, {
    engine: createStopwatchEngine(context.now()),
    cadenceMs: STOPWATCH_CADENCE_MS,
    renderFrame: (result, width) => stopwatchFrame(result, { config: context.config, width }),
  });
}

export async function stopwatchCommand(config: DisplayConfig): Promise<void> {
  await withModeContext(config, { keyboard: true }, runStopwatch);
}
