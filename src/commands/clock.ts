import type { DisplayConfig, SessionResult } from '../types/index.js';
import { createClockEngine } from '../services/timer.js';
import { clockFrame } from '../ui/frame.js';
import { CLOCK_CADENCE_MS, runSession } from '../ui/session.js';
import { withModeContext, type ModeContext } from './context.js';

export async function runClock(context: ModeContext): Promise<SessionResult> {
  context.surface.clearScreen();
  return runSession(context, {
    engine: createClockEngine(),
    cadenceMs: CLOCK_CADENCE_MS,
    renderFrame: (result, width) => clockFrame(result, { config: context.config, width }),
  });
}

export async function clockCommand(config: DisplayConfig): Promise<void> {
  await withModeContext(config, { keyboard: false }, runClock);
}
