import type { DisplayConfig, SessionResult } from '../types/index.js';
import { createCountdownEngine } from '../services/timer.js';
import { countdownFrame, type CountdownStyle } from '../ui/frame.js';
import { COUNTDOWN_CADENCE_MS, runSession } from '../ui/session.js';
import { modeColors } from '../ui/theme.js';
import { withModeContext, type ModeContext } from './context.js';

export const COUNTDOWN_LABEL = 'Countdown Timer';

/**
 * Counts `totalSeconds` down to zero on the current screen. Shared by the
 * timer mode and every Pomodoro phase.
 */
export async function runCountdown(
  context: ModeContext,
  totalSeconds: number,
  style: CountdownStyle
): Promise<SessionResult> {
  return runSession(context, {
    engine: createCountdownEngine(totalSeconds),
    cadenceMs: COUNTDOWN_CADENCE_MS,
    renderFrame: (result, width) => countdownFrame(result, style, { config: context.config, width }),
  });
}

export async function runTimer(context: ModeContext, totalSeconds: number): Promise<SessionResult> {
  context.surface.clearScreen();
  const result = await runCountdown(context, totalSeconds, {
    label: COUNTDOWN_LABEL,
    color: modeColors.timer,
  });

  if (result.action === 'completed' && context.config.bellEnabled) {
    context.surface.ringBell();
  }
  return result;
}

export async function timerCommand(config: DisplayConfig, totalSeconds: number): Promise<void> {
  await withModeContext(config, { keyboard: true }, (context) => runTimer(context, totalSeconds));
}
