import type { DisplayConfig, PomodoroSession, SessionResult } from '../types/index.js';
import type { PomodoroMinutes } from '../services/duration.js';
import {
  PHASE_TRANSITION_DELAY_MS,
  advancePomodoro,
  createPomodoroSession,
  getPhaseSeconds,
  getPomodoroLabel,
} from '../services/pomodoro.js';
import { modeColors } from '../ui/theme.js';
import { withModeContext, type ModeContext } from './context.js';
import { runCountdown } from './timer.js';

function phaseColor(session: PomodoroSession) {
  return session.phase === 'work' ? modeColors.work : modeColors.break;
}

/**
 * Alternates work and break countdowns until interrupted. Only an
 * interrupt ends the cycle, so the result is always 'interrupted'.
 */
export async function runPomodoro(context: ModeContext, minutes: PomodoroMinutes): Promise<SessionResult> {
  let session = createPomodoroSession();

  while (true) {
    context.surface.clearScreen();
    const result = await runCountdown(context, getPhaseSeconds(session, minutes), {
      label: getPomodoroLabel(session),
      color: phaseColor(session),
    });

    if (result.action === 'interrupted') {
      return result;
    }

    if (context.config.bellEnabled) {
      context.surface.ringBell();
    }
    await context.sleep(PHASE_TRANSITION_DELAY_MS, context.signal);
    if (context.signal.aborted) {
      context.surface.newline();
      return { action: 'interrupted' };
    }

    session = advancePomodoro(session);
  }
}

export async function pomodoroCommand(config: DisplayConfig, minutes: PomodoroMinutes): Promise<void> {
  await withModeContext(config, { keyboard: true }, (context) => runPomodoro(context, minutes));
}
