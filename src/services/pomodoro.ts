import type { PomodoroPhase, PomodoroSession } from '../types/index.js';
import type { PomodoroMinutes } from './duration.js';

export const PHASE_TRANSITION_DELAY_MS = 2000;

export function createPomodoroSession(): PomodoroSession {
  return { sessionIndex: 1, phase: 'work' };
}

/**
 * Moves to the next phase after a completed countdown. A finished break
 * starts the work phase of the next session.
 */
export function advancePomodoro(session: PomodoroSession): PomodoroSession {
  if (session.phase === 'work') {
    return { sessionIndex: session.sessionIndex, phase: 'break' };
  }
  return { sessionIndex: session.sessionIndex + 1, phase: 'work' };
}

const PHASE_NAMES: Record<PomodoroPhase, string> = {
  work: 'Work',
  break: 'Break',
};

export function getPomodoroLabel(session: PomodoroSession): string {
  return `Session ${session.sessionIndex} - ${PHASE_NAMES[session.phase]}`;
}

export function getPhaseSeconds(session: PomodoroSession, minutes: PomodoroMinutes): number {
  const phaseMinutes = session.phase === 'work' ? minutes.workMinutes : minutes.breakMinutes;
  return phaseMinutes * 60;
}
