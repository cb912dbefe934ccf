import type { CountdownState, StopwatchState, TickResult, TimerEngine } from '../types/index.js';

export const PAUSE_KEY = 'q';
export const RESET_KEY = 'r';

export function formatTime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts = [minutes, secs];
  if (hours > 0) {
    parts.unshift(hours);
  }

  return parts.map((part) => part.toString().padStart(2, '0')).join(':');
}

export function formatClockTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => part.toString().padStart(2, '0'))
    .join(':');
}

export function formatClockDate(date: Date): string {
  return date.toLocaleDateString('en-US', {
    weekday: 'long',
    month: 'long',
    day: '2-digit',
    year: 'numeric',
  });
}

// ── Stopwatch ────────────────────────────────────────────────────────────────

function secondsSince(startedAt: number, now: number): number {
  return Math.max(0, Math.floor((now - startedAt) / 1000));
}

export function createStopwatch(now: number): StopwatchState {
  return {
    startedAt: now,
    pausedAt: null,
    elapsedSeconds: 0,
    isPaused: false,
  };
}

/**
 * Applies one key and the passage of time to a stopwatch. Resuming moves
 * `startedAt` forward by the pause length so paused time never counts.
 */
export function tickStopwatch(state: StopwatchState, key: string | null, now: number): StopwatchState {
  if (key === PAUSE_KEY) {
    if (state.isPaused) {
      state.startedAt += now - (state.pausedAt ?? now);
      state.pausedAt = null;
      state.isPaused = false;
    } else {
      state.elapsedSeconds = secondsSince(state.startedAt, now);
      state.pausedAt = now;
      state.isPaused = true;
    }
  } else if (key === RESET_KEY) {
    state.startedAt = now;
    state.pausedAt = null;
    state.elapsedSeconds = 0;
    state.isPaused = false;
  }

  if (!state.isPaused) {
    state.elapsedSeconds = secondsSince(state.startedAt, now);
  }

  return state;
}

// ── Countdown ────────────────────────────────────────────────────────────────

export function createCountdown(totalSeconds: number): CountdownState {
  if (!Number.isInteger(totalSeconds) || totalSeconds < 0) {
    throw new RangeError(`Countdown length must be a non-negative whole number of seconds, got ${totalSeconds}`);
  }

  return {
    totalSeconds,
    remainingSeconds: totalSeconds,
    isPaused: false,
  };
}

export function getCountdownProgress(totalSeconds: number, remainingSeconds: number): number {
  if (totalSeconds <= 0) {
    return 1;
  }
  return (totalSeconds - remainingSeconds) / totalSeconds;
}

// Counts ticks, not wall time: a paused countdown resumes from where it
// stopped no matter how long the pause lasted.
export function tickCountdown(state: CountdownState, key: string | null): TickResult {
  if (key === PAUSE_KEY) {
    state.isPaused = !state.isPaused;
  }

  const shown = state.remainingSeconds;
  const result: TickResult = {
    display: formatTime(shown),
    caption: null,
    isPaused: state.isPaused,
    progress: getCountdownProgress(state.totalSeconds, shown),
    done: false,
  };

  if (!state.isPaused) {
    state.remainingSeconds -= 1;
  }
  result.done = state.remainingSeconds < 0;

  return result;
}

// ── Engines ──────────────────────────────────────────────────────────────────

export function createClockEngine(): TimerEngine {
  return {
    tick(_key, now) {
      const date = new Date(now);
      return {
        display: formatClockTime(date),
        caption: formatClockDate(date),
        isPaused: false,
        progress: null,
        done: false,
      };
    },
  };
}

export function createStopwatchEngine(now: number): TimerEngine {
  const state = createStopwatch(now);
  return {
    tick(key, at) {
      tickStopwatch(state, key, at);
      return {
        display: formatTime(state.elapsedSeconds),
        caption: null,
        isPaused: state.isPaused,
        progress: null,
        done: false,
      };
    },
  };
}

export function createCountdownEngine(totalSeconds: number): TimerEngine {
  const state = createCountdown(totalSeconds);
  return {
    tick(key) {
      return tickCountdown(state, key);
    },
  };
}
