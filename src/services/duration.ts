import { ValidationError } from './errors.js';

const DURATION_FORMAT_MESSAGE = 'Duration must be in format: MM:SS, HH:MM:SS, or seconds';
const POMODORO_FORMAT_MESSAGE = 'Pomodoro format is W,B (e.g., 25,5)';

export const DEFAULT_POMODORO = '25,5';

function parseUnsignedInteger(part: string): number | null {
  const trimmed = part.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parses `SS`, `MM:SS` or `HH:MM:SS` into seconds. Parts are not range
 * checked, so `90` and `1:90` are both accepted.
 */
export function parseDuration(input: string): number {
  const parts = input.split(':');
  if (parts.length > 3) {
    throw new ValidationError(DURATION_FORMAT_MESSAGE);
  }

  const values: number[] = [];
  for (const part of parts) {
    const value = parseUnsignedInteger(part);
    if (value === null) {
      throw new ValidationError(DURATION_FORMAT_MESSAGE);
    }
    values.push(value);
  }

  const totalSeconds = values.reduce((total, value) => total * 60 + value, 0);
  // Past this a countdown's one-second decrement is lost to rounding
  if (!values.every(Number.isSafeInteger) || !Number.isSafeInteger(totalSeconds)) {
    throw new ValidationError('Duration is too long');
  }
  return totalSeconds;
}

/**
 * Parses a countdown duration and rejects anything that would not count.
 */
export function parseCountdownDuration(input: string): number {
  const totalSeconds = parseDuration(input);
  if (totalSeconds <= 0) {
    throw new ValidationError('Duration must be positive');
  }
  return totalSeconds;
}

export interface PomodoroMinutes {
  workMinutes: number;
  breakMinutes: number;
}

export function parsePomodoro(input: string): PomodoroMinutes {
  const parts = input.split(',');
  if (parts.length !== 2) {
    throw new ValidationError(POMODORO_FORMAT_MESSAGE);
  }

  const [workMinutes, breakMinutes] = parts.map(parseUnsignedInteger);
  if (workMinutes === null || breakMinutes === null) {
    throw new ValidationError(POMODORO_FORMAT_MESSAGE);
  }
  if (workMinutes <= 0 || breakMinutes <= 0) {
    throw new ValidationError('Pomodoro minutes must be positive');
  }
  if (!Number.isSafeInteger(Math.max(workMinutes, breakMinutes) * 60)) {
    throw new ValidationError('Pomodoro minutes are too long');
  }

  return { workMinutes, breakMinutes };
}
