import type { SessionResult, TickResult, TimerEngine } from '../types/index.js';
import type { Sleep } from '../services/scheduler.js';
import type { KeySource } from './keyboard.js';
import type { TerminalSurface } from './terminal.js';

export const CLOCK_CADENCE_MS = 1000;
export const COUNTDOWN_CADENCE_MS = 1000;
// Short so pause/reset keystrokes show up without a visible lag
export const STOPWATCH_CADENCE_MS = 100;

export interface SessionContext {
  surface: TerminalSurface;
  keys: KeySource;
  signal: AbortSignal;
  // Wall clock, handed to engines
  now: () => number;
  // Never steps backwards; tick deadlines are kept on it
  monotonic: () => number;
  sleep: Sleep;
}

export interface SessionOptions {
  engine: TimerEngine;
  cadenceMs: number;
  renderFrame: (result: TickResult, width: number) => string[];
}

/**
 * Runs one engine at a fixed cadence until it reports done or the signal
 * aborts. Each tick polls one key, applies it, then redraws over the
 * previous frame.
 */
export async function runSession(context: SessionContext, options: SessionOptions): Promise<SessionResult> {
  const { surface, keys, signal, now, monotonic, sleep } = context;
  const { engine, cadenceMs, renderFrame } = options;

  let previousLines = 0;
  let nextTick = monotonic();

  while (!signal.aborted) {
    const key = keys.pollKey();
    const result = engine.tick(key, now());

    const lines = renderFrame(result, surface.currentWidth());
    surface.moveCursorUp(previousLines);
    surface.writeFrame(lines);
    previousLines = lines.length;

    if (result.done) {
      return { action: 'completed' };
    }

    nextTick += cadenceMs;
    const current = monotonic();
    if (nextTick <= current - cadenceMs) {
      nextTick = current + cadenceMs;
    }
    await sleep(Math.max(0, nextTick - current), signal);
  }

  surface.newline();
  return { action: 'interrupted' };
}
