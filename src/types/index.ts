import { z } from 'zod/v4';

export type ColorOverride = 'none' | 'white' | 'black';

export interface DisplayConfig {
  focus: boolean;
  bold: boolean;
  colorOverride: ColorOverride;
  bellEnabled: boolean;
}

export type ClockMode =
  | { kind: 'clock' }
  | { kind: 'stopwatch' }
  | { kind: 'timer'; totalSeconds: number }
  | { kind: 'pomodoro'; workMinutes: number; breakMinutes: number };

export interface RunPlan {
  mode: ClockMode;
  config: DisplayConfig;
}

export interface StopwatchState {
  startedAt: number;
  pausedAt: number | null;
  elapsedSeconds: number;
  isPaused: boolean;
}

export interface CountdownState {
  totalSeconds: number;
  remainingSeconds: number;
  isPaused: boolean;
}

export type PomodoroPhase = 'work' | 'break';

export interface PomodoroSession {
  sessionIndex: number;
  phase: PomodoroPhase;
}

export interface TickResult {
  display: string;
  caption: string | null;
  isPaused: boolean;
  progress: number | null;
  done: boolean;
}

export interface TimerEngine {
  tick(key: string | null, now: number): TickResult;
}

export type SessionResult =
  | { action: 'completed' }
  | { action: 'interrupted' };

// ── Zod Schemas ──────────────────────────────────────────────────────────────

export const CliOptionsSchema = z
  .object({
    focus: z.boolean().default(false),
    bold: z.boolean().default(false),
    white: z.boolean().default(false),
    black: z.boolean().default(false),
    bell: z.boolean().default(true),
    stopwatch: z.boolean().default(false),
    timer: z.string().optional(),
    pomodoro: z.string().optional(),
  })
  .refine((options) => !(options.white && options.black), {
    message: '--white and --black are mutually exclusive',
  });

export type CliOptions = z.infer<typeof CliOptionsSchema>;
