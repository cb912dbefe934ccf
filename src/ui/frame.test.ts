import { describe, it, expect } from 'vitest';
import type { TickResult } from '../types/index.js';
import { defaultConfig } from '../test/fakes.js';
import {
  FRAME_LINES,
  clockFrame,
  countdownFrame,
  labelBlock,
  progressBar,
  stopwatchFrame,
  timeBlock,
} from './frame.js';
import { colors } from './theme.js';

const context = { config: defaultConfig, width: 80 };
const focusContext = { config: { ...defaultConfig, focus: true }, width: 80 };

function tick(overrides: Partial<TickResult> = {}): TickResult {
  return {
    display: '12:34',
    caption: null,
    isPaused: false,
    progress: null,
    done: false,
    ...overrides,
  };
}

describe('frame layouts', () => {
  describe('building blocks', () => {
    it('centres each glyph row and adds a blank line', () => {
      const lines = timeBlock('12:34', colors.cyan, context);
      expect(lines).toHaveLength(5);
      expect(lines[0]).toBe(' '.repeat(27) + '\x1b[96m    ┐ ┌───┐   ┌───┐ ┐   ┐\x1b[0m');
      expect(lines[4]).toBe('');
    });

    it('centres a label in its color', () => {
      expect(labelBlock('hello', colors.magenta, context)).toEqual([
        ' '.repeat(37) + '\x1b[95mhello\x1b[0m',
        '',
      ]);
    });

    it('applies the white and black overrides', () => {
      const white = { config: { ...defaultConfig, colorOverride: 'white' as const }, width: 80 };
      const black = { config: { ...defaultConfig, colorOverride: 'black' as const }, width: 80 };
      expect(labelBlock('hi', colors.magenta, white)[0]).toBe(' '.repeat(39) + '\x1b[97mhi\x1b[0m');
      expect(labelBlock('hi', colors.magenta, black)[0]).toBe(' '.repeat(39) + '\x1b[30mhi\x1b[0m');
    });

    it('draws a progress bar sized to the terminal', () => {
      expect(progressBar(0.5, colors.yellow, context)).toEqual([
        '     [\x1b[93m' + '█'.repeat(30) + '░'.repeat(30) + '\x1b[0m] 50.0%',
        '',
      ]);
    });

    it('keeps the bar at least 20 columns long on narrow terminals', () => {
      expect(progressBar(1, colors.gray, { config: defaultConfig, width: 30 })[0]).toBe(
        '[\x1b[90m' + '█'.repeat(20) + '\x1b[0m] 100.0%'
      );
    });

    it('caps the bar at 100 columns', () => {
      const [line] = progressBar(0, colors.gray, { config: defaultConfig, width: 200 });
      expect(line).toBe(' '.repeat(45) + '[\x1b[90m' + '░'.repeat(100) + '\x1b[0m] 0.0%');
    });
  });

  describe('frame heights', () => {
    it('clock: time only in focus mode, with the date otherwise', () => {
      const result = tick({ caption: 'Monday, October 19, 2026' });
      expect(clockFrame(result, focusContext)).toHaveLength(FRAME_LINES.timeOnly);

      const lines = clockFrame(result, context);
      expect(lines).toHaveLength(FRAME_LINES.withLabel);
      expect(lines[5]).toBe(' '.repeat(28) + '\x1b[95mMonday, October 19, 2026\x1b[0m');
    });

    it('stopwatch: always the labelled height', () => {
      expect(stopwatchFrame(tick(), context)).toHaveLength(FRAME_LINES.withLabel);
      expect(stopwatchFrame(tick({ isPaused: true }), context)).toHaveLength(FRAME_LINES.withLabel);
      expect(stopwatchFrame(tick(), focusContext)).toHaveLength(FRAME_LINES.withLabel);
      expect(stopwatchFrame(tick({ isPaused: true }), focusContext)).toHaveLength(FRAME_LINES.withLabel);
    });

    it('countdown: bar heights for focus and full mode', () => {
      const style = { label: 'Countdown Timer', color: colors.yellow };
      expect(countdownFrame(tick({ progress: 0 }), style, context)).toHaveLength(FRAME_LINES.withBar);
      expect(countdownFrame(tick({ progress: 0 }), style, focusContext)).toHaveLength(FRAME_LINES.focusWithBar);
      expect(countdownFrame(tick({ progress: 0, isPaused: true }), style, focusContext)).toHaveLength(
        FRAME_LINES.focusWithBar
      );
    });
  });

  describe('labels', () => {
    it('shows the stopwatch controls', () => {
      expect(stopwatchFrame(tick(), context)[5]).toContain('▶ Running (q: pause, r: reset)');
      expect(stopwatchFrame(tick({ isPaused: true }), context)[5]).toContain('⏸ Paused (q: resume, r: reset)');
    });

    it('shows only a pause hint in focus mode', () => {
      expect(stopwatchFrame(tick(), focusContext).slice(5)).toEqual(['', '']);
      expect(stopwatchFrame(tick({ isPaused: true }), focusContext)[5]).toBe(
        ' '.repeat(36) + '\x1b[90m⏸ Paused\x1b[0m'
      );
    });

    it('prefixes the countdown label with its state', () => {
      const style = { label: 'Session 1 - Work', color: colors.red };
      expect(countdownFrame(tick({ progress: 0 }), style, context)[5]).toContain('▶ Session 1 - Work');
      expect(countdownFrame(tick({ progress: 0, isPaused: true }), style, context)[5]).toContain(
        '⏸ Paused - Session 1 - Work'
      );
    });

    it('draws the focus-mode bar in gray', () => {
      const style = { label: 'Countdown Timer', color: colors.yellow };
      const lines = countdownFrame(tick({ progress: 0.25 }), style, focusContext);
      expect(lines[5]).toBe('');
      expect(lines[6]).toBe('     [\x1b[90m' + '█'.repeat(15) + '░'.repeat(45) + '\x1b[0m] 25.0%');
    });
  });
});
