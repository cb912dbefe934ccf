import type { DisplayConfig, TickResult } from '../types/index.js';
import { renderGlyphs } from './render.js';
import { centerPadding } from './terminal.js';
import { modeColors, paint, resolveColor, type Color } from './theme.js';

// Fixed frame heights; the driver moves the cursor up by the previous one.
export const FRAME_LINES = {
  timeOnly: 5,
  withLabel: 7,
  focusWithBar: 8,
  withBar: 9,
} as const;

const MIN_BAR_LENGTH = 20;
const MAX_BAR_LENGTH = 100;
const BAR_MARGIN = 20;
// Brackets plus the percentage suffix
const BAR_DECORATION = 10;

export const PAUSED_HINT = '⏸ Paused';

export interface FrameContext {
  config: DisplayConfig;
  width: number;
}

function centered(text: string, color: Color, context: FrameContext): string {
  const padding = centerPadding(context.width, text.length);
  return ' '.repeat(padding) + paint(text, resolveColor(context.config, color));
}

export function timeBlock(text: string, color: Color, context: FrameContext): string[] {
  const rows = renderGlyphs(text, context.config.bold);
  return [...rows.map((row) => centered(row, color, context)), ''];
}

export function labelBlock(label: string, color: Color, context: FrameContext): string[] {
  return [centered(label, color, context), ''];
}

export function progressBar(progress: number, color: Color, context: FrameContext): string[] {
  const barLength = Math.max(MIN_BAR_LENGTH, Math.min(MAX_BAR_LENGTH, context.width - BAR_MARGIN));
  const padding = Math.max(0, Math.floor((context.width - barLength - BAR_DECORATION) / 2));
  const fraction = Math.min(1, Math.max(0, progress));
  const filled = Math.floor(barLength * fraction);
  const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled);
  const percent = (fraction * 100).toFixed(1);

  return [
    `${' '.repeat(padding)}[${paint(bar, resolveColor(context.config, color))}] ${percent}%`,
    '',
  ];
}

export function clockFrame(result: TickResult, context: FrameContext): string[] {
  const lines = timeBlock(result.display, modeColors.clock, context);
  if (context.config.focus || result.caption === null) {
    return lines;
  }
  return [...lines, ...labelBlock(result.caption, modeColors.label, context)];
}

export function stopwatchFrame(result: TickResult, context: FrameContext): string[] {
  const lines = timeBlock(result.display, modeColors.stopwatch, context);

  if (context.config.focus) {
    const hint = result.isPaused ? labelBlock(PAUSED_HINT, modeColors.muted, context) : ['', ''];
    return [...lines, ...hint];
  }

  const label = result.isPaused ? '⏸ Paused (q: resume, r: reset)' : '▶ Running (q: pause, r: reset)';
  return [...lines, ...labelBlock(label, modeColors.label, context)];
}

export interface CountdownStyle {
  label: string;
  color: Color;
}

export function countdownFrame(result: TickResult, style: CountdownStyle, context: FrameContext): string[] {
  const lines = timeBlock(result.display, style.color, context);
  const progress = result.progress ?? 0;

  if (context.config.focus) {
    const hint = result.isPaused ? centered(PAUSED_HINT, modeColors.muted, context) : '';
    return [...lines, hint, ...progressBar(progress, modeColors.muted, context)];
  }

  const label = result.isPaused ? `⏸ Paused - ${style.label}` : `▶ ${style.label}`;
  return [
    ...lines,
    ...labelBlock(label, modeColors.label, context),
    ...progressBar(progress, style.color, context),
  ];
}
