export const DEFAULT_TERMINAL_WIDTH = 80;

const ESC = '\x1b[';

/**
 * The slice of a writable TTY stream the surface needs. `process.stdout`
 * satisfies it; tests pass an in-memory stand-in.
 */
export interface TerminalOutput {
  columns?: number;
  write(chunk: string): boolean;
}

export function centerPadding(width: number, length: number): number {
  return Math.max(0, Math.floor((width - length) / 2));
}

export class TerminalSurface {
  constructor(private readonly output: TerminalOutput = process.stdout) {}

  clearScreen(): void {
    this.output.write(`${ESC}2J${ESC}H`);
  }

  // Queried on every call: the terminal may be resized mid-run.
  currentWidth(): number {
    const columns = this.output.columns;
    return typeof columns === 'number' && columns > 0 ? columns : DEFAULT_TERMINAL_WIDTH;
  }

  moveCursorUp(lines: number): void {
    if (lines > 0) {
      this.output.write(`${ESC}${lines}A`);
    }
  }

  centerPad(length: number): number {
    return centerPadding(this.currentWidth(), length);
  }

  ringBell(): void {
    this.output.write('\x07');
  }

  /**
   * Writes every row of a frame in a single call. Each row first erases the
   * line it lands on so a shorter row never leaves residue behind.
   */
  writeFrame(lines: string[]): void {
    this.output.write(lines.map((line) => `\r${ESC}2K${line}\n`).join(''));
  }

  newline(): void {
    this.output.write('\n');
  }
}
