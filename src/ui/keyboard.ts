import { TerminalError } from '../services/errors.js';

// Raw mode delivers Ctrl+C as this byte instead of raising SIGINT
export const CTRL_C = '\u0003';

export interface KeySource {
  pollKey(): string | null;
}

export const NO_KEYS: KeySource = {
  pollKey: () => null,
};

/**
 * The parts of a TTY read stream the reader touches. `process.stdin`
 * satisfies it.
 */
export interface RawInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  removeListener(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export class KeyReader implements KeySource {
  private readonly pending: string[] = [];
  private previousRaw = false;
  private acquired = false;

  constructor(
    private readonly input: RawInput,
    private readonly onInterrupt: () => void
  ) {}

  private readonly onData = (chunk: string | Buffer): void => {
    for (const char of chunk.toString()) {
      if (char === CTRL_C) {
        this.onInterrupt();
        continue;
      }
      this.pending.push(char);
    }
  };

  acquire(): void {
    if (this.acquired) {
      return;
    }
    if (!this.input.isTTY || typeof this.input.setRawMode !== 'function') {
      throw new TerminalError('Keyboard controls need an interactive terminal (stdin is not a TTY)');
    }

    this.previousRaw = this.input.isRaw ?? false;
    this.input.setRawMode(true);
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.resume();
    this.acquired = true;
  }

  release(): void {
    if (!this.acquired) {
      return;
    }
    this.acquired = false;
    this.input.removeListener('data', this.onData);
    this.input.setRawMode?.(this.previousRaw);
    this.input.pause();
    this.pending.length = 0;
  }

  /** Next buffered key, or null without waiting when none has arrived. */
  pollKey(): string | null {
    return this.pending.shift() ?? null;
  }
}

/**
 * Holds the terminal in raw mode for the duration of `fn` and restores the
 * previous mode however `fn` ends.
 */
export async function withKeyReader<T>(
  input: RawInput,
  onInterrupt: () => void,
  fn: (reader: KeyReader) => Promise<T>
): Promise<T> {
  const reader = new KeyReader(input, onInterrupt);
  reader.acquire();
  try {
    return await fn(reader);
  } finally {
    reader.release();
  }
}
