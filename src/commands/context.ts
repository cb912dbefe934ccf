import type { DisplayConfig } from '../types/index.js';
import { delay } from '../services/scheduler.js';
import { NO_KEYS, withKeyReader, type RawInput } from '../ui/keyboard.js';
import type { SessionContext } from '../ui/session.js';
import { TerminalSurface } from '../ui/terminal.js';

export interface ModeContext extends SessionContext {
  config: DisplayConfig;
}

interface ModeContextOptions {
  keyboard: boolean;
  input?: RawInput;
}

/**
 * Builds the context a mode runs in: stdout surface, an abort signal wired
 * to SIGINT (and to Ctrl+C while the keyboard is in raw mode), and the key
 * reader when the mode takes keystrokes. Everything is torn down when `fn`
 * settles.
 */
export async function withModeContext<T>(
  config: DisplayConfig,
  options: ModeContextOptions,
  fn: (context: ModeContext) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on('SIGINT', onSigint);

  const base = {
    config,
    surface: new TerminalSurface(process.stdout),
    signal: controller.signal,
    now: Date.now,
    monotonic: () => performance.now(),
    sleep: delay,
  };

  try {
    if (!options.keyboard) {
      return await fn({ ...base, keys: NO_KEYS });
    }
    return await withKeyReader(options.input ?? process.stdin, onSigint, (keys) => fn({ ...base, keys }));
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
