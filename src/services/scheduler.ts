export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/**
 * Waits `ms` milliseconds, or less if the signal aborts first. Never
 * rejects: an abort simply ends the wait early.
 */
export const delay: Sleep = (ms, signal) => {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      resolve();
    };
    const timeout = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
};
