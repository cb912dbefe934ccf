import { describe, it, expect } from 'vitest';
import { BELL, CLEAR_SCREEN, createFakeContext } from '../test/fakes.js';
import { runTimer } from './timer.js';

describe('runTimer', () => {
  it('counts down on a cleared screen and rings the bell at the end', async () => {
    const { context, output } = createFakeContext();

    const result = await runTimer(context, 2);

    expect(result).toEqual({ action: 'completed' });
    expect(output.chunks[0]).toBe(CLEAR_SCREEN);
    expect(output.chunks.at(-1)).toBe(BELL);
    expect(output.chunks.filter((chunk) => chunk === '\x1b[9A')).toHaveLength(2);
    expect(output.chunks.some((chunk) => chunk.includes('▶ Countdown Timer'))).toBe(true);
  });

  it('uses the shorter focus frame', async () => {
    const { context, output } = createFakeContext({ config: { focus: true } });

    await runTimer(context, 1);

    expect(output.chunks).toContain('\x1b[8A');
    expect(output.chunks.some((chunk) => chunk.includes('Countdown Timer'))).toBe(false);
  });

  it('stays quiet when the bell is disabled', async () => {
    const { context, output } = createFakeContext({ config: { bellEnabled: false } });

    await runTimer(context, 1);

    expect(output.chunks).not.toContain(BELL);
  });

  it('does not ring when interrupted', async () => {
    const fake = createFakeContext();
    fake.output.onWrite = (chunk) => {
      if (chunk.includes('Countdown Timer')) {
        fake.controller.abort();
      }
    };

    const result = await runTimer(fake.context, 10);

    expect(result).toEqual({ action: 'interrupted' });
    expect(fake.output.chunks).not.toContain(BELL);
    expect(fake.output.chunks.at(-1)).toBe('\n');
  });
});
