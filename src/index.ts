#!/usr/bin/env node

import { Command } from 'commander';
import { runCli } from './commands/run.js';
import { DEFAULT_POMODORO } from './services/duration.js';
import { VERSION } from './version.js';

const HELP_TEXT = `
Examples:
  tclock                     Show current time and date
  tclock -b                  Bold numbers
  tclock -f                  Focus mode (minimal display)
  tclock -s                  Stopwatch
  tclock -t 10:30            10 minute 30 second timer
  tclock -p 25,5             Pomodoro (25min work, 5min break)
  tclock pomodoro            Pomodoro with the default 25,5
  tclock -fb stopwatch       Focus + bold stopwatch
  tclock --white timer 5:00  White text 5 minute timer

Timer formats:
  90        90 seconds
  10:30     10 minutes 30 seconds
  1:30:00   1 hour 30 minutes

Controls:
  q         Pause/resume
  r         Reset (stopwatch only)
  Ctrl+C    Exit
`;

async function run(options: Record<string, unknown>): Promise<void> {
  const exitCode = await runCli(options);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

const program = new Command();

program
  .name('tclock')
  .description('Terminal clock with stopwatch, countdown and Pomodoro modes')
  .version(VERSION)
  .option('-f, --focus', 'minimal display without labels')
  .option('-b, --bold', 'use bold/thick number style')
  .option('--white', 'override colors to white')
  .option('--black', 'override colors to black')
  .option('--no-bell', 'disable completion bell sound')
  .option('-s, --stopwatch', 'count-up timer mode')
  .option('-t, --timer <time>', 'countdown timer (MM:SS, HH:MM:SS, or seconds)')
  .option('-p, --pomodoro <W,B>', 'work,break minutes (e.g., 25,5)')
  .addHelpText('after', HELP_TEXT)
  .action(async (options: Record<string, unknown>) => {
    await run(options);
  });

program
  .command('stopwatch')
  .description('Count up with pause/resume and reset')
  .action(async (_options: unknown, command: Command) => {
    await run({ ...command.optsWithGlobals(), stopwatch: true });
  });

program
  .command('timer <time>')
  .description('Count down from TIME (MM:SS, HH:MM:SS, or seconds)')
  .action(async (time: string, _options: unknown, command: Command) => {
    await run({ ...command.optsWithGlobals(), timer: time });
  });

program
  .command('pomodoro [minutes]')
  .description(`Alternate work and break countdowns, W,B minutes (default ${DEFAULT_POMODORO})`)
  .action(async (minutes: string | undefined, _options: unknown, command: Command) => {
    await run({ ...command.optsWithGlobals(), pomodoro: minutes ?? DEFAULT_POMODORO });
  });

await program.parseAsync();
