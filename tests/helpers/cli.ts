/**
 * Runs the CLI in-process and captures what it prints.
 */
import { vi, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { createCli } from '../../src/cli/index.js';
import { logger } from '../../src/utils/logger.js';

export interface CliCapture {
  log: MockInstance<typeof console.log>;
  warn: MockInstance<typeof console.warn>;
  error: MockInstance<typeof console.error>;
  exit: MockInstance<typeof process.exit>;
  /** Everything printed with console.log, one entry per call */
  lines(): string[];
  /** console.log output joined with newlines */
  output(): string;
  /** console.warn and console.error output, one entry per call */
  problems(): string[];
}

/**
 * Silence the console and turn process.exit into an exception.
 * Call restoreCli() afterwards.
 */
export function captureCli(): CliCapture {
  chalk.level = 0;
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
    throw new Error('process.exit called');
  });

  const lines = (): string[] => log.mock.calls.map((call) => (call.length > 0 ? String(call[0]) : ''));
  return {
    log,
    warn,
    error,
    exit,
    lines,
    output: () => lines().join('\n'),
    problems: () => [...warn.mock.calls, ...error.mock.calls].map((call) => String(call[0])),
  };
}

export function restoreCli(): void {
  vi.restoreAllMocks();
  logger.setLevel('info');
}

/**
 * Parse `args` as if typed after `skelly` on the command line.
 */
export async function runCli(args: string[]): Promise<void> {
  await createCli().parseAsync(['node', 'skelly', ...args]);
}
