/**
 * Execution of post-create commands through the system shell.
 */
import { exec } from 'child_process';
import { promisify } from 'util';
import type { CommandResult, CommandRunner } from './types.js';

const execAsync = promisify(exec);

export interface ShellCommandRunnerOptions {
  /** Kill the command after this many milliseconds (0 = no limit) */
  timeoutMs?: number;
  /** Extra environment variables for the command */
  env?: Record<string, string>;
}

/** Shape of the error `exec` rejects with. */
interface ExecFailure extends Error {
  code?: number | string | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

/**
 * Runs commands with `child_process.exec`. Output is buffered without a
 * size limit. Never throws: a command that exits non-zero, is killed or
 * cannot start yields `success: false`.
 */
export class ShellCommandRunner implements CommandRunner {
  constructor(private readonly options: ShellCommandRunnerOptions = {}) {}

  async run(command: string, cwd: string): Promise<CommandResult> {
    const timeoutMs = this.options.timeoutMs ?? 0;
    try {
      const { stdout, stderr } = await execAsync(command, {
        cwd,
        encoding: 'utf-8',
        maxBuffer: Infinity,
        timeout: timeoutMs,
        env: { ...process.env, ...this.options.env },
      });
      return { command, success: true, exitCode: 0, stdout, stderr };
    } catch (error) {
      if (!isExecFailure(error)) {
        return { command, success: false, exitCode: null, stdout: '', stderr: String(error) };
      }
      const result: CommandResult = {
        command,
        success: false,
        exitCode: typeof error.code === 'number' ? error.code : null,
        stdout: error.stdout ?? '',
        stderr: error.stderr || error.message,
      };
      if (error.signal) {
        result.signal = error.signal;
        // exec reports a timeout as a kill by its own killSignal
        if (error.killed && timeoutMs > 0) {
          result.timedOut = true;
        }
      }
      return result;
    }
  }
}
