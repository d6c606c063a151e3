/**
 * Temporary template repositories for file-system tests.
 */
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { stringify } from 'yaml';
import type { CommandResult, CommandRunner } from '../../src/core/templates/types.js';

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `skelly-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Write a template directory: a manifest (object or raw YAML) plus any
 * extra files, keyed by path relative to the template directory.
 */
export async function writeTemplate(
  root: string,
  dirName: string,
  manifest: Record<string, unknown> | string | null,
  files: Record<string, string> = {}
): Promise<string> {
  const dir = join(root, dirName);
  await mkdir(dir, { recursive: true });
  if (manifest !== null) {
    const content = typeof manifest === 'string' ? manifest : stringify(manifest);
    await writeFile(join(dir, 'project.yml'), content);
  }
  for (const [relative, content] of Object.entries(files)) {
    const target = join(dir, relative);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
  return dir;
}

/**
 * Command runner that records calls and answers from a script.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: Array<{ command: string; cwd: string }> = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async run(command: string, cwd: string): Promise<CommandResult> {
    this.calls.push({ command, cwd });
    const success = !this.failing.has(command);
    return {
      command,
      success,
      exitCode: success ? 0 : 1,
      stdout: '',
      stderr: success ? '' : `${command}: failed`,
    };
  }
}
