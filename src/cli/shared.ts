/**
 * Helpers shared by the CLI commands: global options, config and engine
 * loading, error reporting.
 */
import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, resolveTemplatesDir, type Config } from '../core/config/index.js';
import { TemplateEngine, ShellCommandRunner } from '../core/templates/index.js';
import { TemplateNotFoundError, getErrorMessage } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';

/** Options defined on the root program. */
export interface GlobalOptions {
  config?: string;
  templates?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Load the user config, honoring `--config`.
 */
export async function loadCliConfig(command: Command): Promise<Config> {
  return loadConfig(getGlobalOptions(command).config);
}

/**
 * Build the template engine for a command. `--templates` wins over the
 * config's `templates_dir`.
 */
export async function loadEngine(command: Command, config: Config): Promise<TemplateEngine> {
  const templatesDir = getGlobalOptions(command).templates ?? resolveTemplatesDir(config);
  return TemplateEngine.fromDirectory(templatesDir, {
    commandRunner: new ShellCommandRunner({ timeoutMs: config.post_create.timeout_ms }),
  });
}

/**
 * Report a command failure and exit with status 1.
 */
export function failCommand(error: unknown): never {
  log.error(getErrorMessage(error));
  if (error instanceof TemplateNotFoundError) {
    if (error.available.length > 0) {
      console.log(chalk.dim(`Available templates: ${error.available.join(', ')}`));
    }
  }
  process.exit(1);
}
