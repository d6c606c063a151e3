import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createTemplatesCommand, createShowCommand } from './commands/templates.js';
import { createCreateCommand } from './commands/create.js';
import { createProjectsCommand } from './commands/projects.js';
import { createConfigCommand } from './commands/config.js';
import { getGlobalOptions } from './shared.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('skelly')
    .description('Create project skeletons from templates')
    .version(readVersion())
    .option('-c, --config <path>', 'Config file (default: ~/.skelly/config.yaml)')
    .option('--templates <dir>', 'Template directory (overrides config templates_dir)')
    .option('--verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show warnings and errors')
    .hook('preAction', (_program, actionCommand) => {
      const { verbose, quiet } = getGlobalOptions(actionCommand);
      if (verbose) {
        logger.setLevel('debug');
      } else if (quiet) {
        logger.setLevel('warn');
      }
    });

  [createTemplatesCommand, createShowCommand, createCreateCommand, createProjectsCommand, createConfigCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
