/**
 * CLI commands for browsing the template catalog: `templates` and `show`.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { TemplateNotFoundError } from '../../utils/errors.js';
import { failCommand, loadCliConfig, loadEngine } from '../shared.js';

interface TemplatesCommandOptions {
  json?: boolean;
}

/**
 * Create the templates command.
 */
export function createTemplatesCommand(): Command {
  return new Command('templates')
    .alias('list')
    .description('List available project templates')
    .option('--json', 'Output as JSON')
    .action(async (options: TemplatesCommandOptions, command: Command) => {
      try {
        await runTemplates(options, command);
      } catch (error) {
        failCommand(error);
      }
    });
}

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return new Command('show')
    .description('Show a template and the variables it uses')
    .argument('<template>', 'Template name')
    .option('--json', 'Output as JSON')
    .action(async (name: string, options: TemplatesCommandOptions, command: Command) => {
      try {
        await runShow(name, options, command);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function runTemplates(options: TemplatesCommandOptions, command: Command): Promise<void> {
  const config = await loadCliConfig(command);
  const engine = await loadEngine(command, config);

  const templates = engine.listTemplates().map((name) => {
    const descriptor = engine.getTemplate(name);
    return {
      name,
      description: descriptor?.description ?? '',
      version: descriptor?.version ?? '',
    };
  });

  if (options.json) {
    console.log(JSON.stringify(templates, null, 2));
    return;
  }

  if (templates.length === 0) {
    console.log(chalk.yellow('No templates found.'));
    console.log(chalk.dim(`Looked in ${engine.catalog.root}`));
    return;
  }

  console.log();
  console.log(chalk.bold('Available templates:'));
  console.log();
  const width = Math.max(...templates.map((t) => t.name.length));
  for (const template of templates) {
    const version = template.version ? chalk.dim(` (v${template.version})`) : '';
    console.log(`  ${chalk.cyan(template.name.padEnd(width))}  ${template.description}${version}`);
  }
  console.log();
}

async function runShow(name: string, options: TemplatesCommandOptions, command: Command): Promise<void> {
  const config = await loadCliConfig(command);
  const engine = await loadEngine(command, config);
  const descriptor = engine.getTemplate(name);

  if (!descriptor) {
    if (options.json) {
      console.log(JSON.stringify({ error: `Template '${name}' not found`, available: engine.listTemplates() }));
      process.exit(1);
    }
    throw new TemplateNotFoundError(name, engine.listTemplates());
  }

  const discovered = await engine.getTemplateVariables(name);

  if (options.json) {
    console.log(JSON.stringify({ ...descriptor, discoveredVariables: Object.keys(discovered) }, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(descriptor.name) + (descriptor.version ? chalk.dim(` v${descriptor.version}`) : ''));
  if (descriptor.description) console.log(descriptor.description);
  if (descriptor.author) console.log(chalk.dim(`Author: ${descriptor.author}`));
  console.log(chalk.dim(`Source: ${descriptor.sourcePath}`));

  if (descriptor.variables.length > 0) {
    console.log();
    console.log(chalk.bold('Declared variables:'));
    for (const variable of descriptor.variables) {
      const value = config.defaults[variable.name];
      const fallback = value !== undefined ? chalk.dim(` [default: ${value}]`) : '';
      console.log(`  ${chalk.cyan(variable.name)}${variable.description ? ` - ${variable.description}` : ''}${fallback}`);
    }
  }

  const names = Object.keys(discovered);
  if (names.length > 0) {
    console.log();
    console.log(chalk.bold('Placeholders used:'));
    console.log(`  ${names.map((n) => chalk.cyan(n)).join(', ')}`);
  }

  console.log();
  console.log(chalk.bold('Files:'));
  for (const file of descriptor.files) {
    const source = file.content !== undefined ? 'inline' : file.template ? `from ${file.template}` : 'empty';
    console.log(`  ${file.path} ${chalk.dim(`(${source})`)}`);
  }

  if (descriptor.postCreateCommands.length > 0) {
    console.log();
    console.log(chalk.bold('Post-create commands:'));
    for (const cmd of descriptor.postCreateCommands) {
      console.log(`  ${chalk.dim('$')} ${cmd}`);
    }
  }
  console.log();
}
