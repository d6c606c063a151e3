/**
 * CLI command that creates a project from a template.
 */
import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Config } from '../../core/config/index.js';
import type {
  ProjectCreationResult,
  ProjectPlan,
  RenderContext,
  TemplateEngine,
} from '../../core/templates/index.js';
import { logger as log } from '../../utils/logger.js';
import { failCommand, loadCliConfig, loadEngine } from '../shared.js';

interface CreateCommandOptions {
  template?: string;
  var: Record<string, string>;
  overwrite?: boolean;
  dryRun?: boolean;
  postCreate: boolean;
  json?: boolean;
}

/**
 * Parse one `key=value` assignment into the accumulated variables.
 */
export function collectVariable(assignment: string, previous: Record<string, string>): Record<string, string> {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${assignment}'.`);
  }
  return {
    ...previous,
    [assignment.slice(0, separator).trim()]: assignment.slice(separator + 1),
  };
}

/**
 * Importable package name for a project name: dashes become underscores.
 */
export function toPackageName(projectName: string): string {
  return projectName.replace(/-/g, '_');
}

/**
 * Render context for a new project: an empty description, config defaults,
 * then the names derived from the destination, then explicit variables.
 */
export function buildRenderContext(
  config: Config,
  destination: string,
  variables: Record<string, string>
): RenderContext {
  const projectName = path.basename(path.resolve(destination));
  return {
    description: '',
    ...config.defaults,
    project_name: projectName,
    package_name: toPackageName(projectName),
    ...variables,
  };
}

/**
 * Create the create command.
 */
export function createCreateCommand(): Command {
  return new Command('create')
    .description('Create a new project from a template')
    .argument('<path>', 'Destination directory for the project')
    .option('-t, --template <name>', 'Template to use (default: config default_template)')
    .option('-v, --var <key=value>', 'Template variable, repeatable', collectVariable, {})
    .option('--overwrite', 'Write into an existing non-empty directory')
    .option('--dry-run', 'Show what would be created without writing')
    .option('--no-post-create', 'Skip the template\'s post-create commands')
    .option('--json', 'Output as JSON')
    .action(async (destination: string, options: CreateCommandOptions, command: Command) => {
      try {
        await runCreate(destination, options, command);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function runCreate(destination: string, options: CreateCommandOptions, command: Command): Promise<void> {
  const config = await loadCliConfig(command);
  const engine = await loadEngine(command, config);
  const templateName = options.template ?? config.default_template;
  const context = buildRenderContext(config, destination, options.var);

  if (!options.json) {
    await warnUnsetVariables(engine, templateName, context);
  }

  if (options.dryRun) {
    const plan = await engine.planProject(templateName, destination, context);
    if (options.json) {
      console.log(JSON.stringify(plan, null, 2));
    } else {
      printPlan(plan, options.overwrite ?? false);
    }
    return;
  }

  const result = await engine.createProject(templateName, destination, context, options.overwrite ?? false, {
    runPostCreate: options.postCreate && config.post_create.enabled,
  });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  printResult(result);
}

/**
 * Placeholders without a value stay in the output as written; say so up
 * front.
 */
async function warnUnsetVariables(
  engine: TemplateEngine,
  templateName: string,
  context: RenderContext
): Promise<void> {
  const variables = await engine.getTemplateVariables(templateName);
  const unset = Object.keys(variables).filter((name) => !Object.prototype.hasOwnProperty.call(context, name));
  if (unset.length > 0) {
    log.warn(`No value for ${unset.join(', ')}; placeholders will be left as written. Set with --var key=value.`);
  }
}

function printPlan(plan: ProjectPlan, overwrite: boolean): void {
  console.log();
  console.log(chalk.bold(`Dry Run - ${plan.template} -> ${plan.projectPath}`));
  if (plan.conflict && !overwrite) {
    console.log(chalk.yellow('Destination is not empty; creation would fail without --overwrite.'));
  }

  console.log();
  for (const dir of plan.directories) {
    console.log(`  ${chalk.cyan('dir ')} ${dir}/`);
  }
  for (const file of plan.files) {
    const marker = file.exists ? chalk.yellow('overwrite') : chalk.green('create   ');
    console.log(`  ${marker} ${file.path}`);
  }
  for (const cmd of plan.commands) {
    console.log(`  ${chalk.dim('$')} ${cmd}`);
  }
  console.log();
}

function printResult(result: ProjectCreationResult): void {
  console.log();
  log.success(`Created ${result.template} project at ${result.projectPath}`);

  for (const file of result.files) {
    console.log(`  ${chalk.dim('+')} ${file.path}`);
  }

  const failed = result.commands.filter((cmd) => !cmd.success);
  if (failed.length > 0) {
    console.log();
    console.log(chalk.yellow(`${failed.length} post-create command(s) failed:`));
    for (const cmd of failed) {
      console.log(`  ${chalk.dim('$')} ${cmd.command}`);
    }
  }

  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  cd ${chalk.cyan(result.projectPath)}`);
}
