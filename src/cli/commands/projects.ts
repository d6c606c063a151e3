/**
 * CLI command listing the projects in the configured projects directory.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { expandHome } from '../../core/config/index.js';
import { formatModified, listProjects } from '../../core/projects/index.js';
import { failCommand, loadCliConfig } from '../shared.js';

interface ProjectsCommandOptions {
  dir?: string;
  json?: boolean;
}

/**
 * Create the projects command.
 */
export function createProjectsCommand(): Command {
  return new Command('projects')
    .description('List projects in the projects directory')
    .option('-d, --dir <path>', 'Projects directory (default: config projects_dir)')
    .option('--json', 'Output as JSON')
    .action(async (options: ProjectsCommandOptions, command: Command) => {
      try {
        await runProjects(options, command);
      } catch (error) {
        failCommand(error);
      }
    });
}

async function runProjects(options: ProjectsCommandOptions, command: Command): Promise<void> {
  const config = await loadCliConfig(command);
  const projectsDir = expandHome(options.dir ?? config.projects_dir);
  const projects = await listProjects(projectsDir);

  if (options.json) {
    console.log(JSON.stringify(projects ?? [], null, 2));
    return;
  }

  if (projects === null) {
    console.log(chalk.yellow(`No projects directory found at ${projectsDir}.`));
    return;
  }

  if (projects.length === 0) {
    console.log(chalk.dim(`No projects in ${projectsDir}.`));
    return;
  }

  console.log();
  console.log(chalk.bold(`Projects in ${projectsDir}:`));
  console.log();
  const width = Math.max(...projects.map((p) => p.name.length));
  for (const project of projects) {
    console.log(`  ${chalk.cyan(project.name.padEnd(width))}  ${chalk.dim(formatModified(project.modified))}  ${project.path}`);
  }
  console.log();
}
