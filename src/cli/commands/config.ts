/**
 * CLI command for reading and changing the user configuration.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import {
  expandHome,
  getConfigPath,
  getConfigValue,
  saveConfig,
  setConfigValue,
} from '../../core/config/index.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';
import { failCommand, getGlobalOptions, loadCliConfig } from '../shared.js';

interface ConfigCommandOptions {
  json?: boolean;
}

/**
 * Create the config command.
 */
export function createConfigCommand(): Command {
  const cmd = new Command('config').description('Show or change skelly settings');

  cmd.addCommand(
    new Command('show')
      .description('Print the current configuration')
      .option('--json', 'Output as JSON')
      .action(async (options: ConfigCommandOptions, command: Command) => {
        try {
          const config = await loadCliConfig(command);
          console.log(options.json ? JSON.stringify(config, null, 2) : stringifyYaml(config).trimEnd());
        } catch (error) {
          failCommand(error);
        }
      })
  );

  cmd.addCommand(
    new Command('get')
      .description('Print one setting (use defaults.<name> for default variables)')
      .argument('<key>', 'Setting name')
      .action(async (key: string, _options: ConfigCommandOptions, command: Command) => {
        try {
          const config = await loadCliConfig(command);
          const value = getConfigValue(config, key);
          console.log(value ?? '');
        } catch (error) {
          failCommand(error);
        }
      })
  );

  cmd.addCommand(
    new Command('set')
      .description('Change one setting (use defaults.<name> for default variables)')
      .argument('<key>', 'Setting name')
      .argument('<value>', 'New value')
      .action(async (key: string, value: string, _options: ConfigCommandOptions, command: Command) => {
        try {
          const config = await loadCliConfig(command);
          const updated = setConfigValue(config, key, value);
          const savedTo = await saveConfig(updated, getGlobalOptions(command).config);
          log.success(`Set ${key} = ${value}`);
          console.log(chalk.dim(`Saved to ${savedTo}`));
        } catch (error) {
          failCommand(error);
        }
      })
  );

  cmd.addCommand(
    new Command('path')
      .description('Print the config file location')
      .action((_options: ConfigCommandOptions, command: Command) => {
        console.log(expandHome(getGlobalOptions(command).config ?? getConfigPath()));
      })
  );

  return cmd;
}
