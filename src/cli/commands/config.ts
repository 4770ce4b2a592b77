/**
 * Config Commands
 *
 * config show - print resolved settings (token masked)
 * config init - write a starter dataset-sync.config.json
 */

import type { Command } from 'commander';

import { initConfigFile, redactSettings, resolveSettings } from '../../core/config.js';
import { c } from '../colors.js';
import { reportFatal, type CommonOptions } from '../helpers.js';

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Show or create the project configuration');

  configCmd
    .command('show')
    .description('Print the resolved settings')
    .argument('[root]', 'Project root directory', '.')
    .option('-c, --config <file>', 'Config file')
    .action(async (root: string, options: CommonOptions) => {
      try {
        const settings = await resolveSettings({ root, configPath: options.config });
        console.log(JSON.stringify(redactSettings(settings), null, 2));
      } catch (error) {
        reportFatal(error);
      }
    });

  configCmd
    .command('init')
    .description('Write a starter config file')
    .argument('[root]', 'Project root directory', '.')
    .action(async (root: string) => {
      try {
        const filePath = await initConfigFile(root);
        console.log(c.success(`Config written to ${filePath}`));
        console.log(c.dim('Set HF_TOKEN in the environment or .env.local; it is never read from the config file.'));
      } catch (error) {
        reportFatal(error);
      }
    });
}
