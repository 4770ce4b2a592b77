/**
 * Scan Command
 */

import type { Command } from 'commander';

import { resolveSettings } from '../../core/config.js';
import { buildInventory } from '../../sync/scan.js';
import { c } from '../colors.js';
import { reportFatal, type CommonOptions } from '../helpers.js';

interface ScanCommandOptions extends CommonOptions {
  list?: boolean;
}

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('List the images and project files found locally')
    .argument('[root]', 'Project root directory', '.')
    .option('-c, --config <file>', 'Config file')
    .option('-l, --list', 'Print every path')
    .action(async (root: string, options: ScanCommandOptions) => {
      try {
        const settings = await resolveSettings({ root, configPath: options.config });
        const inventory = await buildInventory(settings);

        console.log(`${c.bold('Images:')}        ${inventory.assets.length} ${c.dim(`in ${inventory.assetsDir}`)}`);
        console.log(`${c.bold('Annotated:')}     ${inventory.annotationsPath ? inventory.annotated : c.dim('no annotation file')}`);
        console.log(`${c.bold('Project files:')} ${inventory.ancillary.length}`);

        if (options.list) {
          console.log(`\n${c.header('Images')}`);
          for (const entry of inventory.assets) console.log(`  ${c.file(entry.relativePath)}`);
          console.log(`\n${c.header('Project files')}`);
          for (const entry of inventory.ancillary) console.log(`  ${entry.relativePath}`);
        }
      } catch (error) {
        reportFatal(error);
      }
    });
}
