/**
 * Status Command
 *
 * Scan, probe and plan without writing anything.
 */

import type { Command } from 'commander';

import { resolveSettings } from '../../core/config.js';
import { runSync } from '../../sync/pipeline.js';
import { c } from '../colors.js';
import { progressEvents, reportFatal, toOverrides, type RunOptions } from '../helpers.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show how many images would be uploaded')
    .argument('[root]', 'Project root directory', '.')
    .option('-c, --config <file>', 'Config file')
    .option('--hub-repo <repo>', 'Dataset repository (owner/name)')
    .action(async (root: string, options: RunOptions) => {
      try {
        const settings = await resolveSettings({ root, configPath: options.config, overrides: toOverrides(options) });
        const result = await runSync(settings, { dryRun: true, mirror: false, events: progressEvents() });

        if (result.assets.status === 'skipped') {
          console.log(c.dim(`\nDataset hub skipped: ${result.assets.reason ?? 'disabled'}`));
        } else if (result.assets.status === 'failed') {
          console.error(c.error(result.assets.error ?? 'Status check failed'));
          process.exitCode = 1;
        } else {
          const pending = result.assets.attempted - result.assets.skipped;
          console.log(pending === 0 ? c.success('\nUp to date.') : `\n${pending} image(s) pending upload.`);
        }
      } catch (error) {
        reportFatal(error);
      }
    });
}
