/**
 * Sync Command
 *
 * One full run: upload new images to the dataset hub, then mirror project
 * files to the git host.
 */

import type { Command } from 'commander';

import { resolveSettings } from '../../core/config.js';
import { runSync } from '../../sync/pipeline.js';
import { c } from '../colors.js';
import {
  parsePositiveInt,
  parseNonNegativeInt,
  progressEvents,
  printSummary,
  reportFatal,
  toOverrides,
  type RunOptions,
} from '../helpers.js';

interface SyncCommandOptions extends RunOptions {
  dryRun?: boolean;
  hub: boolean;
  mirror: boolean;
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Upload new images to the dataset hub and mirror project files to git')
    .argument('[root]', 'Project root directory', '.')
    .option('-c, --config <file>', 'Config file (default: <root>/dataset-sync.config.json)')
    .option('--hub-repo <repo>', 'Dataset repository (owner/name)')
    .option('--mirror-repo <repo>', 'Git repository for project files (owner/name)')
    .option('--batch-size <n>', 'Files per commit', parsePositiveInt)
    .option('--max-retries <n>', 'Attempts per batch', parsePositiveInt)
    .option('--retry-delay <ms>', 'Wait between attempts in milliseconds', parseNonNegativeInt)
    .option('--dry-run', 'Show what would be uploaded without committing anything')
    .option('--no-hub', 'Skip the dataset hub upload')
    .option('--no-mirror', 'Skip the git mirror')
    .action(async (root: string, options: SyncCommandOptions) => {
      try {
        const settings = await resolveSettings({
          root,
          configPath: options.config,
          overrides: toOverrides(options),
        });

        console.log(`\n${c.title('dataset-sync')}${options.dryRun ? c.dim(' (dry run)') : ''}`);
        console.log(`Root: ${c.path(settings.root)}`);
        if (settings.hub.repo) console.log(`Hub:  ${c.info(`datasets/${settings.hub.repo}`)}`);
        if (settings.mirror.repo) console.log(`Git:  ${c.info(`${settings.mirror.host}/${settings.mirror.repo}`)}`);
        console.log('');

        const result = await runSync(settings, {
          dryRun: options.dryRun,
          hub: options.hub,
          mirror: options.mirror,
          events: progressEvents(),
        });

        printSummary(result);
        if (!result.success) process.exitCode = 1;
      } catch (error) {
        reportFatal(error);
      }
    });
}
