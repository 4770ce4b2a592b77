/**
 * CLI Helper Functions
 *
 * Shared option parsing, progress output and summaries for CLI commands.
 */

import { InvalidArgumentError } from 'commander';

import type { PipelineResult, SyncOutcome, MirrorOutcome } from '../core/types.js';
import type { SettingsOverrides } from '../core/config.js';
import type { PipelineEvents } from '../sync/pipeline.js';
import { c } from './colors.js';

// ============================================================================
// Options
// ============================================================================

export interface CommonOptions {
  config?: string;
}

export interface RunOptions extends CommonOptions {
  hubRepo?: string;
  mirrorRepo?: string;
  batchSize?: number;
  maxRetries?: number;
  retryDelay?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function toOverrides(options: RunOptions): SettingsOverrides {
  return {
    hubRepo: options.hubRepo,
    mirrorRepo: options.mirrorRepo,
    batchSize: options.batchSize,
    maxRetries: options.maxRetries,
    retryDelayMs: options.retryDelay,
  };
}

/**
 * Print a fatal error and set a failing exit code
 */
export function reportFatal(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(c.error(message));
  process.exitCode = 1;
}

// ============================================================================
// Progress
// ============================================================================

export function progressEvents(): PipelineEvents {
  return {
    onInventory: (inventory) => {
      const annotated = inventory.annotationsPath
        ? c.dim(` (${inventory.annotated} annotated)`)
        : '';
      console.log(`Found ${c.bold(String(inventory.assets.length))} images${annotated}, ${c.bold(String(inventory.ancillary.length))} project files`);
    },
    onProbe: (probe) => {
      if (probe.degraded) {
        console.log(c.warning(`Remote listing unavailable, uploading as if the repository were empty`));
      } else {
        console.log(`Remote already has ${probe.paths.size} files`);
      }
    },
    onPlan: (plan, batches) => {
      console.log(`To upload: ${c.bold(String(plan.toUpload.length))} ${c.dim(`(skipped ${plan.skipped}, ${batches.length} batches)`)}`);
    },
    onBatchStart: (batch, total) => {
      console.log(`  ${c.info(`Batch ${batch.index}/${total}`)}: ${batch.entries.length} files...`);
    },
    onBatchCommitted: (batch, total, attempts) => {
      const note = attempts > 1 ? c.dim(` after ${attempts} attempts`) : '';
      console.log(`  ${c.success('✓')} Batch ${batch.index}/${total} committed${note}`);
    },
    onRetry: (failure, delayMs) => {
      console.log(c.warning(`  Attempt ${failure.attempt} for batch ${failure.batchIndex} failed, retrying in ${Math.round(delayMs / 1000)}s`));
    },
    onManifest: (file) => {
      console.log(`  ${c.success('✓')} ${c.file(file)} updated`);
    },
    onMirrorStart: (files) => {
      console.log(`\nMirroring ${files} project files...`);
    },
    onCloneFallback: (attempt) => {
      console.log(c.warning(`  Clone via ${attempt.transport} failed, trying next transport`));
    },
  };
}

// ============================================================================
// Summary
// ============================================================================

function describeAssets(outcome: SyncOutcome): string {
  if (outcome.status === 'skipped') return c.dim(`skipped (${outcome.reason ?? 'disabled'})`);

  const counts = `${outcome.uploaded} uploaded, ${outcome.skipped} skipped of ${outcome.attempted}`;
  if (outcome.status === 'failed') {
    const where = outcome.failedBatch !== undefined ? ` at batch ${outcome.failedBatch}` : '';
    return `${c.error(`failed${where}`)} ${counts}\n    ${outcome.error ?? ''}`;
  }
  const label = outcome.dryRun ? c.info('dry run') : c.success('ok');
  return `${label} ${counts}${outcome.manifestUploaded ? ', manifest updated' : ''}`;
}

function describeMirror(outcome: MirrorOutcome): string {
  if (outcome.status === 'skipped') return c.dim(`skipped (${outcome.reason ?? 'disabled'})`);
  if (outcome.status === 'failed') return `${c.error('failed')} ${outcome.error ?? ''}`;
  if (!outcome.committed) return `${c.success('ok')} already up to date`;
  return `${c.success('ok')} committed and pushed${outcome.transport ? c.dim(` via ${outcome.transport}`) : ''}`;
}

export function printSummary(result: PipelineResult): void {
  console.log('');
  console.log(c.header('Summary'));
  console.log(`  Dataset hub: ${describeAssets(result.assets)}`);
  console.log(`  Git mirror:  ${describeMirror(result.mirror)}`);
  console.log('');
  console.log(result.success ? c.success('All done.') : c.warning('Some steps failed, see above.'));
}
