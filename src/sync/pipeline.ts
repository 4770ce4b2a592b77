/**
 * dataset-sync - Pipeline Driver
 *
 * Runs the two independent halves of a sync against one local scan:
 *   assets:  probe -> plan -> batched commits -> manifest   (dataset hub)
 *   mirror:  clone -> overlay -> commit + push              (git host)
 *
 * A missing local directory aborts before any network call. Past that point
 * neither half can stop the other from running; the run succeeds only if
 * neither failed.
 */

import type { Inventory, PipelineResult, SyncOutcome, MirrorOutcome, UploadBatch, UploadPlan } from '../core/types.js';
import type { SyncSettings } from '../core/config.js';
import { createHubStore, type RemoteStore } from '../core/hub.js';
import { nodeGit, type GitClient } from '../core/git.js';
import { TerminalCommitFailure, describeError, type TransientCommitFailure, type TransportAttempt } from '../core/errors.js';
import { buildInventory } from './scan.js';
import { probeRemote, type ProbeResult } from './probe.js';
import { planUpload } from './plan.js';
import { partitionBatches, commitBatches, commitWithRetry, type RetryOptions, type Sleeper } from './commit.js';
import { buildManifest, fetchRemoteManifest, shouldUploadManifest, MANIFEST_FILE } from './manifest.js';
import { syncMirror } from './mirror.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineEvents {
  onInventory?: (inventory: Inventory) => void;
  onProbe?: (probe: ProbeResult) => void;
  onPlan?: (plan: UploadPlan, batches: UploadBatch[]) => void;
  onBatchStart?: (batch: UploadBatch, totalBatches: number) => void;
  onBatchCommitted?: (batch: UploadBatch, totalBatches: number, attempts: number) => void;
  onRetry?: (failure: TransientCommitFailure, delayMs: number) => void;
  onManifest?: (path: string) => void;
  onMirrorStart?: (files: number) => void;
  onCloneFallback?: (attempt: TransportAttempt) => void;
}

export interface PipelineOptions {
  dryRun?: boolean;
  hub?: boolean;                   // Run the asset pipeline (default true)
  mirror?: boolean;                // Run the mirror (default true)
  store?: RemoteStore | null;      // Defaults to the hub store from settings
  git?: GitClient;
  sleep?: Sleeper;
  events?: PipelineEvents;
}

function skippedAssets(attempted: number, dryRun: boolean, reason: string): SyncOutcome {
  return {
    status: 'skipped',
    attempted,
    skipped: 0,
    uploaded: 0,
    manifestUploaded: false,
    degradedProbe: false,
    dryRun,
    reason,
  };
}

function skippedMirror(files: number, reason: string): MirrorOutcome {
  return { status: 'skipped', files, committed: false, pushed: false, reason };
}

// ============================================================================
// Asset Pipeline
// ============================================================================

export async function syncAssets(
  inventory: Inventory,
  settings: SyncSettings,
  store: RemoteStore,
  options: Pick<PipelineOptions, 'dryRun' | 'sleep' | 'events'> = {}
): Promise<SyncOutcome> {
  const { events = {} } = options;
  const dryRun = options.dryRun ?? false;

  const outcome: SyncOutcome = {
    status: 'ok',
    attempted: inventory.assets.length,
    skipped: 0,
    uploaded: 0,
    manifestUploaded: false,
    degradedProbe: false,
    dryRun,
  };

  const probe = await probeRemote(store);
  events.onProbe?.(probe);
  outcome.degradedProbe = probe.degraded;

  const plan = planUpload(inventory.assets, probe.paths);
  const batches = partitionBatches(plan.toUpload, settings.batchSize);
  events.onPlan?.(plan, batches);
  outcome.skipped = plan.skipped;

  if (dryRun) {
    return outcome;
  }

  const retry: RetryOptions = {
    maxRetries: settings.maxRetries,
    retryDelayMs: settings.retryDelayMs,
    sleep: options.sleep,
    onRetry: events.onRetry,
  };

  const result = await commitBatches(store, batches, {
    ...retry,
    onBatchStart: events.onBatchStart,
    onBatchCommitted: events.onBatchCommitted,
  });
  outcome.uploaded = result.uploaded;

  if (result.error) {
    return { ...outcome, status: 'failed', failedBatch: result.failedBatch, error: result.error.message };
  }

  if (!settings.manifest || !inventory.annotationsPath) {
    return outcome;
  }

  // Annotation edits change the manifest without adding images
  const manifest = buildManifest(inventory.assets);
  if (shouldUploadManifest(manifest, await fetchRemoteManifest(store, probe.paths))) {
    try {
      await commitWithRetry(
        store,
        [{ path: MANIFEST_FILE, content: manifest }],
        `Update ${MANIFEST_FILE} (${inventory.assets.length} images)`,
        batches.length + 1,
        retry
      );
      outcome.manifestUploaded = true;
      events.onManifest?.(MANIFEST_FILE);
    } catch (error) {
      if (!(error instanceof TerminalCommitFailure)) throw error;
      return {
        ...outcome,
        status: 'failed',
        error: `Manifest upload failed after ${error.attempts} attempt(s): ${describeError(error.cause)}`,
      };
    }
  }

  return outcome;
}

// ============================================================================
// Full Run
// ============================================================================

export async function runSync(settings: SyncSettings, options: PipelineOptions = {}): Promise<PipelineResult> {
  const { events = {} } = options;
  const dryRun = options.dryRun ?? false;

  // Fatal: nothing below runs if the local tree is missing
  const inventory = await buildInventory(settings);
  events.onInventory?.(inventory);

  let assets: SyncOutcome;
  const store = options.store !== undefined ? options.store : createHubStore(settings.hub);
  if (options.hub === false) {
    assets = skippedAssets(inventory.assets.length, dryRun, 'Disabled');
  } else if (!store) {
    assets = skippedAssets(inventory.assets.length, dryRun, 'No hub repository configured');
  } else {
    try {
      assets = await syncAssets(inventory, settings, store, options);
    } catch (error) {
      console.error(`[sync] Asset pipeline aborted: ${describeError(error)}`);
      assets = {
        status: 'failed',
        attempted: inventory.assets.length,
        skipped: 0,
        uploaded: 0,
        manifestUploaded: false,
        degradedProbe: false,
        dryRun,
        error: describeError(error),
      };
    }
  }

  let mirror: MirrorOutcome;
  const mirrorRepo = settings.mirror.repo;
  if (options.mirror === false) {
    mirror = skippedMirror(inventory.ancillary.length, 'Disabled');
  } else if (!mirrorRepo) {
    mirror = skippedMirror(inventory.ancillary.length, 'No mirror repository configured');
  } else if (dryRun) {
    mirror = skippedMirror(inventory.ancillary.length, 'Dry run');
  } else {
    events.onMirrorStart?.(inventory.ancillary.length);
    try {
      mirror = await syncMirror(
        inventory.ancillary,
        { ...settings.mirror, repo: mirrorRepo },
        options.git ?? nodeGit,
        { root: inventory.root, onFallback: events.onCloneFallback }
      );
    } catch (error) {
      console.error(`[mirror] Mirror sync aborted: ${describeError(error)}`);
      mirror = { status: 'failed', files: inventory.ancillary.length, committed: false, pushed: false, error: describeError(error) };
    }
  }

  return {
    inventory: {
      assets: inventory.assets.length,
      ancillary: inventory.ancillary.length,
      annotated: inventory.annotated,
    },
    assets,
    mirror,
    success: assets.status !== 'failed' && mirror.status !== 'failed',
  };
}
