/**
 * dataset-sync - Batched Committer
 *
 * Each batch is its own atomic commit, made in scan order. A batch that
 * exhausts its attempts halts the run: later batches are never attempted, so
 * the remote history is always a clean prefix of successful batches.
 */

import type { InventoryEntry, UploadBatch } from '../core/types.js';
import type { RemoteFile, RemoteStore } from '../core/hub.js';
import { TerminalCommitFailure, TransientCommitFailure } from '../core/errors.js';

// ============================================================================
// Types
// ============================================================================

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries: number;      // Total attempts per commit
  retryDelayMs: number;    // Fixed wait between attempts
  sleep?: Sleeper;
  onRetry?: (failure: TransientCommitFailure, delayMs: number) => void;
}

export interface CommitOptions extends RetryOptions {
  onBatchStart?: (batch: UploadBatch, totalBatches: number) => void;
  onBatchCommitted?: (batch: UploadBatch, totalBatches: number, attempts: number) => void;
}

export interface CommitResult {
  uploaded: number;
  committedBatches: number;
  failedBatch?: number;
  error?: TerminalCommitFailure;
}

// ============================================================================
// Partitioning
// ============================================================================

export function partitionBatches(entries: readonly InventoryEntry[], size: number): UploadBatch[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: UploadBatch[] = [];
  for (let i = 0; i < entries.length; i += size) {
    batches.push({ index: batches.length + 1, entries: entries.slice(i, i + size) });
  }
  return batches;
}

export function toRemoteFiles(entries: readonly InventoryEntry[]): RemoteFile[] {
  return entries.map(entry => ({ path: entry.relativePath, absolutePath: entry.absolutePath }));
}

export function batchMessage(batch: UploadBatch, totalBatches: number): string {
  return `Upload batch ${batch.index}/${totalBatches} (${batch.entries.length} files)`;
}

// ============================================================================
// Retry
// ============================================================================

/**
 * Commit `files` with up to `maxRetries` attempts. Resolves with the number of
 * attempts used; rejects with TerminalCommitFailure once they are exhausted.
 */
export async function commitWithRetry(
  store: RemoteStore,
  files: RemoteFile[],
  message: string,
  batchIndex: number,
  options: RetryOptions
): Promise<number> {
  const { maxRetries, retryDelayMs, onRetry } = options;
  const wait = options.sleep ?? sleep;

  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new RangeError(`maxRetries must be a positive integer, got ${maxRetries}`);
  }

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await store.commit(files, message);
      return attempt;
    } catch (error) {
      lastError = error;
      if (attempt < maxRetries) {
        onRetry?.(new TransientCommitFailure(batchIndex, attempt, error), retryDelayMs);
        await wait(retryDelayMs);
      }
    }
  }

  throw new TerminalCommitFailure(batchIndex, maxRetries, lastError);
}

// ============================================================================
// Batches
// ============================================================================

export async function commitBatches(
  store: RemoteStore,
  batches: readonly UploadBatch[],
  options: CommitOptions
): Promise<CommitResult> {
  const { onBatchStart, onBatchCommitted } = options;
  const result: CommitResult = { uploaded: 0, committedBatches: 0 };

  for (const batch of batches) {
    onBatchStart?.(batch, batches.length);

    try {
      const attempts = await commitWithRetry(
        store,
        toRemoteFiles(batch.entries),
        batchMessage(batch, batches.length),
        batch.index,
        options
      );
      result.uploaded += batch.entries.length;
      result.committedBatches++;
      onBatchCommitted?.(batch, batches.length, attempts);
    } catch (error) {
      if (!(error instanceof TerminalCommitFailure)) throw error;
      result.failedBatch = batch.index;
      result.error = error;
      break;
    }
  }

  return result;
}
