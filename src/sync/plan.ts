/**
 * dataset-sync - Diff Planner
 *
 * Pure: no I/O. Decides which local assets still need uploading.
 */

import type { InventoryEntry, UploadPlan } from '../core/types.js';

export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * An entry is skipped iff its normalized path is already in `remote`.
 * Scan order is preserved in `toUpload`.
 */
export function planUpload(
  local: readonly InventoryEntry[],
  remote: ReadonlySet<string>
): UploadPlan {
  const toUpload: InventoryEntry[] = [];

  for (const entry of local) {
    if (!remote.has(normalizePath(entry.relativePath))) {
      toUpload.push(entry);
    }
  }

  return { toUpload, skipped: local.length - toUpload.length };
}
