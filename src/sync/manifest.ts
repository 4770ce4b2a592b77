/**
 * dataset-sync - Dataset Manifest
 *
 * metadata.jsonl at the repository root lets the hub's image-folder loader
 * join each image with its annotation fields.
 */

import type { InventoryEntry } from '../core/types.js';
import type { RemoteStore } from '../core/hub.js';
import { describeError } from '../core/errors.js';
import { imageIdOf } from './annotations.js';

export const MANIFEST_FILE = 'metadata.jsonl';

export function buildManifest(assets: readonly InventoryEntry[]): string {
  const lines = assets.map(entry =>
    JSON.stringify({
      file_name: entry.relativePath,
      image_id: imageIdOf(entry.relativePath),
      ...entry.metadata,
    })
  );
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * Current remote manifest, or null if it is absent or cannot be read.
 */
export async function fetchRemoteManifest(store: RemoteStore, remote: ReadonlySet<string>): Promise<string | null> {
  if (!remote.has(MANIFEST_FILE)) return null;

  try {
    return await store.readText(MANIFEST_FILE);
  } catch (error) {
    console.error(`[hub] Could not read ${MANIFEST_FILE} from ${store.id}, uploading it again: ${describeError(error)}`);
    return null;
  }
}

/**
 * Upload unless the remote already holds exactly this manifest.
 */
export function shouldUploadManifest(local: string, remote: string | null): boolean {
  return remote !== local;
}
