/**
 * dataset-sync - Remote State Prober
 *
 * Fail-open: when the remote can't be listed the run continues as if the
 * remote were empty. Worst case is re-uploading files that already exist.
 */

import type { RemoteStore } from '../core/hub.js';
import { describeError } from '../core/errors.js';

export interface ProbeResult {
  paths: ReadonlySet<string>;
  degraded: boolean;
  error?: string;
}

export async function probeRemote(store: RemoteStore): Promise<ProbeResult> {
  try {
    const paths = await store.listPaths();
    return { paths, degraded: false };
  } catch (error) {
    const message = describeError(error);
    console.error(`[hub] Could not list remote files for ${store.id}, treating remote as empty: ${message}`);
    return { paths: new Set<string>(), degraded: true, error: message };
  }
}
