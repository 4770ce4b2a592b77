/**
 * dataset-sync - Dataset Hub Store
 *
 * The pipeline only sees the RemoteStore interface. HubRemoteStore backs it
 * with a dataset repository on the Hugging Face Hub.
 */

import { pathToFileURL } from 'url';
import { listFiles, commit, downloadFile, type RepoDesignation } from '@huggingface/hub';

import type { HubSettings } from './config.js';

// ============================================================================
// Types
// ============================================================================

export type RemoteFile =
  | { path: string; absolutePath: string }   // Uploaded from disk
  | { path: string; content: string };       // Generated in memory

export interface RemoteStore {
  /** Human-readable identifier used in logs */
  readonly id: string;

  /** Every file path currently stored, relative to the repository root */
  listPaths(): Promise<Set<string>>;

  /** Text of a stored file, or null if it does not exist */
  readText(path: string): Promise<string | null>;

  /** One atomic commit adding or replacing `files` */
  commit(files: RemoteFile[], message: string): Promise<void>;
}

type CommitOperations = Parameters<typeof commit>[0]['operations'];

// ============================================================================
// Hugging Face Hub
// ============================================================================

export class HubRemoteStore implements RemoteStore {
  readonly id: string;
  private readonly repo: RepoDesignation;

  constructor(private readonly settings: HubSettings & { repo: string }) {
    this.id = `datasets/${settings.repo}@${settings.branch}`;
    this.repo = { type: 'dataset', name: settings.repo };
  }

  async listPaths(): Promise<Set<string>> {
    const paths = new Set<string>();

    for await (const entry of listFiles({
      repo: this.repo,
      recursive: true,
      revision: this.settings.branch,
      accessToken: this.settings.token,
      hubUrl: this.settings.endpoint,
    })) {
      if (entry.type === 'file') {
        paths.add(entry.path);
      }
    }

    return paths;
  }

  async readText(path: string): Promise<string | null> {
    const blob = await downloadFile({
      repo: this.repo,
      path,
      revision: this.settings.branch,
      accessToken: this.settings.token,
      hubUrl: this.settings.endpoint,
    });
    return blob ? blob.text() : null;
  }

  async commit(files: RemoteFile[], message: string): Promise<void> {
    // file: URLs are read lazily by the client during upload
    const operations: CommitOperations = files.map(file => ({
      operation: 'addOrUpdate' as const,
      path: file.path,
      content: 'content' in file ? new Blob([file.content]) : pathToFileURL(file.absolutePath),
    }));

    await commit({
      repo: this.repo,
      title: message,
      operations,
      branch: this.settings.branch,
      accessToken: this.settings.token,
      hubUrl: this.settings.endpoint,
    });
  }
}

export function createHubStore(settings: HubSettings): HubRemoteStore | null {
  if (!settings.repo) return null;
  return new HubRemoteStore({ ...settings, repo: settings.repo });
}
