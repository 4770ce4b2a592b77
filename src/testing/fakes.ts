/**
 * In-process stand-ins for the dataset hub and git, plus fixture helpers.
 * Used by tests only.
 */

import { mkdir, mkdtemp, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import type { RemoteFile, RemoteStore } from '../core/hub.js';
import type { GitClient } from '../core/git.js';
import type { InventoryEntry } from '../core/types.js';
import {
  DEFAULT_ASSET_EXTENSIONS,
  DEFAULT_EXCLUDE_DIRS,
  DEFAULT_EXCLUDE_FILES,
  type SyncSettings,
} from '../core/config.js';

// ============================================================================
// Remote store
// ============================================================================

export interface CommitCall {
  call: number;          // 1-based across the store's lifetime
  message: string;
  paths: string[];
  ok: boolean;
}

export class MemoryRemoteStore implements RemoteStore {
  readonly id = 'memory';
  readonly files = new Map<string, string>();   // path -> content or source path
  readonly calls: CommitCall[] = [];
  listCalls = 0;

  /** Return true to make the given commit call fail */
  failWhen?: (call: number, message: string) => boolean;
  listError?: Error;
  readError?: Error;

  constructor(existing: string[] = []) {
    for (const p of existing) this.files.set(p, '');
  }

  async listPaths(): Promise<Set<string>> {
    this.listCalls++;
    if (this.listError) throw this.listError;
    return new Set(this.files.keys());
  }

  async readText(path: string): Promise<string | null> {
    if (this.readError) throw this.readError;
    return this.files.get(path) ?? null;
  }

  async commit(files: RemoteFile[], message: string): Promise<void> {
    const call = this.calls.length + 1;
    const ok = !(this.failWhen?.(call, message) ?? false);
    this.calls.push({ call, message, paths: files.map(f => f.path), ok });

    if (!ok) throw new Error(`commit ${call} rejected`);

    for (const file of files) {
      this.files.set(file.path, 'content' in file ? file.content : file.absolutePath);
    }
  }

  committedMessages(): string[] {
    return this.calls.filter(c => c.ok).map(c => c.message);
  }
}

// ============================================================================
// Git
// ============================================================================

export class FakeGit implements GitClient {
  readonly log: string[] = [];
  failingUrls = new Set<string>();
  statusOutput = ' M README.md\n';
  pushError?: Error;

  async clone(url: string, branch: string, dest: string): Promise<void> {
    this.log.push(`clone ${branch} ${url}`);
    await mkdir(dest, { recursive: true });
    if (this.failingUrls.has(url)) {
      // Leave a partial checkout behind, as a real failed clone can
      await writeFile(path.join(dest, 'partial'), '');
      throw new Error(`fatal: could not read from ${url}`);
    }
  }

  async addAll(): Promise<void> {
    this.log.push('add');
  }

  async status(): Promise<string> {
    this.log.push('status');
    return this.statusOutput;
  }

  async commit(_dir: string, message: string): Promise<void> {
    this.log.push(`commit ${message}`);
  }

  async push(): Promise<void> {
    this.log.push('push');
    if (this.pushError) throw this.pushError;
  }
}

// ============================================================================
// Fixtures
// ============================================================================

export async function makeTempDir(prefix = 'dataset-sync-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Create files under `root`. Keys are forward-slash relative paths.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function entry(relativePath: string, metadata?: Record<string, string>): InventoryEntry {
  return {
    relativePath,
    absolutePath: `/data/images/${relativePath}`,
    category: 'asset',
    ...(metadata ? { metadata } : {}),
  };
}

export function makeSettings(root: string, overrides: Partial<SyncSettings> = {}): SyncSettings {
  return {
    root,
    assetsDir: 'images',
    assetExtensions: DEFAULT_ASSET_EXTENSIONS,
    excludeDirs: DEFAULT_EXCLUDE_DIRS,
    excludeFiles: DEFAULT_EXCLUDE_FILES,
    annotations: 'annotations.json',
    manifest: true,
    batchSize: 500,
    maxRetries: 3,
    retryDelayMs: 5000,
    hub: { repo: 'test-owner/test-dataset', branch: 'main' },
    mirror: {
      repo: 'test-owner/test-project',
      branch: 'main',
      host: 'github.com',
      transports: ['ssh', 'https'],
      workDir: path.join(root, '..', `${path.basename(root)}-mirror`),
      commitMessage: 'Update dataset files',
    },
    ...overrides,
  };
}
