/**
 * dataset-sync - Source Mirror
 *
 * Mirrors ancillary files onto a git branch:
 * 1. Clone the branch into a fresh workspace, trying transports in order
 * 2. Copy the files over the working copy
 * 3. Commit and push only if `git status` reports changes
 *
 * Clone failure fails the mirror only; the asset pipeline is unaffected.
 */

import { copyFile, mkdir, rm } from 'fs/promises';
import path from 'path';

import type { InventoryEntry, MirrorOutcome } from '../core/types.js';
import { checkWorkDir, isWithin, type MirrorSettings, type TransportName } from '../core/config.js';
import { nodeGit, gitCommitAndPush, type GitClient } from '../core/git.js';
import { ConfigError, MirrorTransportFailure, describeError, type TransportAttempt } from '../core/errors.js';

// ============================================================================
// Transports
// ============================================================================

export interface TransportStrategy {
  name: string;
  url: string;
}

const TRANSPORT_URLS: Record<TransportName, (host: string, repo: string) => string> = {
  ssh: (host, repo) => `git@${host}:${repo}.git`,
  https: (host, repo) => `https://${host}/${repo}.git`,
};

export function resolveTransports(names: readonly TransportName[], host: string, repo: string): TransportStrategy[] {
  return names.map(name => ({ name, url: TRANSPORT_URLS[name](host, repo) }));
}

/**
 * Clone `branch` into `dest` with the first transport that works.
 * Resolves with that transport's name.
 */
export async function cloneWithFallback(
  transports: readonly TransportStrategy[],
  branch: string,
  dest: string,
  git: GitClient = nodeGit,
  onFallback?: (attempt: TransportAttempt) => void
): Promise<string> {
  const attempts: TransportAttempt[] = [];

  for (const transport of transports) {
    // A failed clone can leave a partial directory behind
    await rm(dest, { recursive: true, force: true });

    try {
      await git.clone(transport.url, branch, dest);
      return transport.name;
    } catch (error) {
      const attempt = { transport: transport.name, url: transport.url, error: describeError(error) };
      attempts.push(attempt);
      onFallback?.(attempt);
    }
  }

  throw new MirrorTransportFailure(attempts);
}

// ============================================================================
// Mirror Sync
// ============================================================================

export interface MirrorOptions {
  root?: string;                   // Project root; the workspace may not overlap it
  onFallback?: (attempt: TransportAttempt) => void;
}

export async function overlayFiles(files: readonly InventoryEntry[], workDir: string): Promise<void> {
  for (const file of files) {
    const target = path.join(workDir, file.relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await copyFile(file.absolutePath, target);
  }
}

export async function syncMirror(
  files: readonly InventoryEntry[],
  settings: MirrorSettings & { repo: string },
  git: GitClient = nodeGit,
  options: MirrorOptions = {}
): Promise<MirrorOutcome> {
  const outcome: MirrorOutcome = { status: 'ok', files: files.length, committed: false, pushed: false };

  if (files.length === 0) {
    return outcome;
  }

  const workDir = path.resolve(settings.workDir);
  // The workspace is wiped before cloning
  if (options.root) checkWorkDir(workDir, options.root);
  const inside = files.find(file => isWithin(workDir, file.absolutePath));
  if (inside) {
    throw new ConfigError(`mirror.workDir must not contain mirrored files (${inside.absolutePath})`);
  }
  await mkdir(path.dirname(workDir), { recursive: true });

  const transports = resolveTransports(settings.transports, settings.host, settings.repo);
  try {
    outcome.transport = await cloneWithFallback(transports, settings.branch, workDir, git, (attempt) => {
      console.error(`[mirror] Clone via ${attempt.transport} failed: ${attempt.error}`);
      options.onFallback?.(attempt);
    });
  } catch (error) {
    if (!(error instanceof MirrorTransportFailure)) throw error;
    return { ...outcome, status: 'failed', error: error.message };
  }

  await overlayFiles(files, workDir);

  const result = await gitCommitAndPush(workDir, settings.commitMessage, git);
  return {
    ...outcome,
    status: result.success ? 'ok' : 'failed',
    committed: result.committed,
    pushed: result.pushed,
    ...(result.error ? { error: result.error } : {}),
  };
}
