/**
 * Git utilities for the source mirror
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface GitResult {
  success: boolean;
  committed: boolean;
  pushed: boolean;
  message?: string;
  error?: string;
}

/**
 * The git operations the mirror needs. Tests substitute a fake.
 */
export interface GitClient {
  clone(url: string, branch: string, dest: string): Promise<void>;
  addAll(dir: string): Promise<void>;
  status(dir: string): Promise<string>;
  commit(dir: string, message: string): Promise<void>;
  push(dir: string): Promise<void>;
}

async function git(args: string[], cwd?: string): Promise<string> {
  const { stdout } = await execFileAsync('git', args, {
    cwd,
    maxBuffer: 32 * 1024 * 1024,
    // Fail instead of waiting on a credential prompt
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
  });
  return stdout;
}

export const nodeGit: GitClient = {
  async clone(url, branch, dest) {
    await git(['clone', '--branch', branch, url, dest]);
  },
  async addAll(dir) {
    await git(['add', '-A'], dir);
  },
  async status(dir) {
    return git(['status', '--porcelain'], dir);
  },
  async commit(dir, message) {
    await git(['commit', '-m', message], dir);
  },
  async push(dir) {
    await git(['push'], dir);
  },
};

/**
 * Check if there are uncommitted changes
 */
export async function hasChanges(dir: string, client: GitClient = nodeGit): Promise<boolean> {
  const stdout = await client.status(dir);
  return stdout.trim().length > 0;
}

/**
 * Git add, commit, and push. Nothing is committed when the tree is clean.
 */
export async function gitCommitAndPush(
  dir: string,
  message: string,
  client: GitClient = nodeGit
): Promise<GitResult> {
  try {
    await client.addAll(dir);

    if (!(await hasChanges(dir, client))) {
      return { success: true, committed: false, pushed: false, message: 'No changes to commit' };
    }

    await client.commit(dir, message);
  } catch (error) {
    return { success: false, committed: false, pushed: false, error: String(error) };
  }

  try {
    await client.push(dir);
    return { success: true, committed: true, pushed: true, message: 'Committed and pushed' };
  } catch (pushError) {
    const errMsg = String(pushError);
    console.error(`[git] Push failed: ${errMsg}`);
    return {
      success: false,
      committed: true,
      pushed: false,
      message: 'Committed but push failed',
      error: `Push failed: ${errMsg}`,
    };
  }
}
