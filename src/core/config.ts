/**
 * dataset-sync - Settings Loader
 *
 * Resolves the settings for a run from, in order of precedence:
 * CLI overrides > process.env > dataset-sync.config.json > defaults
 *
 * The hub token (HF_TOKEN) is env-only and never written to the config file.
 */

import { readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import { ConfigError, NotFoundError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export const TRANSPORTS = ['ssh', 'https'] as const;
export type TransportName = (typeof TRANSPORTS)[number];

export interface HubSettings {
  repo?: string;                 // owner/name of the dataset repository
  branch: string;
  endpoint?: string;             // Hub URL, e.g. a mirror
  token?: string;
}

export interface MirrorSettings {
  repo?: string;                 // owner/name on the git host
  branch: string;
  host: string;
  transports: TransportName[];
  workDir: string;
  commitMessage: string;
}

export interface SyncSettings {
  root: string;
  assetsDir: string;             // Relative to root
  assetExtensions: string[];
  ancillaryExtensions?: string[];
  excludeDirs: string[];
  excludeFiles: string[];        // File name patterns never mirrored
  annotations: string;           // Relative to root; only used if the file exists
  manifest: boolean;
  batchSize: number;
  maxRetries: number;
  retryDelayMs: number;
  hub: HubSettings;
  mirror: MirrorSettings;
}

export interface SettingsOverrides {
  hubRepo?: string;
  mirrorRepo?: string;
  batchSize?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const CONFIG_FILE_NAME = 'dataset-sync.config.json';

export const DEFAULT_ASSET_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp'];
export const DEFAULT_EXCLUDE_DIRS = ['.git', '__pycache__', 'node_modules'];
// dotenv files hold the hub token
export const DEFAULT_EXCLUDE_FILES = ['.env', '.env.*'];

const DEFAULTS = {
  assetsDir: 'images',
  annotations: 'annotations.json',
  manifest: true,
  batchSize: 500,
  maxRetries: 3,
  retryDelayMs: 5000,
  hubBranch: 'main',
  mirrorBranch: 'main',
  mirrorHost: 'github.com',
  commitMessage: 'Update dataset files',
};

export function defaultWorkDir(): string {
  return path.join(os.tmpdir(), 'dataset-sync-mirror');
}

// ============================================================================
// Schemas
// ============================================================================

const repoId = z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/name"');
const positiveInt = z.number().int().positive();

const FileConfigSchema = z.object({
  assetsDir: z.string().min(1).optional(),
  assetExtensions: z.array(z.string().min(1)).min(1).optional(),
  ancillaryExtensions: z.array(z.string().min(1)).optional(),
  excludeDirs: z.array(z.string().min(1)).optional(),
  excludeFiles: z.array(z.string().min(1)).optional(),
  annotations: z.string().min(1).optional(),
  manifest: z.boolean().optional(),
  batchSize: positiveInt.optional(),
  maxRetries: positiveInt.optional(),
  retryDelayMs: z.number().int().nonnegative().optional(),
  hub: z.object({
    repo: repoId.optional(),
    branch: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
  }).strict().optional(),
  mirror: z.object({
    repo: repoId.optional(),
    branch: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    transports: z.array(z.enum(TRANSPORTS)).min(1).optional(),
    workDir: z.string().min(1).optional(),
    commitMessage: z.string().min(1).optional(),
  }).strict().optional(),
}).strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

// `KEY=` in a .env template means unset
const envVar = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema.optional());

const EnvSchema = z.object({
  HF_TOKEN: envVar(z.string()),
  HF_ENDPOINT: envVar(z.string().url()),
  DATASET_SYNC_HUB_REPO: envVar(repoId),
  DATASET_SYNC_MIRROR_REPO: envVar(repoId),
  DATASET_SYNC_BATCH_SIZE: envVar(z.coerce.number().int().positive()),
  DATASET_SYNC_MAX_RETRIES: envVar(z.coerce.number().int().positive()),
  DATASET_SYNC_RETRY_DELAY_MS: envVar(z.coerce.number().int().nonnegative()),
});

const OverridesSchema = z.object({
  hubRepo: repoId.optional(),
  mirrorRepo: repoId.optional(),
  batchSize: positiveInt.optional(),
  maxRetries: positiveInt.optional(),
  retryDelayMs: z.number().int().nonnegative().optional(),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// ============================================================================
// Loading
// ============================================================================

export function getConfigPath(root: string): string {
  return path.join(root, CONFIG_FILE_NAME);
}

/**
 * Load and validate a config file. Returns null if the file doesn't exist.
 */
export async function loadConfigFile(filePath: string): Promise<FileConfig | null> {
  if (!existsSync(filePath)) {
    return null;
  }

  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON (${error instanceof Error ? error.message : String(error)})`, filePath);
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), filePath);
  }
  return parsed.data;
}

export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative));
}

/**
 * The mirror workspace is deleted before every clone, so it must share no
 * directory tree with the project.
 */
export function checkWorkDir(workDir: string, root: string): void {
  const work = path.resolve(workDir);
  const project = path.resolve(root);
  if (isWithin(project, work)) {
    throw new ConfigError(`mirror.workDir must be outside the project root (${work})`);
  }
  if (isWithin(work, project)) {
    throw new ConfigError(`mirror.workDir must not contain the project root (${work})`);
  }
}

function normalizeExtensions(extensions: string[]): string[] {
  return extensions.map(ext => {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
  });
}

/**
 * Resolve settings for a run. `configPath` must exist when given explicitly;
 * the default config file is optional.
 */
export async function resolveSettings(options: {
  root: string;
  configPath?: string;
  overrides?: SettingsOverrides;
  env?: NodeJS.ProcessEnv;
}): Promise<SyncSettings> {
  const root = path.resolve(options.root);
  const env = options.env ?? process.env;

  if (options.configPath && !existsSync(options.configPath)) {
    throw new NotFoundError(options.configPath, 'Config file');
  }

  const file = (await loadConfigFile(options.configPath ?? getConfigPath(root))) ?? {};

  const envParsed = EnvSchema.safeParse(env);
  if (!envParsed.success) {
    throw new ConfigError(formatIssues(envParsed.error), 'environment');
  }
  const fromEnv = envParsed.data;

  const overridesParsed = OverridesSchema.safeParse(options.overrides ?? {});
  if (!overridesParsed.success) {
    throw new ConfigError(formatIssues(overridesParsed.error), 'options');
  }
  const overrides = overridesParsed.data;

  const workDir = file.mirror?.workDir ? path.resolve(root, file.mirror.workDir) : defaultWorkDir();
  checkWorkDir(workDir, root);

  return {
    root,
    assetsDir: file.assetsDir ?? DEFAULTS.assetsDir,
    assetExtensions: normalizeExtensions(file.assetExtensions ?? DEFAULT_ASSET_EXTENSIONS),
    ancillaryExtensions: file.ancillaryExtensions ? normalizeExtensions(file.ancillaryExtensions) : undefined,
    excludeDirs: file.excludeDirs ?? DEFAULT_EXCLUDE_DIRS,
    excludeFiles: file.excludeFiles ?? DEFAULT_EXCLUDE_FILES,
    annotations: file.annotations ?? DEFAULTS.annotations,
    manifest: file.manifest ?? DEFAULTS.manifest,
    batchSize: overrides.batchSize ?? fromEnv.DATASET_SYNC_BATCH_SIZE ?? file.batchSize ?? DEFAULTS.batchSize,
    maxRetries: overrides.maxRetries ?? fromEnv.DATASET_SYNC_MAX_RETRIES ?? file.maxRetries ?? DEFAULTS.maxRetries,
    retryDelayMs: overrides.retryDelayMs ?? fromEnv.DATASET_SYNC_RETRY_DELAY_MS ?? file.retryDelayMs ?? DEFAULTS.retryDelayMs,
    hub: {
      repo: overrides.hubRepo ?? fromEnv.DATASET_SYNC_HUB_REPO ?? file.hub?.repo,
      branch: file.hub?.branch ?? DEFAULTS.hubBranch,
      endpoint: fromEnv.HF_ENDPOINT ?? file.hub?.endpoint,
      token: fromEnv.HF_TOKEN,
    },
    mirror: {
      repo: overrides.mirrorRepo ?? fromEnv.DATASET_SYNC_MIRROR_REPO ?? file.mirror?.repo,
      branch: file.mirror?.branch ?? DEFAULTS.mirrorBranch,
      host: file.mirror?.host ?? DEFAULTS.mirrorHost,
      transports: file.mirror?.transports ?? [...TRANSPORTS],
      workDir,
      commitMessage: file.mirror?.commitMessage ?? DEFAULTS.commitMessage,
    },
  };
}

// ============================================================================
// Starter Config
// ============================================================================

export function starterConfig(): FileConfig {
  return {
    assetsDir: DEFAULTS.assetsDir,
    annotations: DEFAULTS.annotations,
    batchSize: DEFAULTS.batchSize,
    maxRetries: DEFAULTS.maxRetries,
    retryDelayMs: DEFAULTS.retryDelayMs,
    hub: { repo: 'your-name/your-dataset', branch: DEFAULTS.hubBranch },
    mirror: { repo: 'your-name/your-dataset', branch: DEFAULTS.mirrorBranch, transports: [...TRANSPORTS] },
  };
}

/**
 * Write a starter config file. Refuses to overwrite an existing one.
 */
export async function initConfigFile(root: string): Promise<string> {
  const filePath = getConfigPath(path.resolve(root));
  if (existsSync(filePath)) {
    throw new ConfigError('Config file already exists', filePath);
  }
  await writeFile(filePath, JSON.stringify(starterConfig(), null, 2) + '\n');
  return filePath;
}

/**
 * Settings as shown to the user, with the token masked.
 */
export function redactSettings(settings: SyncSettings): SyncSettings {
  const token = settings.hub.token;
  return {
    ...settings,
    hub: {
      ...settings.hub,
      token: token ? `${token.slice(0, 3)}…${'*'.repeat(4)}` : undefined,
    },
  };
}
