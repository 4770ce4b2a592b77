/**
 * dataset-sync - Local Inventory Scanner
 *
 * Walks the project root and splits it into:
 * - assets: allowlisted image files under the assets directory
 * - ancillary: every other file outside the assets directory, minus
 *   excluded names (dotenv files by default)
 *
 * Pure read. Directory entries are visited in code-unit order so two scans
 * of the same tree always produce the same sequence.
 */

import { readdir, stat } from 'fs/promises';
import path from 'path';

import type { Inventory, InventoryEntry } from '../core/types.js';
import { DEFAULT_EXCLUDE_FILES, type SyncSettings } from '../core/config.js';
import { NotFoundError } from '../core/errors.js';
import { loadAnnotations, imageIdOf, type AnnotationTable } from './annotations.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  assetsDir: string;                 // Relative to root
  assetExtensions: string[];         // Lower-case, with leading dot
  ancillaryExtensions?: string[];    // Restricts mirrored files when set
  excludeDirs: string[];             // Directory names skipped at any depth
  excludeFiles?: string[];           // File names never mirrored; a trailing * matches any suffix
  annotations?: AnnotationTable | null;
}

// ============================================================================
// Helpers
// ============================================================================

export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function matchesFileName(name: string, pattern: string): boolean {
  return pattern.endsWith('*') ? name.startsWith(pattern.slice(0, -1)) : name === pattern;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

async function walk(
  dir: string,
  skipDir: (name: string, fullPath: string) => boolean,
  visit: (fullPath: string) => void
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (skipDir(entry.name, fullPath)) continue;
      await walk(fullPath, skipDir, visit);
    } else if (entry.isFile()) {
      visit(fullPath);
    }
  }
}

// ============================================================================
// Scan
// ============================================================================

export async function scanInventory(root: string, options: ScanOptions): Promise<Inventory> {
  const rootDir = path.resolve(root);
  if (!(await isDirectory(rootDir))) {
    throw new NotFoundError(rootDir);
  }

  const assetsDir = path.resolve(rootDir, options.assetsDir);
  if (!(await isDirectory(assetsDir))) {
    throw new NotFoundError(assetsDir, 'Assets directory');
  }

  const assetExtensions = new Set(options.assetExtensions);
  const ancillaryExtensions = options.ancillaryExtensions ? new Set(options.ancillaryExtensions) : null;
  const excluded = new Set(options.excludeDirs);
  const excludedFiles = options.excludeFiles ?? DEFAULT_EXCLUDE_FILES;
  const annotations = options.annotations ?? null;

  const assets: InventoryEntry[] = [];
  const ancillary: InventoryEntry[] = [];
  let annotated = 0;

  await walk(
    assetsDir,
    (name) => excluded.has(name),
    (fullPath) => {
      if (!assetExtensions.has(path.extname(fullPath).toLowerCase())) return;

      const metadata = annotations?.get(imageIdOf(fullPath));
      if (metadata) annotated++;

      assets.push({
        relativePath: toPosixPath(path.relative(assetsDir, fullPath)),
        absolutePath: fullPath,
        category: 'asset',
        ...(metadata ? { metadata: { ...metadata } } : {}),
      });
    }
  );

  await walk(
    rootDir,
    (name, fullPath) => excluded.has(name) || fullPath === assetsDir,
    (fullPath) => {
      const name = path.basename(fullPath);
      if (excludedFiles.some(pattern => matchesFileName(name, pattern))) return;

      const ext = path.extname(fullPath).toLowerCase();
      if (assetExtensions.has(ext)) return;
      if (ancillaryExtensions && !ancillaryExtensions.has(ext)) return;

      ancillary.push({
        relativePath: toPosixPath(path.relative(rootDir, fullPath)),
        absolutePath: fullPath,
        category: 'ancillary',
      });
    }
  );

  return { root: rootDir, assetsDir, assets, ancillary, annotated };
}

/**
 * Scan using run settings, loading the annotation table when present.
 */
export async function buildInventory(settings: SyncSettings): Promise<Inventory> {
  const rootDir = path.resolve(settings.root);
  if (!(await isDirectory(rootDir))) {
    throw new NotFoundError(rootDir);
  }

  const annotationsPath = path.resolve(rootDir, settings.annotations);
  const annotations = await loadAnnotations(annotationsPath);

  const inventory = await scanInventory(rootDir, {
    assetsDir: settings.assetsDir,
    assetExtensions: settings.assetExtensions,
    ancillaryExtensions: settings.ancillaryExtensions,
    excludeDirs: settings.excludeDirs,
    excludeFiles: settings.excludeFiles,
    annotations,
  });

  return annotations ? { ...inventory, annotationsPath } : inventory;
}
