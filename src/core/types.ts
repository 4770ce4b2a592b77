/**
 * dataset-sync - Core Types
 *
 * Two kinds of local files flow through a run:
 * 1. Assets - images, uploaded incrementally to the dataset hub
 * 2. Ancillary files - everything else, mirrored to a git branch
 */

// ============================================================================
// Inventory
// ============================================================================

export type EntryCategory = 'asset' | 'ancillary';

export interface InventoryEntry {
  readonly relativePath: string;   // Forward-slash separated
  readonly absolutePath: string;
  readonly category: EntryCategory;
  readonly metadata?: Readonly<Record<string, string>>;  // Annotation fields (assets only)
}

export interface Inventory {
  root: string;
  assetsDir: string;               // Absolute path of the assets directory
  assets: InventoryEntry[];
  ancillary: InventoryEntry[];
  annotated: number;               // Assets that received annotation metadata
  annotationsPath?: string;        // Set when an annotation table was loaded
}

// ============================================================================
// Planning & Batching
// ============================================================================

export interface UploadPlan {
  toUpload: InventoryEntry[];
  skipped: number;
}

export interface UploadBatch {
  index: number;                   // 1-based
  entries: InventoryEntry[];
}

// ============================================================================
// Outcomes
// ============================================================================

export type OutcomeStatus = 'ok' | 'failed' | 'skipped';

export interface SyncOutcome {
  status: OutcomeStatus;
  attempted: number;               // Local assets considered
  skipped: number;                 // Already present remotely
  uploaded: number;                // Committed in this run
  failedBatch?: number;            // 1-based index of the batch that failed terminally
  manifestUploaded: boolean;
  degradedProbe: boolean;          // Remote listing failed and was treated as empty
  dryRun: boolean;
  reason?: string;                 // Why the pipeline was skipped
  error?: string;
}

export interface MirrorOutcome {
  status: OutcomeStatus;
  files: number;
  committed: boolean;
  pushed: boolean;
  transport?: string;              // Transport that produced the working copy
  reason?: string;
  error?: string;
}

export interface PipelineResult {
  inventory: {
    assets: number;
    ancillary: number;
    annotated: number;
  };
  assets: SyncOutcome;
  mirror: MirrorOutcome;
  success: boolean;
}
