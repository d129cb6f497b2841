import { MediaKind } from './MediaKind';
import { MediaFile, ResolvedDate } from './MediaFile';

export type TransferMode = 'move' | 'copy';

export type PlacementAction = 'move' | 'copy' | 'skip-duplicate' | 'rename-suffix';

export interface PlacementDecision {
  action: PlacementAction;
  transfer: TransferMode;
  bucket: string; // 'YYYY/MM' or the unknown folder name
  relativePath: string; // Relative to the destination root
  destinationPath: string; // Absolute
  collision?: {
    reason: 'duplicate-content' | 'name-taken';
    conflictingPath: string;
    suffix: number;
  };
}

export type ErrorKind =
  | 'UnsupportedFormat'
  | 'MetadataUnreadable'
  | 'SourceUnreadable'
  | 'DestinationConflict'
  | 'DestinationWriteFailed';

export interface ProcessingIssue {
  kind: ErrorKind;
  message: string;
}

export type ProcessingOutcome = 'moved' | 'copied' | 'skipped-duplicate' | 'planned' | 'failed';

/**
 * Terminal record for one file. `error` is also set on successful results
 * for the informational kinds (UnsupportedFormat, MetadataUnreadable).
 */
export interface ProcessingResult {
  file: MediaFile;
  status: 'succeeded' | 'failed';
  outcome: ProcessingOutcome;
  kind?: MediaKind | 'unsupported';
  resolved?: ResolvedDate;
  decision?: PlacementDecision;
  error?: ProcessingIssue;
}

export interface RunProgress {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface RunSummary extends RunProgress {
  moved: number;
  copied: number;
  skippedDuplicate: number;
  renamed: number;
  planned: number;
  unsupported: number;
  unresolvedDate: number;
  lowConfidence: number;
  dryRun: boolean;
  cancelled: boolean;
  startedAt: string; // ISO 8601
  finishedAt: string;
  failures: Array<{ path: string; kind: ErrorKind; message: string }>;
}
