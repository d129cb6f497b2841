import { ConfidenceTier, MediaKind } from './MediaKind';

/**
 * One discovered source file. Built once at scan time and never mutated.
 */
export interface MediaFile {
  readonly path: string; // Absolute
  readonly relativePath: string; // Relative to the source root
  readonly name: string;
  readonly extension: string; // Lower-cased, with the dot ('' when missing)
  readonly size: number;
  readonly modifiedAt: Date;
  readonly declaredKind: MediaKind | null; // What the extension alone suggests
}

/**
 * Date tuple every extraction adapter hands back. Time fields are optional
 * because some sources (filenames, XMP date-only values) carry only a day.
 */
export interface CaptureDate {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

export type ExtractionOutcome =
  | { status: 'found'; date: CaptureDate; raw?: string }
  | { status: 'absent' }
  | { status: 'failed'; reason: string };

export type StrategyId =
  | 'exif'
  | 'ffprobe'
  | 'mp4-container'
  | 'png-text'
  | 'xmp'
  | 'filename'
  | 'filesystem';

/**
 * Handed to a strategy by the resolver. `signal` fires once the attempt has
 * timed out; `isPlausible` picks among several tags the file carries.
 */
export interface ExtractionContext {
  signal?: AbortSignal;
  isPlausible?: (date: CaptureDate) => boolean;
}

export interface StrategyAttempt {
  strategy: StrategyId;
  tier: ConfidenceTier;
  result: 'accepted' | 'rejected' | 'absent' | 'failed' | 'skipped';
  reason?: string;
}

export type ResolvedDate =
  | {
      state: 'resolved';
      date: CaptureDate;
      strategy: StrategyId;
      tier: ConfidenceTier;
      attempts: StrategyAttempt[];
    }
  | { state: 'unresolved'; attempts: StrategyAttempt[] };

export type Classification =
  | { kind: MediaKind; via: 'extension' | 'signature' }
  | { kind: 'unsupported'; reason: string };
