import { Dirent } from 'fs';
import { lstat, readdir } from 'fs/promises';
import path from 'path';
import { MediaFile, ResolvedDate } from '../types/MediaFile';
import { PlacementDecision, TransferMode } from '../types/Processing';
import {
  DestinationConflictError,
  DestinationWriteError,
  SourceUnreadableError,
  errorCode,
  errorMessage,
} from '../errors';
import { hashFile } from '../utils/hash';
import { pad } from '../utils/captureDate';
import { logger as rootLogger, Logger } from '../logger';

export const MAX_SUFFIX = 9999;

// Our own in-progress transfers, see fileMover
const PARTIAL_FILE = /^\..+\.partial$/;

export interface PlacementPlannerOptions {
  destination: string;
  unknownFolder: string;
  mode: TransferMode;
  hashAlgorithm: string;
  /** Bound on each digest taken for the duplicate check */
  hashTimeoutMs: number;
  logger?: Logger;
}

type Digest = (filePath: string) => Promise<string>;

/**
 * Something holding a destination path: a file already on disk, or a file
 * reserved earlier in this run (which may still be on its way).
 */
class Occupant {
  private hash: Promise<string> | null = null;
  private settle: (landed: boolean) => void = () => undefined;
  /** Resolves true once the file is at its destination, false if it never gets there */
  readonly landed: Promise<boolean>;

  constructor(
    readonly destinationPath: string,
    readonly size: number | null, // null for entries that are not regular files
    readonly sourcePath: string | null, // null for files found on disk
    private readonly digest: Digest
  ) {
    this.landed =
      sourcePath === null
        ? Promise.resolve(true)
        : new Promise<boolean>((resolve) => {
            this.settle = resolve;
          });
  }

  markLanded(landed: boolean): void {
    this.settle(landed);
  }

  get plannedInRun(): boolean {
    return this.sourcePath !== null;
  }

  /**
   * Memoized. A planned occupant is hashed from its source, or from its
   * destination once the source has been moved away.
   */
  contentHash(): Promise<string> {
    if (!this.hash) {
      this.hash = this.computeHash();
    }
    return this.hash;
  }

  private async computeHash(): Promise<string> {
    if (this.sourcePath) {
      try {
        return await this.digest(this.sourcePath);
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') {
          throw error;
        }
      }
    }
    return this.digest(this.destinationPath);
  }
}

/**
 * Bucket for a resolved date (`YYYY/MM`), or the unknown folder
 */
export function bucketFor(resolved: ResolvedDate | null, unknownFolder: string): string {
  if (!resolved || resolved.state === 'unresolved') {
    return unknownFolder;
  }
  return `${pad(resolved.date.year, 4)}/${pad(resolved.date.month)}`;
}

/**
 * Candidate file name for a suffix: `IMG.JPG`, `IMG_1.JPG`, `IMG_2.JPG`, ...
 */
export function candidateName(name: string, suffix: number): string {
  if (suffix === 0) {
    return name;
  }
  const ext = path.extname(name);
  return `${path.basename(name, ext)}_${suffix}${ext}`;
}

/**
 * Turns a resolved date into a destination path and owns the collision
 * index for the run.
 *
 * The index is keyed by the lower-cased destination path, so names that
 * differ only by case collide on every filesystem. Each bucket directory
 * is listed once, on first use, and its files join the index. Reserving a
 * path is a single synchronous step.
 */
export class PlacementPlanner {
  private readonly index = new Map<string, Occupant>();
  private readonly bySize = new Map<string, Occupant[]>(); // `${bucketKey}\0${size}`
  private readonly buckets = new Map<string, Promise<void>>();
  private readonly reservedBy = new WeakMap<PlacementDecision, Occupant>();
  private readonly duplicateOf = new WeakMap<PlacementDecision, Occupant>();
  private readonly logger: Logger;
  private readonly digest: Digest;

  constructor(private readonly options: PlacementPlannerOptions) {
    this.logger = (options.logger ?? rootLogger).child({ scope: 'planner' });
    this.digest = (filePath) =>
      hashFile(filePath, options.hashAlgorithm, AbortSignal.timeout(options.hashTimeoutMs));
  }

  get reservedCount(): number {
    let count = 0;
    for (const occupant of this.index.values()) {
      if (occupant.plannedInRun) {
        count++;
      }
    }
    return count;
  }

  /**
   * `resolved` is null for files the classifier could not identify
   */
  async plan(file: MediaFile, resolved: ResolvedDate | null): Promise<PlacementDecision> {
    const bucket = bucketFor(resolved, this.options.unknownFolder);
    const bucketDir = path.join(this.options.destination, bucket);
    const bucketKey = bucketDir.toLowerCase();

    await this.loadBucket(bucketDir, bucketKey);

    const duplicate = await this.findDuplicate(file, bucketKey);
    if (duplicate) {
      const name = path.basename(duplicate.destinationPath);
      const skip: PlacementDecision = {
        action: 'skip-duplicate',
        transfer: this.options.mode,
        bucket,
        relativePath: `${bucket}/${name}`,
        destinationPath: duplicate.destinationPath,
        collision: {
          reason: 'duplicate-content',
          conflictingPath: duplicate.destinationPath,
          suffix: suffixOf(name, file.name),
        },
      };
      this.duplicateOf.set(skip, duplicate);
      return skip;
    }

    // No await from here on: lookup and reservation are one step
    const firstPath = path.join(bucketDir, file.name);
    for (let suffix = 0; suffix <= MAX_SUFFIX; suffix++) {
      const name = candidateName(file.name, suffix);
      const destinationPath = path.join(bucketDir, name);
      const key = destinationPath.toLowerCase();
      if (this.index.has(key)) {
        continue;
      }

      const occupant = new Occupant(destinationPath, file.size, file.path, this.digest);
      this.register(key, bucketKey, occupant);

      const decision: PlacementDecision = {
        action: suffix === 0 ? this.options.mode : 'rename-suffix',
        transfer: this.options.mode,
        bucket,
        relativePath: `${bucket}/${name}`,
        destinationPath,
      };
      if (suffix > 0) {
        decision.collision = { reason: 'name-taken', conflictingPath: firstPath, suffix };
        this.logger.debug({ file: file.relativePath, name }, 'Name taken, using suffix');
      }
      this.reservedBy.set(decision, occupant);
      return decision;
    }

    throw new DestinationWriteError(
      firstPath,
      `No free name for ${file.name} in ${bucket} after ${MAX_SUFFIX} suffixes`
    );
  }

  /**
   * The decision's file is now at its destination (or, in a dry run, would be)
   */
  markLanded(decision: PlacementDecision): void {
    this.reservedBy.get(decision)?.markLanded(true);
  }

  /**
   * For a skip-duplicate decision, whether the file it duplicates made it to
   * the destination. Waits while that file is still in flight; true for
   * every other decision.
   */
  whenLanded(decision: PlacementDecision): Promise<boolean> {
    const occupant = this.duplicateOf.get(decision);
    return occupant ? occupant.landed : Promise.resolve(true);
  }

  /**
   * Drop the reservation behind a decision whose transfer failed
   */
  release(decision: PlacementDecision): void {
    const occupant = this.reservedBy.get(decision);
    if (!occupant) {
      return;
    }
    this.reservedBy.delete(decision);
    occupant.markLanded(false);
    const key = decision.destinationPath.toLowerCase();
    if (this.index.get(key) !== occupant) {
      return;
    }
    this.index.delete(key);
    const bucketKey = path.dirname(decision.destinationPath).toLowerCase();
    const sizeKey = `${bucketKey}\0${occupant.size}`;
    const peers = this.bySize.get(sizeKey);
    if (peers) {
      this.bySize.set(
        sizeKey,
        peers.filter((peer) => peer !== occupant)
      );
    }
  }

  /**
   * Throws when the index does not hold the decision's path for this file
   */
  assertReserved(decision: PlacementDecision, file: MediaFile): void {
    const occupant = this.index.get(decision.destinationPath.toLowerCase());
    if (!occupant || occupant.sourcePath !== file.path) {
      throw new DestinationConflictError(
        decision.destinationPath,
        `Destination ${decision.destinationPath} is not reserved for ${file.path}`
      );
    }
  }

  private register(key: string, bucketKey: string, occupant: Occupant): void {
    this.index.set(key, occupant);
    if (occupant.size === null) {
      return;
    }
    const sizeKey = `${bucketKey}\0${occupant.size}`;
    const peers = this.bySize.get(sizeKey);
    if (peers) {
      peers.push(occupant);
    } else {
      this.bySize.set(sizeKey, [occupant]);
    }
  }

  /**
   * Occupant in the same bucket with byte-identical content. Sizes are
   * compared first; hashes are computed only when sizes match.
   */
  private async findDuplicate(file: MediaFile, bucketKey: string): Promise<Occupant | null> {
    const peers = this.bySize.get(`${bucketKey}\0${file.size}`);
    if (!peers || peers.length === 0) {
      return null;
    }

    // Slots along the file's own name chain are checked first
    const sameName = file.name.toLowerCase();
    const ordered = [...peers].sort(
      (a, b) => rank(a.destinationPath, sameName) - rank(b.destinationPath, sameName)
    );

    let ownHash: string;
    try {
      ownHash = await this.digest(file.path);
    } catch (error) {
      throw new SourceUnreadableError(file.path, `Cannot hash ${file.path}: ${errorMessage(error)}`, error);
    }
    for (const occupant of ordered) {
      if ((await occupant.contentHash()) === ownHash) {
        return occupant;
      }
    }
    return null;
  }

  private loadBucket(bucketDir: string, bucketKey: string): Promise<void> {
    let pending = this.buckets.get(bucketKey);
    if (!pending) {
      pending = this.listBucket(bucketDir, bucketKey);
      this.buckets.set(bucketKey, pending);
    }
    return pending;
  }

  private async listBucket(bucketDir: string, bucketKey: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(bucketDir, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return;
      }
      throw new DestinationWriteError(
        bucketDir,
        `Unable to list ${bucketDir}: ${errorMessage(error)}`,
        error
      );
    }

    const names = entries.map((entry) => entry.name).sort();
    const sizes = await Promise.all(names.map((name) => sizeOf(path.join(bucketDir, name))));

    names.forEach((name, i) => {
      const size = sizes[i];
      if (PARTIAL_FILE.test(name) || size === undefined) {
        return;
      }
      const destinationPath = path.join(bucketDir, name);
      const key = destinationPath.toLowerCase();
      if (!this.index.has(key)) {
        this.register(key, bucketKey, new Occupant(destinationPath, size, null, this.digest));
      }
    });
    this.logger.debug({ bucket: bucketDir, entries: names.length }, 'Loaded bucket');
  }
}

/**
 * Size of a regular file, null for anything else, undefined once it is gone
 */
async function sizeOf(entryPath: string): Promise<number | null | undefined> {
  try {
    const stats = await lstat(entryPath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function rank(destinationPath: string, name: string): number {
  const ext = path.extname(name);
  const stem = path.basename(name, ext);
  const candidate = path.basename(destinationPath).toLowerCase();
  if (candidate === name) {
    return 0;
  }
  return candidate.startsWith(`${stem}_`) && candidate.endsWith(ext) ? 1 : 2;
}

function suffixOf(occupantName: string, name: string): number {
  const ext = path.extname(name);
  const stem = path.basename(name, ext);
  const match = new RegExp(`^${escapeRegExp(stem)}_(\\d+)${escapeRegExp(ext)}$`, 'i').exec(occupantName);
  return match ? Number(match[1]) : 0;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
