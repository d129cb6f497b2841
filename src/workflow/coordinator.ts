import { randomBytes } from 'crypto';
import { lstat, mkdir, stat, unlink, writeFile, access } from 'fs/promises';
import { Stats, constants as fsConstants } from 'fs';
import path from 'path';
import { DatesortConfig } from '../config';
import { SourceScanner } from '../discovery/SourceScanner';
import { ExtractorRegistry } from '../providers/ExtractorRegistry';
import { DateResolver } from './dateResolver';
import { PlacementPlanner } from './placementPlanner';
import { FileMover, classifyTransferError } from './fileMover';
import { deleteJunkFiles, removeEmptyDirectories } from './cleanup';
import { classifyFile, needsSniffing, readPrefix } from '../utils/fileClassifier';
import { withTimeout } from '../utils/timeout';
import { AsyncChannel } from '../utils/asyncChannel';
import { Turnstile } from '../utils/turnstile';
import { Classification, MediaFile, ResolvedDate } from '../types/MediaFile';
import {
  PlacementDecision,
  ProcessingIssue,
  ProcessingResult,
  RunProgress,
  RunSummary,
} from '../types/Processing';
import {
  DatesortError,
  DestinationConflictError,
  DestinationWriteError,
  RunAbortedError,
  SourceUnreadableError,
  errorCode,
  errorMessage,
} from '../errors';
import { logger as rootLogger, Logger } from '../logger';

export interface CoordinatorDependencies {
  logger?: Logger;
  registry?: ExtractorRegistry;
  /** Clock for the resolver's year bound */
  now?: () => Date;
}

interface Gate {
  wait: () => Promise<void>;
  pass: () => void;
}

const OPEN_GATE: Gate = { wait: () => Promise.resolve(), pass: () => undefined };

/**
 * Drives every scanned file through classify, resolve, plan and move on a
 * fixed pool of workers.
 *
 * Planning goes through a turnstile in scan order, so suffixes are assigned
 * the same way on every run whatever the worker timing. Cancellation stops
 * dispatch; files already in flight are finished.
 */
export class WorkCoordinator {
  private readonly logger: Logger;
  private readonly scanner: SourceScanner;
  private readonly resolver: DateResolver;
  private readonly planner: PlacementPlanner;
  private readonly mover: FileMover;
  private readonly summaryState: RunSummary;
  private started = false;
  private fatal: DatesortError | null = null;

  constructor(private readonly config: DatesortConfig, deps: CoordinatorDependencies = {}) {
    this.logger = (deps.logger ?? rootLogger).child({ scope: 'coordinator' });
    const logger = deps.logger ?? rootLogger;

    this.scanner = new SourceScanner(config.source, {
      ignore: config.ignore,
      junkFiles: config.cleanup.junkFiles,
      exclude: isInside(config.destination, config.source) ? [config.destination] : [],
      logger,
    });
    const registry =
      deps.registry ??
      ExtractorRegistry.create({
        filenamePatterns: config.dates.filenamePatterns,
        ffprobe: config.probe.ffprobe,
        ffprobePath: config.probe.ffprobePath,
      });
    this.resolver = new DateResolver(registry, {
      rules: config.dates,
      extractTimeoutMs: config.timeouts.extractMs,
      logger,
      now: deps.now,
    });
    this.planner = new PlacementPlanner({
      destination: config.destination,
      unknownFolder: config.unknownFolder,
      mode: config.mode,
      hashAlgorithm: config.hashAlgorithm,
      hashTimeoutMs: config.timeouts.hashMs,
      logger,
    });
    this.mover = new FileMover({ transferTimeoutMs: config.timeouts.transferMs, logger });
    this.summaryState = emptySummary(config.dryRun);
  }

  get progress(): RunProgress {
    const { total, processed, succeeded, failed, skipped } = this.summaryState;
    return { total, processed, succeeded, failed, skipped };
  }

  /**
   * Snapshot of the counters so far
   */
  summary(): RunSummary {
    return {
      ...this.summaryState,
      failures: [...this.summaryState.failures],
      finishedAt: this.summaryState.finishedAt || new Date().toISOString(),
    };
  }

  /**
   * One result per scanned file, then the summary as the return value.
   * Nothing happens until the first pull, and a coordinator runs only once.
   *
   * @throws RunAbortedError when the run hits a fatal condition
   */
  results(signal?: AbortSignal): AsyncGenerator<ProcessingResult, RunSummary, undefined> {
    if (this.started) {
      throw new Error('This run has already been started');
    }
    this.started = true;
    return this.run(signal);
  }

  /**
   * Organize one file that appeared after the initial scan (watch mode).
   * Returns null for paths the scanner would skip.
   */
  async processPath(filePath: string): Promise<ProcessingResult | null> {
    this.throwIfAborted();
    const file = await this.scanner.describe(filePath);
    if (!file) {
      return null;
    }
    this.summaryState.total++;
    const result = await this.processFile(file, OPEN_GATE);
    this.throwIfAborted();
    return result;
  }

  private async *run(signal?: AbortSignal): AsyncGenerator<ProcessingResult, RunSummary, undefined> {
    this.summaryState.startedAt = new Date().toISOString();

    try {
      await this.preflight();
    } catch (error) {
      throw new RunAbortedError(`Preflight failed: ${errorMessage(error)}`, this.summary(), error);
    }

    const scan = await this.scanner.scan();
    const files = scan.files;
    this.summaryState.total = files.length;
    this.logger.info(
      { source: this.config.source, files: files.length, junk: scan.junk.length, skipped: scan.skipped },
      'Scan complete'
    );

    if (this.config.cleanup.deleteJunk && !this.config.dryRun && scan.junk.length > 0) {
      const deleted = await deleteJunkFiles(scan.junk, this.logger);
      this.logger.info({ deleted }, 'Deleted junk files');
    }

    const channel = new AsyncChannel<ProcessingResult>();
    const turnstile = new Turnstile();
    let cursor = 0;
    let closed = false;

    const worker = async (): Promise<void> => {
      while (!closed && !this.fatal && !signal?.aborted) {
        const index = cursor++;
        if (index >= files.length) {
          return;
        }
        const gate: Gate = {
          wait: () => turnstile.wait(index),
          pass: () => turnstile.pass(index),
        };
        channel.push(await this.processFile(files[index], gate));
      }
    };

    const workerCount = Math.max(1, Math.min(this.config.concurrency, files.length));
    const pool = Promise.all(Array.from({ length: workerCount }, () => worker())).then(
      () => channel.close(),
      (error: unknown) => channel.fail(error)
    );

    try {
      while (true) {
        const next = await channel.take();
        if (next.done) {
          break;
        }
        yield next.value;
      }
    } finally {
      closed = true;
      await pool;
    }

    this.summaryState.cancelled = Boolean(signal?.aborted) && cursor < files.length;
    this.throwIfAborted();

    if (
      this.config.cleanup.removeEmptyDirs &&
      this.config.mode === 'move' &&
      !this.config.dryRun &&
      !this.summaryState.cancelled
    ) {
      const removed = await removeEmptyDirectories(this.config.source, this.logger, [this.config.destination]);
      this.logger.info({ removed }, 'Removed empty source directories');
    }

    this.summaryState.finishedAt = new Date().toISOString();
    return this.summary();
  }

  /**
   * Never throws: every failure ends up in the result. Fatal conditions are
   * recorded on the coordinator and stop further dispatch.
   */
  private async processFile(file: MediaFile, gate: Gate): Promise<ProcessingResult> {
    let classification: Classification | undefined;
    let resolved: ResolvedDate | undefined;
    let decision: PlacementDecision | undefined;
    let gatePassed = false;
    const passGate = () => {
      if (!gatePassed) {
        gatePassed = true;
        gate.pass();
      }
    };

    let result: ProcessingResult;
    try {
      classification = await this.classify(file);
      if (classification.kind !== 'unsupported') {
        resolved = await this.resolver.resolve(file, classification.kind);
      }

      await gate.wait();
      try {
        decision = await this.planner.plan(file, resolved ?? null);
      } finally {
        passGate();
      }

      const kind = classification.kind;
      const notice = noticeFor(classification, resolved);

      if (this.config.dryRun) {
        this.planner.markLanded(decision);
        result = { file, status: 'succeeded', outcome: 'planned', kind, resolved, decision, error: notice };
      } else {
        // A copy of a file still in flight is only a duplicate once that file lands
        while (decision.action === 'skip-duplicate' && !(await this.planner.whenLanded(decision))) {
          this.logger.debug({ file: file.relativePath }, 'Original transfer failed, planning again');
          decision = await this.planner.plan(file, resolved ?? null);
        }
        if (decision.action !== 'skip-duplicate') {
          this.planner.assertReserved(decision, file);
        }
        const applied = await this.mover.apply(decision, file);
        result = { ...applied, kind, resolved, error: applied.error ?? notice };
        if (applied.status === 'failed') {
          this.planner.release(decision);
        } else {
          this.planner.markLanded(decision);
        }
      }
    } catch (error) {
      passGate();
      if (decision) {
        this.planner.release(decision);
      }
      result = this.failureResult(file, error, { kind: classification?.kind, resolved, decision });
    }

    if (result.error?.kind === 'DestinationWriteFailed' && result.status === 'failed' && !this.config.dryRun) {
      await this.recheckDestination();
    }

    this.record(result);
    return result;
  }

  private async classify(file: MediaFile): Promise<Classification> {
    if (!needsSniffing(file.name)) {
      return classifyFile(file.name);
    }
    try {
      const prefix = await withTimeout(
        readPrefix(file.path),
        this.config.timeouts.readMs,
        `Reading ${file.relativePath}`
      );
      return classifyFile(file.name, prefix);
    } catch (error) {
      throw new SourceUnreadableError(file.path, `Cannot read ${file.path}: ${errorMessage(error)}`, error);
    }
  }

  private failureResult(
    file: MediaFile,
    error: unknown,
    context: Pick<ProcessingResult, 'kind' | 'resolved' | 'decision'>
  ): ProcessingResult {
    let issue: ProcessingIssue;
    if (error instanceof DestinationConflictError) {
      issue = { kind: 'DestinationConflict', message: error.message };
      this.abort(error);
    } else {
      issue = classifyTransferError(error, file);
    }
    this.logger.warn({ file: file.relativePath, kind: issue.kind }, issue.message);
    return { file, status: 'failed', outcome: 'failed', ...context, error: issue };
  }

  /**
   * A failed write may mean the whole destination is gone or read-only
   */
  private async recheckDestination(): Promise<void> {
    try {
      await probeWritable(this.config.destination);
    } catch (error) {
      this.abort(
        new DestinationWriteError(
          this.config.destination,
          `Destination ${this.config.destination} is not writable: ${errorMessage(error)}`,
          error
        )
      );
    }
  }

  private throwIfAborted(): void {
    if (this.fatal) {
      this.summaryState.finishedAt = new Date().toISOString();
      throw new RunAbortedError(this.fatal.message, this.summary(), this.fatal);
    }
  }

  private abort(error: DatesortError): void {
    if (!this.fatal) {
      this.fatal = error;
      this.logger.error({ err: error.message }, 'Aborting run');
    }
  }

  private async preflight(): Promise<void> {
    const { source, destination, dryRun } = this.config;

    const sourceStats = await stat(source).catch((error: unknown) => {
      throw new SourceUnreadableError(source, `Source ${source} is not readable: ${errorMessage(error)}`, error);
    });
    if (!sourceStats.isDirectory()) {
      throw new SourceUnreadableError(source, `Source ${source} is not a directory`);
    }
    await access(source, fsConstants.R_OK | fsConstants.X_OK).catch((error: unknown) => {
      throw new SourceUnreadableError(source, `Source ${source} is not readable: ${errorMessage(error)}`, error);
    });

    if (dryRun) {
      const existing = await lstatIfExists(destination);
      if (existing && !existing.isDirectory()) {
        throw new DestinationWriteError(destination, `Destination ${destination} is not a directory`);
      }
      return;
    }

    try {
      await probeWritable(destination);
    } catch (error) {
      throw new DestinationWriteError(
        destination,
        `Destination ${destination} is not writable: ${errorMessage(error)}`,
        error
      );
    }
  }

  private record(result: ProcessingResult): void {
    const summary = this.summaryState;
    summary.processed++;

    if (result.status === 'failed') {
      summary.failed++;
      summary.failures.push({
        path: result.file.path,
        kind: result.error?.kind ?? 'DestinationWriteFailed',
        message: result.error?.message ?? 'Unknown failure',
      });
      return;
    }

    summary.succeeded++;
    switch (result.outcome) {
      case 'moved':
        summary.moved++;
        break;
      case 'copied':
        summary.copied++;
        break;
      case 'skipped-duplicate':
        summary.skippedDuplicate++;
        summary.skipped++;
        break;
      case 'planned':
        summary.planned++;
        break;
    }
    if (result.decision?.action === 'rename-suffix') {
      summary.renamed++;
    }
    if (result.kind === 'unsupported') {
      summary.unsupported++;
    }
    const resolved = result.resolved;
    if (resolved && resolved.state === 'unresolved') {
      summary.unresolvedDate++;
    } else if (resolved && resolved.state === 'resolved' && resolved.tier === 'filesystem') {
      summary.lowConfidence++;
    }
  }
}

export interface OrganizeOptions {
  signal?: AbortSignal;
  onResult?: (result: ProcessingResult) => void;
  logger?: Logger;
}

/**
 * Run a whole pass and return its summary
 */
export async function organize(config: DatesortConfig, options: OrganizeOptions = {}): Promise<RunSummary> {
  const coordinator = new WorkCoordinator(config, { logger: options.logger });
  const results = coordinator.results(options.signal);
  while (true) {
    const step = await results.next();
    if (step.done) {
      return step.value;
    }
    options.onResult?.(step.value);
  }
}

/**
 * Create the directory if needed and prove a file can be written in it
 */
export async function probeWritable(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
  const probePath = path.join(dir, `.datesort-probe-${randomBytes(4).toString('hex')}`);
  await writeFile(probePath, '', { flag: 'wx' });
  await unlink(probePath);
}

function noticeFor(classification: Classification, resolved: ResolvedDate | undefined): ProcessingIssue | undefined {
  if (classification.kind === 'unsupported') {
    return { kind: 'UnsupportedFormat', message: classification.reason };
  }
  if (!resolved) {
    return undefined;
  }
  if (resolved.state === 'unresolved') {
    return { kind: 'MetadataUnreadable', message: 'No date found in metadata or file name' };
  }
  if (resolved.tier === 'filesystem') {
    return { kind: 'MetadataUnreadable', message: 'No date in metadata or file name, used the modification time' };
  }
  return undefined;
}

async function lstatIfExists(target: string): Promise<Stats | null> {
  try {
    return await lstat(target);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function emptySummary(dryRun: boolean): RunSummary {
  return {
    total: 0,
    processed: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    moved: 0,
    copied: 0,
    skippedDuplicate: 0,
    renamed: 0,
    planned: 0,
    unsupported: 0,
    unresolvedDate: 0,
    lowConfidence: 0,
    dryRun,
    cancelled: false,
    startedAt: '',
    finishedAt: '',
    failures: [],
  };
}

function isInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}
