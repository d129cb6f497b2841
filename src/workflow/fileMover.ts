import { createReadStream, createWriteStream } from 'fs';
import { link, lstat, mkdir, rename, rm, stat, unlink, utimes } from 'fs/promises';
import { randomBytes } from 'crypto';
import path from 'path';
import { pipeline } from 'stream/promises';
import { MediaFile } from '../types/MediaFile';
import { PlacementDecision, ProcessingResult } from '../types/Processing';
import {
  DestinationConflictError,
  DestinationWriteError,
  SourceUnreadableError,
  errorCode,
  errorMessage,
  isErrnoException,
} from '../errors';
import { logger as rootLogger, Logger } from '../logger';

// Hard links are not available here; fall back to copying
const LINK_UNSUPPORTED = new Set(['EXDEV', 'EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EMLINK']);

export interface FileMoverOptions {
  transferTimeoutMs: number;
  logger?: Logger;
}

/**
 * Applies placement decisions. A destination file is either absent or
 * complete: bytes go to a temporary file in the destination directory that
 * is only linked into place once fully written, and a move removes the
 * source only after that.
 */
export class FileMover {
  private readonly logger: Logger;

  constructor(private readonly options: FileMoverOptions) {
    this.logger = (options.logger ?? rootLogger).child({ scope: 'mover' });
  }

  /**
   * Per-file failures come back as a failed result.
   * DestinationConflictError is thrown: it means the collision index was bypassed.
   */
  async apply(decision: PlacementDecision, file: MediaFile): Promise<ProcessingResult> {
    if (decision.action === 'skip-duplicate') {
      return { file, status: 'succeeded', outcome: 'skipped-duplicate', decision };
    }

    try {
      const outcome =
        decision.transfer === 'move'
          ? await this.move(file, decision.destinationPath)
          : await this.copy(file, decision.destinationPath);
      return { file, status: 'succeeded', outcome, decision };
    } catch (error) {
      if (error instanceof DestinationConflictError) {
        throw error;
      }
      const failure = classifyTransferError(error, file);
      this.logger.warn(
        { file: file.relativePath, destination: decision.relativePath, kind: failure.kind },
        failure.message
      );
      return { file, status: 'failed', outcome: 'failed', decision, error: failure };
    }
  }

  private async move(file: MediaFile, destinationPath: string): Promise<'moved' | 'copied'> {
    await this.ensureDirectory(path.dirname(destinationPath));

    let linked = false;
    try {
      await link(file.path, destinationPath);
      linked = true;
    } catch (error) {
      const code = errorCode(error);
      if (code === 'EEXIST') {
        throw conflict(destinationPath, error);
      }
      this.logger.debug({ file: file.relativePath, code }, 'Hard link unavailable, copying instead');
    }

    if (!linked) {
      await this.copyThroughTemp(file, destinationPath);
    }
    return this.removeSource(file);
  }

  private async copy(file: MediaFile, destinationPath: string): Promise<'copied'> {
    await this.ensureDirectory(path.dirname(destinationPath));
    await this.copyThroughTemp(file, destinationPath);
    return 'copied';
  }

  private async copyThroughTemp(file: MediaFile, destinationPath: string): Promise<void> {
    const sourceStats = await stat(file.path).catch((error: unknown) => {
      throw new SourceUnreadableError(file.path, `Cannot read ${file.path}: ${errorMessage(error)}`, error);
    });

    const dir = path.dirname(destinationPath);
    const tempPath = path.join(
      dir,
      `.${path.basename(destinationPath)}.${randomBytes(6).toString('hex')}.partial`
    );

    try {
      await pipeline(
        createReadStream(file.path),
        createWriteStream(tempPath, { flags: 'wx' }),
        { signal: AbortSignal.timeout(this.options.transferTimeoutMs) }
      );

      const written = await stat(tempPath);
      if (written.size !== sourceStats.size) {
        throw new DestinationWriteError(
          destinationPath,
          `Short write for ${destinationPath}: ${written.size} of ${sourceStats.size} bytes`
        );
      }
      await utimes(tempPath, sourceStats.atime, sourceStats.mtime);
      await finalize(tempPath, destinationPath);
    } catch (error) {
      await this.discard(tempPath);
      throw error;
    }
  }

  /**
   * Only called once the destination is complete
   */
  private async removeSource(file: MediaFile): Promise<'moved' | 'copied'> {
    try {
      await unlink(file.path);
      return 'moved';
    } catch (error) {
      this.logger.warn(
        { file: file.relativePath, err: errorMessage(error) },
        'Destination written but source could not be removed'
      );
      return 'copied';
    }
  }

  private async ensureDirectory(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new DestinationWriteError(dir, `Cannot create ${dir}: ${errorMessage(error)}`, error);
    }
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      this.logger.error({ path: tempPath, err: errorMessage(error) }, 'Could not remove temporary file');
    }
  }
}

/**
 * Move the finished temporary file into place without clobbering anything
 */
async function finalize(tempPath: string, destinationPath: string): Promise<void> {
  try {
    await link(tempPath, destinationPath);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'EEXIST') {
      throw conflict(destinationPath, error);
    }
    if (!code || !LINK_UNSUPPORTED.has(code)) {
      throw error;
    }
    if (await exists(destinationPath)) {
      throw conflict(destinationPath);
    }
    await rename(tempPath, destinationPath);
    return;
  }
  await unlink(tempPath);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await lstat(filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function conflict(destinationPath: string, cause?: unknown): DestinationConflictError {
  return new DestinationConflictError(
    destinationPath,
    `Destination ${destinationPath} appeared after it was planned`,
    cause
  );
}

/**
 * Errors raised on the source path are the source's fault, everything
 * else is a destination write failure
 */
export function classifyTransferError(
  error: unknown,
  file: MediaFile
): { kind: 'SourceUnreadable' | 'DestinationWriteFailed'; message: string } {
  if (error instanceof SourceUnreadableError) {
    return { kind: 'SourceUnreadable', message: error.message };
  }
  if (isErrnoException(error) && error.path === file.path) {
    return { kind: 'SourceUnreadable', message: `Cannot read ${file.path}: ${error.message}` };
  }
  return { kind: 'DestinationWriteFailed', message: errorMessage(error) };
}
