import { Dirent, Stats } from 'fs';
import { readdir, lstat } from 'fs/promises';
import path from 'path';
import { minimatch } from 'minimatch';
import { logger as rootLogger, Logger } from '../logger';
import { MediaFile } from '../types/MediaFile';
import { kindFromExtension } from '../utils/fileClassifier';
import { errorCode, errorMessage } from '../errors';

export interface SourceScannerOptions {
  /** Globs relative to the source root */
  ignore: string[];
  /** File names that are never organized */
  junkFiles: string[];
  /** Absolute directories skipped entirely (e.g. a destination inside the source) */
  exclude?: string[];
  logger?: Logger;
}

export interface ScanResult {
  /** Sorted by relative path */
  files: MediaFile[];
  /** Absolute paths of junk files found along the way */
  junk: string[];
  /** Symlinks, ignored entries and unreadable directories */
  skipped: number;
}

/**
 * Walks the source tree and turns every regular file into a MediaFile.
 * Symlinks are never followed.
 */
export class SourceScanner {
  private readonly rootPath: string;
  private readonly excluded: string[];
  private readonly junkNames: Set<string>;
  private readonly logger: Logger;

  constructor(rootPath: string, private readonly options: SourceScannerOptions) {
    this.rootPath = path.resolve(rootPath);
    this.excluded = (options.exclude ?? []).map((dir) => path.resolve(dir));
    this.junkNames = new Set(options.junkFiles.map((name) => name.toLowerCase()));
    this.logger = (options.logger ?? rootLogger).child({ scope: 'scanner' });
  }

  async scan(): Promise<ScanResult> {
    const result: ScanResult = { files: [], junk: [], skipped: 0 };
    await this.walk(this.rootPath, result, true);
    result.files.sort((a, b) => compareStrings(a.relativePath, b.relativePath));
    result.junk.sort(compareStrings);
    return result;
  }

  /**
   * Build the record for one path below the root. Returns null for paths
   * the scan would skip (junk, ignored, excluded, symlinks, non-files) and
   * for paths that no longer exist.
   */
  async describe(filePath: string): Promise<MediaFile | null> {
    const fullPath = path.resolve(filePath);
    if (!this.isInsideRoot(fullPath) || this.isExcluded(fullPath)) {
      return null;
    }
    if (this.isJunk(path.basename(fullPath)) || this.shouldIgnore(fullPath)) {
      return null;
    }
    let stats: Stats;
    try {
      stats = await lstat(fullPath);
    } catch (error) {
      // Gone again before we got to it
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
    if (!stats.isFile()) {
      return null;
    }
    return this.toMediaFile(fullPath, stats.size, stats.mtime);
  }

  isJunk(name: string): boolean {
    return this.junkNames.has(name.toLowerCase());
  }

  private async walk(dirPath: string, result: ScanResult, isRoot: boolean): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (isRoot) {
        throw error;
      }
      this.logger.warn({ dir: dirPath, err: errorMessage(error) }, 'Skipping unreadable directory');
      result.skipped++;
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);

      if (entry.isSymbolicLink()) {
        this.logger.debug({ path: fullPath }, 'Skipping symlink');
        result.skipped++;
        continue;
      }

      if (entry.isDirectory()) {
        if (this.isExcluded(fullPath) || this.shouldIgnore(fullPath)) {
          result.skipped++;
          continue;
        }
        await this.walk(fullPath, result, false);
        continue;
      }

      if (!entry.isFile()) {
        result.skipped++;
        continue;
      }

      if (this.isJunk(entry.name)) {
        result.junk.push(fullPath);
        continue;
      }

      if (this.shouldIgnore(fullPath)) {
        result.skipped++;
        continue;
      }

      try {
        const stats = await lstat(fullPath);
        result.files.push(this.toMediaFile(fullPath, stats.size, stats.mtime));
      } catch (error) {
        this.logger.warn({ path: fullPath, err: errorMessage(error) }, 'Skipping unreadable file');
        result.skipped++;
      }
    }
  }

  private toMediaFile(fullPath: string, size: number, modifiedAt: Date): MediaFile {
    const name = path.basename(fullPath);
    return {
      path: fullPath,
      relativePath: path.relative(this.rootPath, fullPath),
      name,
      extension: path.extname(name).toLowerCase(),
      size,
      modifiedAt,
      declaredKind: kindFromExtension(name),
    };
  }

  /**
   * Check if a path matches any ignore pattern
   */
  private shouldIgnore(fullPath: string): boolean {
    const relativePath = path.relative(this.rootPath, fullPath).split(path.sep).join('/');
    return this.options.ignore.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
  }

  private isExcluded(fullPath: string): boolean {
    return this.excluded.some((dir) => fullPath === dir || fullPath.startsWith(dir + path.sep));
  }

  private isInsideRoot(fullPath: string): boolean {
    const relative = path.relative(this.rootPath, fullPath);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
