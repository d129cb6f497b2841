import chokidar from 'chokidar';
import path from 'path';

import { DatesortConfig } from './config';
import { Logger } from './logger';
import { errorMessage } from './errors';

export interface WatchOptions {
  /** Also log when the initial crawl is done */
  verbose?: boolean;
  logger: Logger;
  onFileAdded?: (filePath: string) => void | Promise<void>;
}

export interface WatchSession {
  ready: Promise<void>;
  close: () => Promise<void>;
}

/**
 * Watch the source tree for new files. Events fire only once a file has
 * stopped growing for `watch.debounceMs`.
 */
export function startSourceWatcher(config: DatesortConfig, options: WatchOptions): WatchSession {
  const watchLogger = options.logger.child({ source: config.source });
  const watcher = chokidar.watch(config.source, {
    persistent: true,
    ignoreInitial: true,
    followSymlinks: false,
    ignored: (candidate: string) => isInside(candidate, config.destination),
    awaitWriteFinish: {
      stabilityThreshold: config.watch.debounceMs,
      pollInterval: Math.max(50, Math.min(config.watch.debounceMs / 2, 500)),
    },
    usePolling: typeof config.watch.pollIntervalMs === 'number',
    interval: config.watch.pollIntervalMs,
  });

  watcher.on('add', filePath => {
    watchLogger.info(
      { event: 'file_added', file: formatDisplayPath(config.source, filePath) },
      'Detected new file'
    );
    if (options.onFileAdded) {
      Promise.resolve(options.onFileAdded(filePath)).catch((error: unknown) =>
        watchLogger.error({ err: errorMessage(error) }, 'Error handling file event.')
      );
    }
  });

  watcher.on('error', error => {
    watchLogger.error({ err: error }, 'Watcher error');
  });

  const ready = new Promise<void>(resolve => {
    watcher.once('ready', () => {
      if (options.verbose) {
        watchLogger.info({ event: 'watch_ready' }, 'Watcher ready (ignoring initial files).');
      }
      resolve();
    });
  });

  return {
    ready,
    close: () => watcher.close(),
  };
}

function isInside(candidate: string, dir: string): boolean {
  const relative = path.relative(dir, path.resolve(candidate));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function formatDisplayPath(folderPath: string, filePath: string): string {
  const relative = path.relative(folderPath, filePath);
  if (!relative || relative.startsWith('..')) {
    return filePath;
  }
  return relative;
}
