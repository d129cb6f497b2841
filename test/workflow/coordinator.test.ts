import fs from 'fs/promises';
import path from 'path';

import { WorkCoordinator, organize } from '../../src/workflow/coordinator';
import { DatesortConfig, DatesortConfigInput, loadInlineConfig } from '../../src/config';
import { ProcessingResult, RunSummary } from '../../src/types/Processing';
import { RunAbortedError } from '../../src/errors';
import { ExtractorRegistry } from '../../src/providers/ExtractorRegistry';
import { DateStrategy } from '../../src/metadata/DateStrategy';
import { ExtractionOutcome, MediaFile } from '../../src/types/MediaFile';
import {
  jpegWithExif,
  jpegWithExifTags,
  makeTempDir,
  mp4WithCreationTime,
  plainJpeg,
  silentLogger,
  writeFixture,
} from '../helpers/media';

/**
 * Dates every file to 2023-03-14 after running `before` on it
 */
class ScriptedStrategy extends DateStrategy {
  readonly id = 'exif';
  readonly tier = 'embedded';

  constructor(private readonly before: (file: MediaFile) => Promise<void>) {
    super();
  }

  protected async extract(file: MediaFile): Promise<ExtractionOutcome> {
    await this.before(file);
    return { status: 'found', date: { year: 2023, month: 3, day: 14 } };
  }
}

interface RunOutput {
  results: ProcessingResult[];
  summary: RunSummary;
}

async function drain(coordinator: WorkCoordinator, signal?: AbortSignal): Promise<RunOutput> {
  const results: ProcessingResult[] = [];
  const iterator = coordinator.results(signal);
  while (true) {
    const step = await iterator.next();
    if (step.done) {
      return { results, summary: step.value };
    }
    results.push(step.value);
  }
}

function byName(results: ProcessingResult[], relativePath: string): ProcessingResult {
  const match = results.find((result) => result.file.relativePath === relativePath);
  if (!match) {
    throw new Error(`No result for ${relativePath}`);
  }
  return match;
}

async function listTree(root: string, prefix = ''): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await fs.readdir(path.join(root, prefix), { withFileTypes: true })) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listTree(root, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files.sort();
}

describe('WorkCoordinator', () => {
  let source: string;
  let destination: string;

  beforeEach(async () => {
    source = await makeTempDir('datesort-src-');
    destination = await makeTempDir('datesort-dest-');
  });

  afterEach(async () => {
    await fs.rm(source, { recursive: true, force: true });
    await fs.rm(destination, { recursive: true, force: true });
  });

  function configFor(overrides: DatesortConfigInput = {}): DatesortConfig {
    return loadInlineConfig({
      source,
      destination,
      mode: 'copy',
      probe: { ffprobe: false },
      ...overrides,
    });
  }

  function coordinatorFor(config: DatesortConfig, registry?: ExtractorRegistry): WorkCoordinator {
    return new WorkCoordinator(config, { logger: silentLogger, registry, now: () => new Date(2024, 5, 1) });
  }

  async function writeMixedSource(): Promise<void> {
    const photo = jpegWithExif('2023:03:14 10:00:00', 'beach');
    await writeFixture(source, 'IMG_0005.JPG', photo);
    await writeFixture(source, 'copy_of_IMG_0005.JPG', photo);
    await writeFixture(source, 'VID_20220101_120000.mov', mp4WithCreationTime(null, 'qt  '));
    await writeFixture(source, 'notes.txt', 'shopping list');
  }

  it('sorts a mixed folder into month buckets', async () => {
    await writeMixedSource();

    const { results, summary } = await drain(coordinatorFor(configFor()));

    expect(results).toHaveLength(4);

    const photo = byName(results, 'IMG_0005.JPG');
    expect(photo.outcome).toBe('copied');
    expect(photo.decision?.relativePath).toBe('2023/03/IMG_0005.JPG');
    expect(photo.resolved?.state === 'resolved' && photo.resolved.strategy).toBe('exif');
    expect(photo.error).toBeUndefined();

    const copy = byName(results, 'copy_of_IMG_0005.JPG');
    expect(copy.outcome).toBe('skipped-duplicate');
    expect(copy.decision?.action).toBe('skip-duplicate');
    expect(copy.decision?.destinationPath).toBe(path.join(destination, '2023', '03', 'IMG_0005.JPG'));

    const video = byName(results, 'VID_20220101_120000.mov');
    expect(video.kind).toBe('mov');
    expect(video.decision?.relativePath).toBe('2022/01/VID_20220101_120000.mov');
    expect(video.resolved?.state === 'resolved' && video.resolved.strategy).toBe('filename');

    const notes = byName(results, 'notes.txt');
    expect(notes.status).toBe('succeeded');
    expect(notes.kind).toBe('unsupported');
    expect(notes.decision?.relativePath).toBe('Unknown/notes.txt');
    expect(notes.error).toEqual({ kind: 'UnsupportedFormat', message: 'Unsupported extension .txt' });

    expect(await listTree(destination)).toEqual([
      '2022/01/VID_20220101_120000.mov',
      '2023/03/IMG_0005.JPG',
      'Unknown/notes.txt',
    ]);
    expect(summary).toMatchObject({
      total: 4,
      processed: 4,
      succeeded: 4,
      failed: 0,
      copied: 3,
      skippedDuplicate: 1,
      skipped: 1,
      unsupported: 1,
      dryRun: false,
      cancelled: false,
      failures: [],
    });
  });

  it('skips everything on a second run over the same files', async () => {
    await writeMixedSource();
    await drain(coordinatorFor(configFor()));

    const { results, summary } = await drain(coordinatorFor(configFor()));

    expect(results.map((result) => result.outcome)).toEqual([
      'skipped-duplicate',
      'skipped-duplicate',
      'skipped-duplicate',
      'skipped-duplicate',
    ]);
    expect(summary.skippedDuplicate).toBe(4);
    expect(await listTree(destination)).toHaveLength(3);
  });

  it('prefers an embedded date over the file name', async () => {
    await writeFixture(source, 'IMG_20200101_101010.jpg', jpegWithExif('2023:03:14 10:00:00'));

    const { results } = await drain(coordinatorFor(configFor()));

    expect(results[0].decision?.relativePath).toBe('2023/03/IMG_20200101_101010.jpg');
  });

  it('gives same-named files distinct names in scan order', async () => {
    const mtime = new Date(2021, 6, 4, 12, 0, 0);
    for (let i = 1; i <= 20; i++) {
      const dir = `a${String(i).padStart(2, '0')}`;
      await writeFixture(source, `${dir}/IMG.JPG`, plainJpeg(`frame ${i}`), mtime);
    }

    const { results, summary } = await drain(coordinatorFor(configFor({ concurrency: 4 })));

    expect(summary.copied).toBe(20);
    expect(summary.renamed).toBe(19);
    expect(summary.lowConfidence).toBe(20);
    expect(byName(results, path.join('a01', 'IMG.JPG')).decision?.relativePath).toBe('2021/07/IMG.JPG');
    expect(byName(results, path.join('a20', 'IMG.JPG')).decision?.relativePath).toBe('2021/07/IMG_19.JPG');
    const names = await fs.readdir(path.join(destination, '2021', '07'));
    expect(new Set(names).size).toBe(20);
    expect(byName(results, path.join('a05', 'IMG.JPG')).error?.kind).toBe('MetadataUnreadable');
  });

  it('plans without touching the destination in a dry run', async () => {
    await writeMixedSource();
    const target = path.join(destination, 'not-yet');

    const { results, summary } = await drain(
      coordinatorFor(configFor({ destination: target, dryRun: true }))
    );

    expect(results.map((result) => result.outcome).sort()).toEqual(['planned', 'planned', 'planned', 'planned']);
    expect(byName(results, 'copy_of_IMG_0005.JPG').decision?.action).toBe('skip-duplicate');
    expect(summary).toMatchObject({ planned: 4, dryRun: true });
    await expect(fs.access(target)).rejects.toThrow();
    expect(await listTree(source)).toHaveLength(4);
  });

  it('moves files and prunes emptied source directories', async () => {
    await writeFixture(source, 'trip/day1/IMG_0005.JPG', jpegWithExif('2023:03:14 10:00:00'));
    await writeFixture(source, 'trip/Thumbs.db', 'junk');

    const { summary } = await drain(
      coordinatorFor(
        configFor({ mode: 'move', cleanup: { deleteJunk: true, removeEmptyDirs: true } })
      )
    );

    expect(summary.moved).toBe(1);
    expect(await fs.readdir(source)).toEqual([]);
    expect(await listTree(destination)).toEqual(['2023/03/IMG_0005.JPG']);
  });

  it('never scans a destination nested in the source', async () => {
    await writeFixture(source, 'IMG_0005.JPG', jpegWithExif('2023:03:14 10:00:00'));
    const nested = path.join(source, 'sorted');

    await drain(coordinatorFor(configFor({ destination: nested })));
    const second = await drain(coordinatorFor(configFor({ destination: nested })));

    expect(second.summary.total).toBe(1);
    expect(second.results[0].outcome).toBe('skipped-duplicate');
  });

  it('stops dispatching once cancelled', async () => {
    for (let i = 1; i <= 6; i++) {
      await writeFixture(source, `IMG_000${i}.JPG`, jpegWithExif('2023:03:14 10:00:00', `shot ${i}`));
    }
    const controller = new AbortController();
    const coordinator = coordinatorFor(configFor({ concurrency: 1 }));
    const iterator = coordinator.results(controller.signal);

    const first = await iterator.next();
    expect(first.done).toBe(false);
    controller.abort();

    let summary: RunSummary | undefined;
    while (!summary) {
      const step = await iterator.next();
      if (step.done) {
        summary = step.value;
      }
    }

    expect(summary.cancelled).toBe(true);
    expect(summary.processed).toBeLessThan(6);
    expect(summary.total).toBe(6);
  });

  it('runs only once', async () => {
    const coordinator = coordinatorFor(configFor());
    await drain(coordinator);

    expect(() => coordinator.results()).toThrow('This run has already been started');
  });

  it('aborts before scanning when the source is missing', async () => {
    await fs.rm(source, { recursive: true, force: true });

    const run = drain(coordinatorFor(configFor()));

    await expect(run).rejects.toBeInstanceOf(RunAbortedError);
    await expect(run).rejects.toThrow(/^Preflight failed: Source .* is not readable/);
  });

  it('aborts when the destination is a file', async () => {
    await writeFixture(source, 'IMG_0005.JPG', jpegWithExif('2023:03:14 10:00:00'));
    const target = await writeFixture(destination, 'occupied', 'not a directory');

    await expect(organize(configFor({ destination: target }), { logger: silentLogger })).rejects.toThrow(
      RunAbortedError
    );
  });

  it('handles single paths for watch mode', async () => {
    const coordinator = coordinatorFor(configFor());
    const added = await writeFixture(source, 'new/IMG_0007.JPG', jpegWithExif('2023:03:14 10:00:00'));
    const junk = await writeFixture(source, 'new/.DS_Store', 'junk');

    const result = await coordinator.processPath(added);

    expect(result?.decision?.relativePath).toBe('2023/03/IMG_0007.JPG');
    expect(await coordinator.processPath(junk)).toBeNull();
    expect(coordinator.progress).toEqual({ total: 1, processed: 1, succeeded: 1, failed: 0, skipped: 0 });
  });

  it('skips a reset camera clock for a later plausible EXIF tag', async () => {
    await writeFixture(
      source,
      'IMG_0001.JPG',
      jpegWithExifTags({ DateTimeOriginal: '1985:01:01 00:00:00', ModifyDate: '2023:03:14 09:30:00' })
    );

    const { results } = await drain(coordinatorFor(configFor()));

    const photo = byName(results, 'IMG_0001.JPG');
    expect(photo.resolved?.state === 'resolved' && photo.resolved.strategy).toBe('exif');
    expect(photo.decision?.relativePath).toBe('2023/03/IMG_0001.JPG');
  });

  it('ignores a watched path that is gone by the time it is handled', async () => {
    const coordinator = coordinatorFor(configFor());
    const added = await writeFixture(source, 'new/IMG_0007.JPG', jpegWithExif('2023:03:14 10:00:00'));
    await fs.rm(added);

    expect(await coordinator.processPath(added)).toBeNull();
    expect(coordinator.progress.total).toBe(0);
  });

  it('aborts when the destination stops being writable mid-run', async () => {
    await writeFixture(source, 'IMG_0001.JPG', plainJpeg('one'));
    await writeFixture(source, 'IMG_0002.JPG', plainJpeg('two!'));
    await writeFixture(source, 'IMG_0003.JPG', plainJpeg('three'));
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const strategy = new ScriptedStrategy((file) => (file.name === 'IMG_0001.JPG' ? Promise.resolve() : gate));
    const coordinator = coordinatorFor(configFor({ concurrency: 1 }), new ExtractorRegistry([strategy]));
    const iterator = coordinator.results();

    const first = await iterator.next();
    expect(first.done === false && first.value.outcome).toBe('copied');

    await fs.rm(destination, { recursive: true, force: true });
    await fs.writeFile(destination, 'no longer a directory');
    openGate();

    const rest: ProcessingResult[] = [];
    let caught: unknown;
    try {
      while (true) {
        const step = await iterator.next();
        if (step.done) {
          break;
        }
        rest.push(step.value);
      }
    } catch (error) {
      caught = error;
    }

    expect(rest.map((result) => result.error?.kind)).toEqual(['DestinationWriteFailed']);
    expect(caught).toBeInstanceOf(RunAbortedError);
    if (!(caught instanceof RunAbortedError)) {
      throw caught;
    }
    expect(caught.message).toMatch(/^Destination .* is not writable/);
    expect(caught.summary.processed).toBe(2);
    expect(caught.summary.failed).toBe(1);
  });

  it('keeps going when one source file becomes unreadable', async () => {
    await writeFixture(source, 'IMG_0001.JPG', plainJpeg('one'));
    await writeFixture(source, 'IMG_0002.JPG', plainJpeg('two!'));
    await writeFixture(source, 'IMG_0003.JPG', plainJpeg('three'));
    const strategy = new ScriptedStrategy((file) =>
      file.name === 'IMG_0002.JPG' ? fs.rm(file.path) : Promise.resolve()
    );

    const { results, summary } = await drain(
      coordinatorFor(configFor({ concurrency: 2 }), new ExtractorRegistry([strategy]))
    );

    expect(byName(results, 'IMG_0002.JPG').error?.kind).toBe('SourceUnreadable');
    expect(byName(results, 'IMG_0001.JPG').outcome).toBe('copied');
    expect(byName(results, 'IMG_0003.JPG').outcome).toBe('copied');
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      expect.objectContaining({ path: path.join(source, 'IMG_0002.JPG'), kind: 'SourceUnreadable' }),
    ]);
    expect(await listTree(destination)).toEqual(['2023/03/IMG_0001.JPG', '2023/03/IMG_0003.JPG']);
  });
});
