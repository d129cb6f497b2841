import fs from 'fs/promises';
import path from 'path';

import { ExifExtractor } from '../../src/metadata/ExifExtractor';
import { XmpExtractor, readXmpValue } from '../../src/metadata/XmpExtractor';
import { PngTextExtractor } from '../../src/metadata/PngTextExtractor';
import { ContainerExtractor } from '../../src/metadata/ContainerExtractor';
import { FilenameExtractor } from '../../src/metadata/FilenameExtractor';
import { VideoExtractor, extractProbeDate } from '../../src/metadata/VideoExtractor';
import { DateStrategy } from '../../src/metadata/DateStrategy';
import { DEFAULT_FILENAME_PATTERNS } from '../../src/config/dateRules';
import { CaptureDate, ExtractionOutcome, MediaFile } from '../../src/types/MediaFile';
import { errorCode } from '../../src/errors';
import {
  jpegWithExif,
  jpegWithExifTags,
  makeTempDir,
  mediaFileFor,
  mp4WithCreationTime,
  plainJpeg,
  pngWithText,
  withXmp,
  writeFixture,
} from '../helpers/media';

describe('date strategies', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function fixture(name: string, contents: Buffer): Promise<MediaFile> {
    return mediaFileFor(root, await writeFixture(root, name, contents));
  }

  describe('ExifExtractor', () => {
    it('reads DateTimeOriginal', async () => {
      const file = await fixture('IMG_0005.JPG', jpegWithExif('2023:03:14 10:00:00'));
      const outcome = await new ExifExtractor().tryExtract(file);
      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2023, month: 3, day: 14, hour: 10, minute: 0, second: 0 },
        raw: '2023:03:14 10:00:00',
      });
    });

    it('does not find a date in a JPEG without EXIF', async () => {
      const file = await fixture('plain.jpg', plainJpeg('nothing here'));
      const outcome = await new ExifExtractor().tryExtract(file);
      expect(outcome.status).not.toBe('found');
    });

    it('reports a placeholder date as failed', async () => {
      const file = await fixture('unset.jpg', jpegWithExif('0000:00:00 00:00:00'));
      const outcome = await new ExifExtractor().tryExtract(file);
      expect(outcome).toEqual({
        status: 'failed',
        reason: 'Unparseable EXIF date "0000:00:00 00:00:00"',
      });
    });
  });

  describe('XmpExtractor', () => {
    it('prefers exif:DateTimeOriginal over xmp:CreateDate', async () => {
      const contents = withXmp(plainJpeg(), {
        'xmp:CreateDate': '2019-05-05T08:00:00',
        'exif:DateTimeOriginal': '2018-04-04T07:00:00+02:00',
      });
      const file = await fixture('edited.jpg', contents);
      const outcome = await new XmpExtractor().tryExtract(file);
      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2018, month: 4, day: 4, hour: 7, minute: 0, second: 0 },
        raw: '2018-04-04T07:00:00+02:00',
      });
    });

    it('is absent when there is no packet', async () => {
      const file = await fixture('plain.gif', Buffer.from('GIF89a-no-metadata', 'latin1'));
      expect(await new XmpExtractor().tryExtract(file)).toEqual({ status: 'absent' });
    });

    it('reads element-form values', () => {
      const packet = '<x:xmpmeta><xmp:ModifyDate>2020-01-02</xmp:ModifyDate></x:xmpmeta>';
      expect(readXmpValue(packet, 'xmp:ModifyDate')).toBe('2020-01-02');
      expect(readXmpValue(packet, 'xmp:CreateDate')).toBeUndefined();
    });
  });

  describe('PngTextExtractor', () => {
    it('reads date:create', async () => {
      const file = await fixture(
        'screen.png',
        pngWithText([
          ['Software', 'paint'],
          ['date:create', '2021-08-09T10:11:12+00:00'],
        ])
      );
      const outcome = await new PngTextExtractor().tryExtract(file);
      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2021, month: 8, day: 9, hour: 10, minute: 11, second: 12 },
        raw: '2021-08-09T10:11:12+00:00',
      });
    });

    it('prefers Creation Time over date:modify', async () => {
      const file = await fixture(
        'art.png',
        pngWithText([
          ['date:modify', '2022-02-02T00:00:00'],
          ['Creation Time', 'Tue, 14 Mar 2023 10:05:00 GMT'],
        ])
      );
      const outcome = await new PngTextExtractor().tryExtract(file);
      expect(outcome.status === 'found' && outcome.date).toEqual({
        year: 2023,
        month: 3,
        day: 14,
        hour: 10,
        minute: 5,
        second: 0,
      });
    });

    it('is absent without text chunks', async () => {
      const file = await fixture('empty.png', pngWithText([]));
      expect(await new PngTextExtractor().tryExtract(file)).toEqual({ status: 'absent' });
    });
  });

  describe('ContainerExtractor', () => {
    it('reads the mvhd creation time after an mdat box', async () => {
      const file = await fixture('clip.mp4', mp4WithCreationTime(new Date(Date.UTC(2022, 0, 1, 12, 0, 0))));
      const outcome = await new ContainerExtractor().tryExtract(file);
      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2022, month: 1, day: 1, hour: 12, minute: 0, second: 0 },
        raw: '2022-01-01 12:00:00',
      });
    });

    it('reads version 1 boxes', async () => {
      const file = await fixture(
        'clip.mov',
        mp4WithCreationTime(new Date(Date.UTC(2020, 6, 15, 6, 30, 0)), 'qt  ', 1)
      );
      const outcome = await new ContainerExtractor().tryExtract(file);
      expect(outcome.status === 'found' && outcome.date).toEqual({
        year: 2020,
        month: 7,
        day: 15,
        hour: 6,
        minute: 30,
        second: 0,
      });
    });

    it('treats a zero creation time as absent', async () => {
      const file = await fixture('VID_20220101_120000.mov', mp4WithCreationTime(null, 'qt  '));
      expect(await new ContainerExtractor().tryExtract(file)).toEqual({ status: 'absent' });
    });

    it('is absent for files without a moov box', async () => {
      const file = await fixture('broken.mp4', Buffer.from('\0\0\0\x10junkjunkjunkjunk', 'latin1'));
      expect(await new ContainerExtractor().tryExtract(file)).toEqual({ status: 'absent' });
    });
  });

  describe('FilenameExtractor', () => {
    const extractor = new FilenameExtractor(DEFAULT_FILENAME_PATTERNS);

    async function dateFor(name: string): Promise<ExtractionOutcome> {
      return extractor.tryExtract(await fixture(name, Buffer.from('x')));
    }

    it('reads YYYYMMDD_HHMMSS names', async () => {
      expect(await dateFor('VID_20220101_120000.mov')).toEqual({
        status: 'found',
        date: { year: 2022, month: 1, day: 1, hour: 12, minute: 0, second: 0 },
        raw: 'VID_20220101_120000',
      });
    });

    it('reads dashed dates with dotted times', async () => {
      const outcome = await dateFor('Screenshot 2021-11-05 at 09.15.30.png');
      expect(outcome.status === 'found' && outcome.date).toEqual({
        year: 2021,
        month: 11,
        day: 5,
        hour: 9,
        minute: 15,
        second: 30,
      });
    });

    it('reads bare YYYYMMDD names', async () => {
      const outcome = await dateFor('IMG-20190312-WA0001.jpg');
      expect(outcome.status === 'found' && outcome.date).toEqual({ year: 2019, month: 3, day: 12 });
    });

    it('ignores digit runs that are not dates', async () => {
      expect(await dateFor('IMG_0005.JPG')).toEqual({ status: 'absent' });
      expect(await dateFor('DSC_20231399.jpg')).toEqual({ status: 'absent' });
    });
  });

  describe('extractProbeDate', () => {
    it('reads creation_time from format tags', () => {
      const outcome = extractProbeDate({
        format: { tags: { creation_time: '2021-06-01T18:20:00.000000Z', encoder: 'x' } },
        streams: [],
      });
      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2021, month: 6, day: 1, hour: 18, minute: 20, second: 0 },
        raw: '2021-06-01T18:20:00.000000Z',
      });
    });

    it('falls back to stream tags', () => {
      const outcome = extractProbeDate({
        format: { tags: {} },
        streams: [{ tags: { language: 'und' } }, { tags: { CREATION_TIME: '2020-02-02T02:02:02Z' } }],
      });
      expect(outcome.status === 'found' && outcome.date.year).toBe(2020);
    });

    it('is absent when no tag carries a date', () => {
      expect(extractProbeDate({ format: {}, streams: [{}] })).toEqual({ status: 'absent' });
    });

    it('fails on malformed output', () => {
      expect(extractProbeDate({ streams: 'nope' }).status).toBe('failed');
    });
  });

  describe('DateStrategy', () => {
    class ExplodingStrategy extends DateStrategy {
      readonly id = 'xmp';
      readonly tier = 'descriptive';

      protected async extract(): Promise<ExtractionOutcome> {
        throw new Error('corrupt block');
      }
    }

    it('turns thrown errors into failed outcomes', async () => {
      const file = await fixture('bad.jpg', Buffer.from('x'));
      expect(await new ExplodingStrategy().tryExtract(file)).toEqual({
        status: 'failed',
        reason: 'corrupt block',
      });
    });
  });

  describe('choosing among several date tags', () => {
    const after1990 = (date: CaptureDate) => date.year >= 1990;

    it('skips an implausible DateTimeOriginal for a plausible ModifyDate', async () => {
      const file = await fixture(
        'reset-clock.jpg',
        jpegWithExifTags({ DateTimeOriginal: '1985:01:01 00:00:00', ModifyDate: '2023:03:14 09:30:00' })
      );

      const outcome = await new ExifExtractor().tryExtract(file, { isPlausible: after1990 });

      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2023, month: 3, day: 14, hour: 9, minute: 30, second: 0 },
        raw: '2023:03:14 09:30:00',
      });
    });

    it('keeps tag priority when no plausibility rule is given', async () => {
      const file = await fixture(
        'reset-clock.jpg',
        jpegWithExifTags({ DateTimeOriginal: '1985:01:01 00:00:00', ModifyDate: '2023:03:14 09:30:00' })
      );

      const outcome = await new ExifExtractor().tryExtract(file);

      expect(outcome.status === 'found' && outcome.date.year).toBe(1985);
    });

    it('returns the implausible date when it is the only one', async () => {
      const file = await fixture('old.jpg', jpegWithExifTags({ DateTimeOriginal: '1985:01:01 00:00:00' }));

      const outcome = await new ExifExtractor().tryExtract(file, { isPlausible: after1990 });

      expect(outcome.status === 'found' && outcome.date.year).toBe(1985);
    });

    it('applies the rule to XMP properties', async () => {
      const contents = withXmp(plainJpeg(), {
        'exif:DateTimeOriginal': '1980-01-01T00:00:00',
        'xmp:CreateDate': '2019-05-05T08:00:00',
      });
      const file = await fixture('scan.jpg', contents);

      const outcome = await new XmpExtractor().tryExtract(file, { isPlausible: after1990 });

      expect(outcome.status === 'found' && outcome.raw).toBe('2019-05-05T08:00:00');
    });

    it('applies the rule to PNG text keywords', async () => {
      const file = await fixture(
        'art.png',
        pngWithText([
          ['Creation Time', '1970:01:01 00:00:00'],
          ['date:create', '2021-08-09T10:11:12'],
        ])
      );

      const outcome = await new PngTextExtractor().tryExtract(file, { isPlausible: after1990 });

      expect(outcome.status === 'found' && outcome.date.year).toBe(2021);
    });

    it('applies the rule to container tags', () => {
      const outcome = extractProbeDate(
        {
          format: { tags: { creation_time: '1970-01-01T00:00:00.000000Z' } },
          streams: [{ tags: { creation_time: '2020-02-02T02:02:02.000000Z' } }],
        },
        after1990
      );

      expect(outcome.status === 'found' && outcome.date.year).toBe(2020);
    });
  });

  describe('VideoExtractor', () => {
    async function fakeFfprobe(body: string): Promise<string> {
      const script = await writeFixture(root, 'bin/ffprobe', `#!/bin/sh\n${body}\n`);
      await fs.chmod(script, 0o755);
      return script;
    }

    it('reads the date from ffprobe JSON output', async () => {
      const json = JSON.stringify({ format: { tags: { creation_time: '2021-06-01T18:20:00.000000Z' } } });
      const ffprobe = await fakeFfprobe(`printf '%s' '${json}'`);
      const file = await fixture('clip.mov', Buffer.from('x'));

      const outcome = await new VideoExtractor(ffprobe).tryExtract(file);

      expect(outcome).toEqual({
        status: 'found',
        date: { year: 2021, month: 6, day: 1, hour: 18, minute: 20, second: 0 },
        raw: '2021-06-01T18:20:00.000000Z',
      });
    });

    it('fails when ffprobe cannot be started', async () => {
      const file = await fixture('clip.mov', Buffer.from('x'));

      const outcome = await new VideoExtractor(path.join(root, 'missing-ffprobe')).tryExtract(file);

      expect(outcome.status).toBe('failed');
    });

    it('kills a hanging ffprobe once the attempt is abandoned', async () => {
      const pidFile = path.join(root, 'ffprobe.pid');
      const ffprobe = await fakeFfprobe(`echo $$ > '${pidFile}'\nexec sleep 30`);
      const file = await fixture('clip.mov', Buffer.from('x'));
      const controller = new AbortController();

      const pending = new VideoExtractor(ffprobe).tryExtract(file, { signal: controller.signal });
      const pid = Number(await waitFor(() => readIfPresent(pidFile)));
      controller.abort();
      const outcome = await pending;

      expect(outcome.status).toBe('failed');
      expect(await waitFor(async () => (isRunning(pid) ? null : 'gone'))).toBe('gone');
    });
  });
});

async function readIfPresent(filePath: string): Promise<string | null> {
  try {
    const text = (await fs.readFile(filePath, 'utf8')).trim();
    return text === '' ? null : text;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

async function waitFor<T>(check: () => Promise<T | null>, timeoutMs = 4000): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const value = await check();
    if (value !== null) {
      return value;
    }
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
  throw new Error(`Condition not met within ${timeoutMs}ms`);
}

function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) !== 'ESRCH';
  }
}
