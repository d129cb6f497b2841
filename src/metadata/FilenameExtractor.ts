import * as path from 'path';
import { DateStrategy } from './DateStrategy';
import { CaptureDate, ExtractionContext, ExtractionOutcome, MediaFile } from '../types/MediaFile';
import { isValidCalendarDate } from '../utils/captureDate';

/**
 * Capture date from a date pattern in the file name, e.g. `VID_20220101_120000.mov`
 */
export class FilenameExtractor extends DateStrategy {
  readonly id = 'filename';
  readonly tier = 'filename';

  private readonly patterns: RegExp[];

  constructor(patterns: readonly string[]) {
    super();
    this.patterns = patterns.map((source) => new RegExp(source));
  }

  protected async extract(file: MediaFile, context: ExtractionContext): Promise<ExtractionOutcome> {
    const stem = path.basename(file.name, path.extname(file.name));
    const date = matchFilenameDate(stem, this.patterns, context.isPlausible);
    return date ? { status: 'found', date, raw: stem } : { status: 'absent' };
  }
}

/**
 * First pattern whose match forms a real, plausible calendar date. Falls
 * back to the first real calendar date when none is plausible.
 */
export function matchFilenameDate(
  stem: string,
  patterns: RegExp[],
  isPlausible?: (date: CaptureDate) => boolean
): CaptureDate | null {
  let fallback: CaptureDate | null = null;
  for (const pattern of patterns) {
    const groups = pattern.exec(stem)?.groups;
    if (!groups || !groups.y || !groups.m || !groups.d) {
      continue;
    }

    const date: CaptureDate = {
      year: Number(groups.y),
      month: Number(groups.m),
      day: Number(groups.d),
    };
    if (groups.H && groups.M) {
      date.hour = Number(groups.H);
      date.minute = Number(groups.M);
      date.second = groups.S ? Number(groups.S) : 0;
    }

    if (!isValidCalendarDate(date)) {
      continue;
    }
    if (!isPlausible || isPlausible(date)) {
      return date;
    }
    if (!fallback) {
      fallback = date;
    }
  }
  return fallback;
}
