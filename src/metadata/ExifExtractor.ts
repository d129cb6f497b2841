import exifr from 'exifr';
import { z } from 'zod';
import { DateStrategy, outcomeFromValues } from './DateStrategy';
import { ExtractionContext, ExtractionOutcome, MediaFile } from '../types/MediaFile';
import { fromLocalDate, formatCaptureDate } from '../utils/captureDate';

// exifr names DateTimeDigitized "CreateDate" and DateTime "ModifyDate"
export const EXIF_DATE_TAGS = ['DateTimeOriginal', 'CreateDate', 'ModifyDate'] as const;

const exifValueSchema = z.union([z.string(), z.date()]).optional();

const exifDatesSchema = z
  .object({
    DateTimeOriginal: exifValueSchema,
    CreateDate: exifValueSchema,
    ModifyDate: exifValueSchema,
  })
  .passthrough();

/**
 * Capture date from embedded EXIF tags, read with exifr
 */
export class ExifExtractor extends DateStrategy {
  readonly id = 'exif';
  readonly tier = 'embedded';

  protected async extract(file: MediaFile, context: ExtractionContext): Promise<ExtractionOutcome> {
    const data: unknown = await exifr.parse(file.path, {
      pick: [...EXIF_DATE_TAGS],
      reviveValues: false,
    });
    if (data === undefined || data === null) {
      return { status: 'absent' };
    }

    const parsed = exifDatesSchema.safeParse(data);
    if (!parsed.success) {
      return { status: 'failed', reason: `Unexpected EXIF payload: ${parsed.error.message}` };
    }

    return outcomeFromValues(
      EXIF_DATE_TAGS.map((tag) => asDateString(parsed.data[tag])),
      'EXIF',
      context.isPlausible
    );
  }
}

function asDateString(value: string | Date | undefined): string | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatCaptureDate(fromLocalDate(value));
  }
  return value;
}
