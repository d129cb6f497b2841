import { ConfidenceTier } from '../types/MediaKind';
import { CaptureDate, ExtractionContext, ExtractionOutcome, MediaFile, StrategyId } from '../types/MediaFile';
import { errorMessage } from '../errors';
import { isValidCalendarDate, parseDateString } from '../utils/captureDate';

/**
 * One way of finding a capture date for a file.
 * Uses Template Method pattern: `tryExtract` is the boundary the resolver
 * calls, subclasses implement `extract` and may throw freely inside it.
 */
export abstract class DateStrategy {
  abstract readonly id: StrategyId;
  abstract readonly tier: ConfidenceTier;

  /**
   * Never rejects. Any error raised while reading becomes a `failed` outcome.
   */
  async tryExtract(file: MediaFile, context: ExtractionContext = {}): Promise<ExtractionOutcome> {
    try {
      return await this.extract(file, context);
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error) };
    }
  }

  protected abstract extract(file: MediaFile, context: ExtractionContext): Promise<ExtractionOutcome>;
}

/**
 * First value in `values` that parses to a real calendar date and passes
 * `isPlausible`. When none passes, the first real calendar date is returned
 * so the caller can report what it rejected.
 */
export function firstParsedDate(
  values: Array<string | undefined>,
  isPlausible?: (date: CaptureDate) => boolean
): { date: CaptureDate; raw: string } | null {
  let fallback: { date: CaptureDate; raw: string } | null = null;
  for (const value of values) {
    if (value === undefined) {
      continue;
    }
    const raw = cleanValue(value);
    const date = parseDateString(raw);
    if (!date || !isValidCalendarDate(date)) {
      continue;
    }
    if (!isPlausible || isPlausible(date)) {
      return { date, raw };
    }
    if (!fallback) {
      fallback = { date, raw };
    }
  }
  return fallback;
}

/**
 * Outcome for a set of tag values: `found` for the first usable one,
 * `failed` when values exist but none parse, `absent` otherwise
 */
export function outcomeFromValues(
  values: Array<string | undefined>,
  source: string,
  isPlausible?: (date: CaptureDate) => boolean
): ExtractionOutcome {
  const parsed = firstParsedDate(values, isPlausible);
  if (parsed) {
    return { status: 'found', date: parsed.date, raw: parsed.raw };
  }
  const present = values.filter((value): value is string => value !== undefined);
  if (present.length > 0) {
    return { status: 'failed', reason: `Unparseable ${source} date "${cleanValue(present[0])}"` };
  }
  return { status: 'absent' };
}

function cleanValue(value: string): string {
  return value.replace(/\0+$/, '').trim();
}
