import { CaptureDate } from '../types/MediaFile';

export interface PlausibilityRules {
  minYear: number;
  yearsAhead: number;
}

// "2023:03:14 10:00:00", "2023-03-14T10:00:00.123+01:00", "2023-03-14", ...
const DATE_STRING_PATTERN =
  /^(\d{4})[:\-/](\d{2})[:\-/](\d{2})(?:[T ]+(\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2}|UTC)?$/i;

// "Tue, 14 Mar 2023 10:00:00 GMT", as PNG "Creation Time" chunks often carry
const RFC_DATE_PATTERN =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})(?:\s+(\d{2}):(\d{2})(?::(\d{2}))?)?(?:\s+(?:[A-Z]{1,4}|[+-]\d{4}))?$/;

const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Placeholders cameras write when the clock was never set
const PLACEHOLDER_PATTERN = /^(?:0000[:-]00[:-]00|[\s:.-]*)$/;

/**
 * Parse the date strings found in EXIF, XMP and container tags into a
 * tuple. Time zone suffixes are stripped, never applied: the wall-clock
 * digits are what the camera recorded. Returns null for anything else,
 * including placeholder values.
 */
export function parseDateString(value: string): CaptureDate | null {
  const trimmed = value.replace(/\0+$/, '').trim();
  if (PLACEHOLDER_PATTERN.test(trimmed) || trimmed.startsWith('0000')) {
    return null;
  }

  const match = DATE_STRING_PATTERN.exec(trimmed);
  if (match) {
    const [, year, month, day, hour, minute, second] = match;
    return buildDate(Number(year), Number(month), Number(day), hour, minute, second);
  }

  const rfc = RFC_DATE_PATTERN.exec(trimmed);
  if (rfc) {
    const [, day, monthName, year, hour, minute, second] = rfc;
    const month = MONTH_NAMES.indexOf(monthName.toLowerCase()) + 1;
    if (month === 0) {
      return null;
    }
    return buildDate(Number(year), month, Number(day), hour, minute, second);
  }

  return null;
}

function buildDate(
  year: number,
  month: number,
  day: number,
  hour: string | undefined,
  minute: string | undefined,
  second: string | undefined
): CaptureDate {
  const date: CaptureDate = { year, month, day };
  if (hour !== undefined && minute !== undefined) {
    date.hour = Number(hour);
    date.minute = Number(minute);
    date.second = second === undefined ? 0 : Number(second);
  }
  return date;
}

/**
 * Whether the tuple names a real calendar date and time
 */
export function isValidCalendarDate(date: CaptureDate): boolean {
  const { year, month, day } = date;
  if (![year, month, day].every(Number.isInteger)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return false;
  }
  return (
    inRange(date.hour, 0, 23) && inRange(date.minute, 0, 59) && inRange(date.second, 0, 59)
  );
}

/**
 * The single acceptance rule every date source goes through.
 */
export function isPlausibleDate(
  date: CaptureDate,
  rules: PlausibilityRules,
  now: Date
): boolean {
  if (!isValidCalendarDate(date)) {
    return false;
  }
  return date.year >= rules.minYear && date.year <= now.getFullYear() + rules.yearsAhead;
}

export function fromLocalDate(value: Date): CaptureDate {
  return {
    year: value.getFullYear(),
    month: value.getMonth() + 1,
    day: value.getDate(),
    hour: value.getHours(),
    minute: value.getMinutes(),
    second: value.getSeconds(),
  };
}

export function fromUtcDate(value: Date): CaptureDate {
  return {
    year: value.getUTCFullYear(),
    month: value.getUTCMonth() + 1,
    day: value.getUTCDate(),
    hour: value.getUTCHours(),
    minute: value.getUTCMinutes(),
    second: value.getUTCSeconds(),
  };
}

/**
 * `2023-03-14 10:00:00`, or `2023-03-14` when the source carried no time
 */
export function formatCaptureDate(date: CaptureDate): string {
  const day = `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
  if (date.hour === undefined) {
    return day;
  }
  return `${day} ${pad(date.hour)}:${pad(date.minute ?? 0)}:${pad(date.second ?? 0)}`;
}

export function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function inRange(value: number | undefined, min: number, max: number): boolean {
  return value === undefined || (Number.isInteger(value) && value >= min && value <= max);
}
