import { ConfidenceTier } from '../types/MediaKind';

/**
 * Defaults for what counts as a plausible capture date.
 * All of these can be overridden under `dates` in the configuration file.
 */

// Consumer digital cameras are rare before this
export const DEFAULT_MIN_YEAR = 1990;

// Clock skew and time zones can push a fresh file into next year
export const DEFAULT_YEARS_AHEAD = 1;

export const DEFAULT_MINIMUM_TIER: ConfidenceTier = 'filename';

/**
 * Filename date patterns, tried in order. Each needs the named groups
 * `y`, `m` and `d`; `H`, `M` and `S` are optional.
 */
export const DEFAULT_FILENAME_PATTERNS: readonly string[] = [
  // IMG_20220101_120000.jpg, VID_20220101_120000.mp4, PXL_20220101_120000123.jpg
  '(?<!\\d)(?<y>\\d{4})(?<m>\\d{2})(?<d>\\d{2})[_-](?<H>\\d{2})(?<M>\\d{2})(?<S>\\d{2})\\d{0,3}(?!\\d)',
  // Screenshot 2022-01-01 at 12.00.00.png, 2022-01-01 12-00-00.jpg, 2022-01-01T12:00:00
  '(?<!\\d)(?<y>\\d{4})-(?<m>\\d{2})-(?<d>\\d{2})(?:[ _T]|\\sat\\s)(?<H>\\d{2})[.:-](?<M>\\d{2})[.:-](?<S>\\d{2})(?!\\d)',
  // 2022-01-01.jpg, trip_2022-01-01_beach.jpg
  '(?<!\\d)(?<y>\\d{4})-(?<m>\\d{2})-(?<d>\\d{2})(?!\\d)',
  // IMG-20220101-WA0001.jpg
  '(?<!\\d)(?<y>(?:19|20)\\d{2})(?<m>\\d{2})(?<d>\\d{2})(?!\\d)',
];

/**
 * Files that are never organized. They can optionally be deleted from the
 * source tree (`cleanup.deleteJunk`).
 */
export const DEFAULT_JUNK_FILES: readonly string[] = ['Thumbs.db', 'desktop.ini', '.DS_Store'];

export const DEFAULT_UNKNOWN_FOLDER = 'Unknown';
