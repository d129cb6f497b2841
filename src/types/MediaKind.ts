/**
 * Media kinds datesort knows how to date, independent of the extension string
 */
export enum MediaKind {
  JPEG = 'jpeg',
  HEIF = 'heif',
  AVIF = 'avif',
  PNG = 'png',
  GIF = 'gif',
  WEBP = 'webp',
  TIFF = 'tiff',
  BMP = 'bmp',
  RAW = 'raw',
  MP4 = 'mp4',
  MOV = 'mov',
  M4V = 'm4v',
  THREE_GP = '3gp',
  AVI = 'avi',
}

/**
 * Trust ordering of date sources, most trusted first
 */
export const CONFIDENCE_TIERS = [
  'embedded',
  'container',
  'descriptive',
  'filename',
  'filesystem',
] as const;

export type ConfidenceTier = (typeof CONFIDENCE_TIERS)[number];

/**
 * True when `tier` is at least as trusted as `minimum`
 */
export function tierAtLeast(tier: ConfidenceTier, minimum: ConfidenceTier): boolean {
  return CONFIDENCE_TIERS.indexOf(tier) <= CONFIDENCE_TIERS.indexOf(minimum);
}

const TIER_NAMES: ReadonlySet<string> = new Set(CONFIDENCE_TIERS);

export function isConfidenceTier(value: unknown): value is ConfidenceTier {
  return typeof value === 'string' && TIER_NAMES.has(value);
}
