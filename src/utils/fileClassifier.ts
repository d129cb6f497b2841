import { promises as fs } from 'fs';
import * as path from 'path';
import { MediaKind } from '../types/MediaKind';
import { Classification } from '../types/MediaFile';

/**
 * Largest prefix the classifier ever looks at
 */
export const SNIFF_BYTES = 64;

const EXTENSION_KINDS: Readonly<Record<string, MediaKind>> = {
  '.jpg': MediaKind.JPEG,
  '.jpeg': MediaKind.JPEG,
  '.jpe': MediaKind.JPEG,
  '.jfif': MediaKind.JPEG,
  '.heic': MediaKind.HEIF,
  '.heif': MediaKind.HEIF,
  '.avif': MediaKind.AVIF,
  '.png': MediaKind.PNG,
  '.gif': MediaKind.GIF,
  '.webp': MediaKind.WEBP,
  '.tif': MediaKind.TIFF,
  '.tiff': MediaKind.TIFF,
  '.bmp': MediaKind.BMP,
  '.cr2': MediaKind.RAW,
  '.cr3': MediaKind.RAW,
  '.nef': MediaKind.RAW,
  '.nrw': MediaKind.RAW,
  '.arw': MediaKind.RAW,
  '.srf': MediaKind.RAW,
  '.sr2': MediaKind.RAW,
  '.dng': MediaKind.RAW,
  '.raf': MediaKind.RAW,
  '.rw2': MediaKind.RAW,
  '.orf': MediaKind.RAW,
  '.pef': MediaKind.RAW,
  '.srw': MediaKind.RAW,
  '.mp4': MediaKind.MP4,
  '.mov': MediaKind.MOV,
  '.qt': MediaKind.MOV,
  '.m4v': MediaKind.M4V,
  '.3gp': MediaKind.THREE_GP,
  '.3g2': MediaKind.THREE_GP,
  '.avi': MediaKind.AVI,
};

// Extensions whose container is shared, so the ftyp brand decides
const ISO_FAMILY = new Set(['.mp4', '.m4v', '.mov', '.qt', '.3gp', '.3g2', '.heic', '.heif', '.avif']);

const HEIF_BRANDS = new Set(['heic', 'heix', 'hevc', 'hevx', 'heim', 'heis', 'mif1', 'msf1']);
const AVIF_BRANDS = new Set(['avif', 'avis']);

// Top-level atoms that open QuickTime files written without an ftyp box
const QUICKTIME_ATOMS = new Set(['moov', 'mdat', 'wide', 'free', 'skip']);

interface Signature {
  kind: MediaKind;
  offset: number;
  bytes: number[];
}

const SIGNATURES: Signature[] = [
  { kind: MediaKind.JPEG, offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { kind: MediaKind.PNG, offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { kind: MediaKind.GIF, offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] },
  { kind: MediaKind.TIFF, offset: 0, bytes: [0x49, 0x49, 0x2a, 0x00] },
  { kind: MediaKind.TIFF, offset: 0, bytes: [0x4d, 0x4d, 0x00, 0x2a] },
  { kind: MediaKind.BMP, offset: 0, bytes: [0x42, 0x4d] },
];

/**
 * Kind suggested by the extension alone
 */
export function kindFromExtension(filePath: string): MediaKind | null {
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_KINDS[ext] ?? null;
}

/**
 * Match a byte prefix against the known format signatures
 */
export function sniffMediaKind(prefix: Uint8Array): MediaKind | null {
  const riff = sniffRiff(prefix);
  if (riff) {
    return riff;
  }

  const iso = sniffIsoBaseMedia(prefix);
  if (iso) {
    return iso;
  }

  for (const signature of SIGNATURES) {
    if (matchesAt(prefix, signature.offset, signature.bytes)) {
      return signature.kind;
    }
  }
  return null;
}

/**
 * Map a file to a media kind. The extension decides unless it is missing
 * or shared by the ISO base-media family, in which case `prefix` is sniffed.
 */
export function classifyFile(filePath: string, prefix?: Uint8Array): Classification {
  const ext = path.extname(filePath).toLowerCase();
  const declared = EXTENSION_KINDS[ext];

  if (declared && !ISO_FAMILY.has(ext)) {
    return { kind: declared, via: 'extension' };
  }

  if (ext && !declared) {
    return { kind: 'unsupported', reason: `Unsupported extension ${ext}` };
  }

  const sniffed = prefix ? sniffMediaKind(prefix) : null;
  if (sniffed) {
    return { kind: sniffed, via: 'signature' };
  }
  if (declared) {
    return { kind: declared, via: 'extension' };
  }
  return { kind: 'unsupported', reason: 'No extension and no known file signature' };
}

/**
 * Whether `classifyFile` would look at the content of this path
 */
export function needsSniffing(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '' || ISO_FAMILY.has(ext);
}

/**
 * Read at most `length` bytes from the start of a file
 */
export async function readPrefix(filePath: string, length = SNIFF_BYTES): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function sniffRiff(prefix: Uint8Array): MediaKind | null {
  if (ascii(prefix, 0, 4) !== 'RIFF') {
    return null;
  }
  const form = ascii(prefix, 8, 4);
  if (form === 'WEBP') {
    return MediaKind.WEBP;
  }
  if (form === 'AVI ') {
    return MediaKind.AVI;
  }
  return null;
}

function sniffIsoBaseMedia(prefix: Uint8Array): MediaKind | null {
  const boxType = ascii(prefix, 4, 4);
  if (QUICKTIME_ATOMS.has(boxType)) {
    return MediaKind.MOV;
  }
  if (boxType !== 'ftyp') {
    return null;
  }

  const brand = ascii(prefix, 8, 4);
  if (brand === 'qt  ') {
    return MediaKind.MOV;
  }
  if (brand.startsWith('3gp') || brand.startsWith('3g2')) {
    return MediaKind.THREE_GP;
  }
  if (brand.startsWith('M4V')) {
    return MediaKind.M4V;
  }
  if (HEIF_BRANDS.has(brand)) {
    return MediaKind.HEIF;
  }
  if (AVIF_BRANDS.has(brand)) {
    return MediaKind.AVIF;
  }
  return MediaKind.MP4;
}

function matchesAt(prefix: Uint8Array, offset: number, bytes: number[]): boolean {
  if (prefix.length < offset + bytes.length) {
    return false;
  }
  return bytes.every((byte, index) => prefix[offset + index] === byte);
}

function ascii(prefix: Uint8Array, offset: number, length: number): string {
  if (prefix.length < offset + length) {
    return '';
  }
  return String.fromCharCode(...prefix.subarray(offset, offset + length));
}
