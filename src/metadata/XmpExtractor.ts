import { promises as fs } from 'fs';
import { DateStrategy, outcomeFromValues } from './DateStrategy';
import { ExtractionContext, ExtractionOutcome, MediaFile } from '../types/MediaFile';

// Packets sit near the start of the file in every format we handle
export const XMP_SCAN_BYTES = 3 * 1024 * 1024;

export const XMP_DATE_TAGS = [
  'exif:DateTimeOriginal',
  'photoshop:DateCreated',
  'xmp:CreateDate',
  'xmp:ModifyDate',
] as const;

/**
 * Capture date from an embedded XMP packet
 */
export class XmpExtractor extends DateStrategy {
  readonly id = 'xmp';
  readonly tier = 'descriptive';

  protected async extract(file: MediaFile, context: ExtractionContext): Promise<ExtractionOutcome> {
    const handle = await fs.open(file.path, 'r');
    let text: string;
    try {
      const length = Math.min(file.size, XMP_SCAN_BYTES);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      text = buffer.subarray(0, bytesRead).toString('latin1');
    } finally {
      await handle.close();
    }

    const packet = findXmpPacket(text);
    if (!packet) {
      return { status: 'absent' };
    }
    return outcomeFromValues(
      XMP_DATE_TAGS.map((tag) => readXmpValue(packet, tag)),
      'XMP',
      context.isPlausible
    );
  }
}

export function findXmpPacket(text: string): string | null {
  const start = text.indexOf('<x:xmpmeta');
  if (start < 0) {
    return null;
  }
  const end = text.indexOf('</x:xmpmeta>', start);
  return end < 0 ? text.slice(start) : text.slice(start, end);
}

/**
 * Value of a property in either attribute form (`xmp:CreateDate="..."`)
 * or element form (`<xmp:CreateDate>...</xmp:CreateDate>`)
 */
export function readXmpValue(packet: string, tag: string): string | undefined {
  const attribute = new RegExp(`${tag}\\s*=\\s*["']([^"']*)["']`).exec(packet);
  if (attribute) {
    return attribute[1].trim();
  }
  const element = new RegExp(`<${tag}>([^<]*)</${tag}>`).exec(packet);
  return element ? element[1].trim() : undefined;
}
