import { promises as fs } from 'fs';
import { DateStrategy, outcomeFromValues } from './DateStrategy';
import { ExtractionContext, ExtractionOutcome, MediaFile } from '../types/MediaFile';

export const PNG_DATE_KEYS = ['Creation Time', 'creation_time', 'date:create', 'date:modify'] as const;

const PNG_SIGNATURE_LENGTH = 8;
const MAX_CHUNKS = 4096;
const MAX_TEXT_CHUNK_BYTES = 64 * 1024;

/**
 * Capture date from PNG `tEXt` and uncompressed `iTXt` chunks
 */
export class PngTextExtractor extends DateStrategy {
  readonly id = 'png-text';
  readonly tier = 'descriptive';

  protected async extract(file: MediaFile, context: ExtractionContext): Promise<ExtractionOutcome> {
    const entries = await readPngText(file.path, file.size);
    return outcomeFromValues(
      PNG_DATE_KEYS.map((key) => entries.get(key)),
      'PNG text',
      context.isPlausible
    );
  }
}

/**
 * Walk the chunk list and collect keyword/text pairs
 */
export async function readPngText(filePath: string, size: number): Promise<Map<string, string>> {
  const entries = new Map<string, string>();
  const handle = await fs.open(filePath, 'r');
  try {
    const header = Buffer.alloc(8);
    let position = PNG_SIGNATURE_LENGTH;

    for (let count = 0; count < MAX_CHUNKS && position + 8 <= size; count++) {
      const { bytesRead } = await handle.read(header, 0, 8, position);
      if (bytesRead < 8) {
        break;
      }
      const length = header.readUInt32BE(0);
      const type = header.toString('latin1', 4, 8);
      if (type === 'IEND') {
        break;
      }

      if ((type === 'tEXt' || type === 'iTXt') && length <= MAX_TEXT_CHUNK_BYTES) {
        const data = Buffer.alloc(length);
        await handle.read(data, 0, length, position + 8);
        const entry = type === 'tEXt' ? decodeText(data) : decodeInternationalText(data);
        if (entry && !entries.has(entry.keyword)) {
          entries.set(entry.keyword, entry.text);
        }
      }

      position += 12 + length;
    }
  } finally {
    await handle.close();
  }
  return entries;
}

function decodeText(data: Buffer): { keyword: string; text: string } | null {
  const separator = data.indexOf(0);
  if (separator < 0) {
    return null;
  }
  return {
    keyword: data.toString('latin1', 0, separator),
    text: data.toString('latin1', separator + 1),
  };
}

// keyword\0 flag method language\0 translated\0 text
function decodeInternationalText(data: Buffer): { keyword: string; text: string } | null {
  const keywordEnd = data.indexOf(0);
  if (keywordEnd < 0 || data[keywordEnd + 1] !== 0) {
    return null; // compressed
  }
  const languageEnd = data.indexOf(0, keywordEnd + 3);
  if (languageEnd < 0) {
    return null;
  }
  const translatedEnd = data.indexOf(0, languageEnd + 1);
  if (translatedEnd < 0) {
    return null;
  }
  return {
    keyword: data.toString('latin1', 0, keywordEnd),
    text: data.toString('utf8', translatedEnd + 1),
  };
}
