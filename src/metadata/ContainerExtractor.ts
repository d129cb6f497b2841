import { promises as fs } from 'fs';
import { DateStrategy } from './DateStrategy';
import { ExtractionOutcome, MediaFile } from '../types/MediaFile';
import { formatCaptureDate, fromUtcDate } from '../utils/captureDate';

// mvhd times count seconds from this instant
const MAC_EPOCH_MS = Date.UTC(1904, 0, 1);
const MAX_BOXES = 1024;

type FileHandle = fs.FileHandle;

interface BoxRange {
  start: number;
  dataStart: number;
  end: number;
}

/**
 * Capture date from the ISO base-media `moov/mvhd` creation time,
 * parsed in-process so it works where ffprobe is not installed
 */
export class ContainerExtractor extends DateStrategy {
  readonly id = 'mp4-container';
  readonly tier = 'container';

  protected async extract(file: MediaFile): Promise<ExtractionOutcome> {
    const seconds = await readMovieCreationTime(file.path, file.size);
    if (seconds === null || seconds === 0) {
      return { status: 'absent' };
    }
    const date = fromUtcDate(new Date(MAC_EPOCH_MS + seconds * 1000));
    return { status: 'found', date, raw: formatCaptureDate(date) };
  }
}

/**
 * Seconds since 1904-01-01 UTC from `mvhd`, or null when there is no such box
 */
export async function readMovieCreationTime(filePath: string, size: number): Promise<number | null> {
  const handle = await fs.open(filePath, 'r');
  try {
    const moov = await findBox(handle, 0, size, 'moov');
    if (!moov) {
      return null;
    }
    const mvhd = await findBox(handle, moov.dataStart, moov.end, 'mvhd');
    if (!mvhd) {
      return null;
    }

    const body = Buffer.alloc(12);
    const { bytesRead } = await handle.read(body, 0, 12, mvhd.dataStart);
    if (bytesRead < 8) {
      throw new Error('Truncated mvhd box');
    }
    const version = body.readUInt8(0);
    if (version === 1) {
      if (bytesRead < 12) {
        throw new Error('Truncated mvhd box');
      }
      return Number(body.readBigUInt64BE(4));
    }
    return body.readUInt32BE(4);
  } finally {
    await handle.close();
  }
}

async function findBox(
  handle: FileHandle,
  start: number,
  end: number,
  type: string
): Promise<BoxRange | null> {
  const header = Buffer.alloc(16);
  let position = start;

  for (let count = 0; count < MAX_BOXES && position + 8 <= end; count++) {
    const { bytesRead } = await handle.read(header, 0, 16, position);
    if (bytesRead < 8) {
      return null;
    }

    let boxSize = header.readUInt32BE(0);
    let headerSize = 8;
    if (boxSize === 1) {
      if (bytesRead < 16) {
        return null;
      }
      boxSize = Number(header.readBigUInt64BE(8));
      headerSize = 16;
    } else if (boxSize === 0) {
      boxSize = end - position;
    }
    if (boxSize < headerSize) {
      throw new Error(`Malformed box at offset ${position}`);
    }

    const boxEnd = Math.min(position + boxSize, end);
    if (header.toString('latin1', 4, 8) === type) {
      return { start: position, dataStart: position + headerSize, end: boxEnd };
    }
    position += boxSize;
  }
  return null;
}
