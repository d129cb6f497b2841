import crypto from 'crypto';
import { createReadStream } from 'fs';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';

/**
 * Hash a file by streaming it, so multi-gigabyte videos never sit in memory.
 *
 * @returns hex digest
 */
export async function hashFile(filePath: string, algorithm: string, signal?: AbortSignal): Promise<string> {
  const hash = crypto.createHash(algorithm);
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      callback();
    },
  });
  await pipeline(createReadStream(filePath), sink, { signal });
  return hash.digest('hex');
}
