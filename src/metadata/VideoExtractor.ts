import { execFile } from 'child_process';
import { z } from 'zod';
import { DateStrategy, outcomeFromValues } from './DateStrategy';
import { errorMessage } from '../errors';
import { CaptureDate, ExtractionContext, ExtractionOutcome, MediaFile } from '../types/MediaFile';

// ffprobe JSON for a container is a few KiB; chapter-heavy files stay well under this
const PROBE_OUTPUT_LIMIT = 4 * 1024 * 1024;

export const PROBE_DATE_TAGS = ['creation_time', 'com.apple.quicktime.creationdate', 'date'] as const;

const tagsSchema = z.record(z.union([z.string(), z.number()])).optional();

const probeSchema = z
  .object({
    format: z.object({ tags: tagsSchema }).passthrough().optional(),
    streams: z.array(z.object({ tags: tagsSchema }).passthrough()).optional(),
  })
  .passthrough();

/**
 * Capture date from container tags reported by ffprobe.
 * Requires ffprobe on the PATH, or `probe.ffprobePath`. The child is killed
 * when the context signal fires.
 */
export class VideoExtractor extends DateStrategy {
  readonly id = 'ffprobe';
  readonly tier = 'container';

  constructor(private readonly ffprobePath: string = 'ffprobe') {
    super();
  }

  protected async extract(file: MediaFile, context: ExtractionContext): Promise<ExtractionOutcome> {
    const data = await this.runFfprobe(file.path, context.signal);
    return extractProbeDate(data, context.isPlausible);
  }

  private runFfprobe(filePath: string, signal?: AbortSignal): Promise<unknown> {
    const args = ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', filePath];
    return new Promise((resolve, reject) => {
      execFile(
        this.ffprobePath,
        args,
        { signal, killSignal: 'SIGKILL', maxBuffer: PROBE_OUTPUT_LIMIT, windowsHide: true },
        (error, stdout) => {
          if (error) {
            reject(error);
            return;
          }
          try {
            const data: unknown = JSON.parse(stdout);
            resolve(data);
          } catch (parseError) {
            reject(new Error(`ffprobe printed invalid JSON: ${errorMessage(parseError)}`));
          }
        }
      );
    });
  }
}

/**
 * Pick the date out of ffprobe output: format tags first, then stream tags
 */
export function extractProbeDate(
  data: unknown,
  isPlausible?: (date: CaptureDate) => boolean
): ExtractionOutcome {
  const parsed = probeSchema.safeParse(data);
  if (!parsed.success) {
    return { status: 'failed', reason: `Unexpected ffprobe output: ${parsed.error.message}` };
  }

  const tagSets = [
    parsed.data.format?.tags,
    ...(parsed.data.streams ?? []).map((stream) => stream.tags),
  ];

  const values: Array<string | undefined> = [];
  for (const tags of tagSets) {
    if (!tags) {
      continue;
    }
    for (const tag of PROBE_DATE_TAGS) {
      values.push(readTag(tags, tag));
    }
  }
  return outcomeFromValues(values, 'container', isPlausible);
}

function readTag(tags: Record<string, string | number>, name: string): string | undefined {
  for (const [key, value] of Object.entries(tags)) {
    if (key.toLowerCase() === name) {
      return String(value);
    }
  }
  return undefined;
}
