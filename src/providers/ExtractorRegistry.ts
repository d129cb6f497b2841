import { DateStrategy } from '../metadata/DateStrategy';
import { ExifExtractor } from '../metadata/ExifExtractor';
import { XmpExtractor } from '../metadata/XmpExtractor';
import { PngTextExtractor } from '../metadata/PngTextExtractor';
import { VideoExtractor } from '../metadata/VideoExtractor';
import { ContainerExtractor } from '../metadata/ContainerExtractor';
import { FilenameExtractor } from '../metadata/FilenameExtractor';
import { MediaKind } from '../types/MediaKind';
import { StrategyId } from '../types/MediaFile';

type ExtractorId = Exclude<StrategyId, 'filesystem'>;

const IMAGE_STRATEGIES: ExtractorId[] = ['exif', 'xmp', 'filename'];
const VIDEO_STRATEGIES: ExtractorId[] = ['ffprobe', 'mp4-container', 'xmp', 'filename'];

/**
 * Strategy order per kind, most trusted first. The filesystem fallback is
 * not listed: the resolver applies it after every entry here is exhausted.
 */
export const KIND_STRATEGIES: Readonly<Record<MediaKind, readonly ExtractorId[]>> = {
  [MediaKind.JPEG]: IMAGE_STRATEGIES,
  [MediaKind.HEIF]: IMAGE_STRATEGIES,
  [MediaKind.AVIF]: IMAGE_STRATEGIES,
  [MediaKind.TIFF]: IMAGE_STRATEGIES,
  [MediaKind.WEBP]: IMAGE_STRATEGIES,
  [MediaKind.RAW]: IMAGE_STRATEGIES,
  [MediaKind.PNG]: ['exif', 'png-text', 'xmp', 'filename'],
  [MediaKind.GIF]: ['xmp', 'filename'],
  [MediaKind.BMP]: ['xmp', 'filename'],
  [MediaKind.MP4]: VIDEO_STRATEGIES,
  [MediaKind.MOV]: VIDEO_STRATEGIES,
  [MediaKind.M4V]: VIDEO_STRATEGIES,
  [MediaKind.THREE_GP]: VIDEO_STRATEGIES,
  [MediaKind.AVI]: ['ffprobe', 'xmp', 'filename'],
};

export interface ExtractorRegistryOptions {
  filenamePatterns: readonly string[];
  ffprobe: boolean;
  ffprobePath?: string;
}

/**
 * Static mapping from media kind to its ordered date strategies.
 * Adding a format means adding a row to KIND_STRATEGIES.
 */
export class ExtractorRegistry {
  private readonly strategies = new Map<StrategyId, DateStrategy>();

  constructor(strategies: DateStrategy[]) {
    for (const strategy of strategies) {
      this.strategies.set(strategy.id, strategy);
    }
  }

  /**
   * Builds the default strategy set. ffprobe is left out when disabled,
   * so videos go straight to the in-process container parser.
   */
  static create(options: ExtractorRegistryOptions): ExtractorRegistry {
    const strategies: DateStrategy[] = [
      new ExifExtractor(),
      new ContainerExtractor(),
      new PngTextExtractor(),
      new XmpExtractor(),
      new FilenameExtractor(options.filenamePatterns),
    ];
    if (options.ffprobe) {
      strategies.push(new VideoExtractor(options.ffprobePath));
    }
    return new ExtractorRegistry(strategies);
  }

  strategiesFor(kind: MediaKind): DateStrategy[] {
    const result: DateStrategy[] = [];
    for (const id of KIND_STRATEGIES[kind]) {
      const strategy = this.strategies.get(id);
      if (strategy) {
        result.push(strategy);
      }
    }
    return result;
  }
}
