import { ExtractorRegistry } from '../providers/ExtractorRegistry';
import { DateRulesConfig } from '../config';
import { MediaKind, tierAtLeast } from '../types/MediaKind';
import {
  CaptureDate,
  ExtractionOutcome,
  MediaFile,
  ResolvedDate,
  StrategyAttempt,
} from '../types/MediaFile';
import { formatCaptureDate, fromLocalDate, isPlausibleDate } from '../utils/captureDate';
import { withTimeout } from '../utils/timeout';
import { errorMessage } from '../errors';
import { logger as rootLogger, Logger } from '../logger';

export interface DateResolverOptions {
  rules: DateRulesConfig;
  extractTimeoutMs: number;
  logger?: Logger;
  /** Clock used for the upper year bound */
  now?: () => Date;
}

/**
 * Tries a kind's strategies in order and accepts the first plausible date.
 * Falls back to the filesystem modification time when every strategy is
 * exhausted, unless that fallback is disabled.
 */
export class DateResolver {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly registry: ExtractorRegistry,
    private readonly options: DateResolverOptions
  ) {
    this.logger = (options.logger ?? rootLogger).child({ scope: 'resolver' });
    this.now = options.now ?? (() => new Date());
  }

  async resolve(file: MediaFile, kind: MediaKind): Promise<ResolvedDate> {
    const { rules } = this.options;
    const now = this.now();
    const attempts: StrategyAttempt[] = [];
    const isPlausible = (date: CaptureDate) => isPlausibleDate(date, rules, now);

    for (const strategy of this.registry.strategiesFor(kind)) {
      const { id, tier } = strategy;

      if (!tierAtLeast(tier, rules.minimumTier)) {
        attempts.push({ strategy: id, tier, result: 'skipped', reason: `below ${rules.minimumTier}` });
        continue;
      }

      const outcome = await this.attempt(
        (signal) => strategy.tryExtract(file, { signal, isPlausible }),
        `${id} on ${file.name}`
      );

      if (outcome.status === 'absent') {
        attempts.push({ strategy: id, tier, result: 'absent' });
        continue;
      }
      if (outcome.status === 'failed') {
        attempts.push({ strategy: id, tier, result: 'failed', reason: outcome.reason });
        this.logger.debug({ file: file.relativePath, strategy: id, reason: outcome.reason }, 'Strategy failed');
        continue;
      }
      if (!isPlausible(outcome.date)) {
        attempts.push({
          strategy: id,
          tier,
          result: 'rejected',
          reason: `implausible date ${formatCaptureDate(outcome.date)}`,
        });
        continue;
      }

      attempts.push({ strategy: id, tier, result: 'accepted' });
      return { state: 'resolved', date: outcome.date, strategy: id, tier, attempts };
    }

    if (!rules.filesystemFallback) {
      attempts.push({ strategy: 'filesystem', tier: 'filesystem', result: 'skipped', reason: 'disabled' });
      return { state: 'unresolved', attempts };
    }

    // Always accepted: it is the last resort once classification succeeded
    attempts.push({ strategy: 'filesystem', tier: 'filesystem', result: 'accepted' });
    return {
      state: 'resolved',
      date: fromLocalDate(file.modifiedAt),
      strategy: 'filesystem',
      tier: 'filesystem',
      attempts,
    };
  }

  /**
   * The signal fires once the attempt is over, so a strategy still working
   * after its timeout can stop (ffprobe is killed).
   */
  private async attempt(
    run: (signal: AbortSignal) => Promise<ExtractionOutcome>,
    label: string
  ): Promise<ExtractionOutcome> {
    const controller = new AbortController();
    try {
      return await withTimeout(run(controller.signal), this.options.extractTimeoutMs, label);
    } catch (error) {
      return { status: 'failed', reason: errorMessage(error) };
    } finally {
      controller.abort();
    }
  }
}
