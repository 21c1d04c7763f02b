import { Logger } from '../../utils/logger.js';
import { BackoffExecutor, classifyFailure, type FailureClassifier } from '../../utils/backoff.js';
import { NormalizedStringCache } from '../../utils/normalize.js';
import type { RetryPolicy } from '../../utils/config.js';
import type { IScrobbleService, MatchOutcome } from '../../types/index.js';

export const SEARCH_CANDIDATES = 10;

export type Scorer = (a: string, b: string) => number;

export interface TrackMatcherOptions {
  fuzzyThreshold: number;
  retry: RetryPolicy;
  executor?: BackoffExecutor;
  normalizer?: NormalizedStringCache;
  scorer?: Scorer;
  classify?: FailureClassifier;
}

export class TrackMatcher {
  private service: IScrobbleService;
  private executor: BackoffExecutor;
  private retry: RetryPolicy;
  private score: Scorer;
  private classify: FailureClassifier;
  private readonly threshold: number;

  constructor(service: IScrobbleService, options: TrackMatcherOptions) {
    this.service = service;
    this.threshold = options.fuzzyThreshold;
    this.retry = options.retry;
    this.executor = options.executor ?? new BackoffExecutor();
    this.classify = options.classify ?? classifyFailure;
    const normalizer = options.normalizer ?? new NormalizedStringCache();
    this.score = options.scorer ?? ((a, b) => normalizer.similarity(a, b));
  }

  // Exact lookup first, ranked fuzzy search as a fallback. Retryable failures retry the whole resolve.
  async resolve(artist: string, title: string, signal?: AbortSignal): Promise<MatchOutcome> {
    return this.executor.execute(() => this.attempt(artist, title), {
      ...this.retry,
      label: `Last.fm lookup ${artist} - ${title}`,
      signal,
    });
  }

  private isNonRetryable(err: unknown): boolean {
    return this.classify(err).kind === 'fatal';
  }

  private async attempt(artist: string, title: string): Promise<MatchOutcome> {
    try {
      const exact = await this.service.getUserPlaycount(artist, title);
      return { kind: 'found', track: exact, remotePlaycount: exact.userPlaycount, via: 'exact' };
    } catch (err) {
      if (!this.isNonRetryable(err)) throw err;
      Logger.debug(`Track not found by exact match: ${artist} | ${title}`);
    }

    const results = await this.service.searchTracks(artist, title, SEARCH_CANDIDATES);
    for (const candidate of results.slice(0, SEARCH_CANDIDATES)) {
      const artistScore = this.score(artist, candidate.artist);
      const titleScore = this.score(title, candidate.title);
      Logger.debug(`  ${Math.round(artistScore)} ${Math.round(titleScore)} ${candidate.artist} - ${candidate.title}`);
      if (artistScore < this.threshold || titleScore < this.threshold) continue;

      try {
        const info = await this.service.getUserPlaycount(candidate.artist, candidate.title);
        Logger.info(`  -> matched | ${candidate.artist} | ${candidate.title} |`);
        return { kind: 'found', track: info, remotePlaycount: info.userPlaycount, via: 'fuzzy' };
      } catch (err) {
        if (!this.isNonRetryable(err)) throw err;
      }
    }

    return { kind: 'notFound' };
  }
}
