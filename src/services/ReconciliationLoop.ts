import { Logger, describeError } from '../utils/logger.js';
import { BackoffExecutor } from '../utils/backoff.js';
import type { SleepFn } from '../utils/sleep.js';
import type { RetryConfig } from '../utils/config.js';
import { TrackMatcher, type Scorer } from '../modules/matching/TrackMatcher.js';
import type { IScrobbleService, LoopState, RunSummary, TrackRecord } from '../types/index.js';
import { CancelledError } from '../types/errors.js';
import { ReconciliationContext, type SyncSettings } from './ReconciliationContext.js';
import { PlaycountCache } from './PlaycountCache.js';
import { ScrobbleEmitter } from './ScrobbleEmitter.js';

export type Ineligibility = 'noRemoteData' | 'caughtUp' | 'perRunCap' | 'lifetimeCap';

const SKIP_REASONS: Record<Ineligibility, string> = {
  noRemoteData: 'no Last.fm match',
  caughtUp: 'already caught up',
  perRunCap: 'per-run cap reached',
  lifetimeCap: 'lifetime cap reached',
};

export function checkEligibility(
  localPlaycount: number,
  effective: number | undefined,
  scrobbledThisRun: number,
  limits: Pick<SyncSettings, 'maxScrobblesPerTrackPerRun' | 'maxScrobblesPerTrackTotal'>,
): Ineligibility | null {
  if (effective === undefined) return 'noRemoteData';
  if (effective >= localPlaycount) return 'caughtUp';
  if (scrobbledThisRun >= limits.maxScrobblesPerTrackPerRun) return 'perRunCap';
  if (effective >= limits.maxScrobblesPerTrackTotal) return 'lifetimeCap';
  return null;
}

// "=========== 3 / 10 scrobbles ===========", 40 columns wide
export function progressRule(total: number, max: number | null, width = 40): string {
  if (max === null) return '='.repeat(width);
  const label = `${total} / ${max} scrobbles`;
  const lead = Math.max(0, Math.floor((width - label.length) / 2) - 1);
  return `${'='.repeat(lead)} ${label} `.padEnd(width, '=');
}

export interface LoopOptions {
  settings: SyncSettings;
  retry: Pick<RetryConfig, 'lookup' | 'scrobble'>;
  signal?: AbortSignal;
  random?: () => number;
  now?: () => number;
  sleep?: SleepFn;
  scorer?: Scorer;
}

export class ReconciliationLoop {
  readonly context: ReconciliationContext;
  readonly cache: PlaycountCache;
  private emitter: ScrobbleEmitter;
  private pool: TrackRecord[];
  private current: LoopState = 'running';
  private steps = 0;
  private skipped = 0;
  private failedAttempts = 0;

  constructor(candidates: readonly TrackRecord[], service: IScrobbleService, options: LoopOptions) {
    this.pool = [...candidates];
    this.context = new ReconciliationContext(options.settings, {
      signal: options.signal,
      random: options.random,
      now: options.now,
    });
    const executor = new BackoffExecutor({ sleep: options.sleep });
    const matcher = new TrackMatcher(service, {
      fuzzyThreshold: options.settings.fuzzyThreshold,
      retry: options.retry.lookup,
      executor,
      normalizer: this.context.normalizer,
      scorer: options.scorer,
    });
    this.cache = new PlaycountCache(this.context, matcher);
    this.emitter = new ScrobbleEmitter(this.context, service, {
      retry: options.retry.scrobble,
      executor,
      sleep: options.sleep,
    });
  }

  get state(): LoopState {
    return this.current;
  }

  get remaining(): number {
    return this.pool.length;
  }

  private terminalCheck(): LoopState {
    const { maxScrobbles } = this.context.settings;
    if (this.context.signal?.aborted) return 'cancelled';
    if (this.pool.length === 0) return 'done';
    if (maxScrobbles !== null && this.context.totalScrobbled >= maxScrobbles) return 'limitReached';
    return 'running';
  }

  // One draw from the pool: skip-and-remove, or emit
  async step(): Promise<LoopState> {
    if (this.current !== 'running') return this.current;
    this.current = this.terminalCheck();
    if (this.current !== 'running') return this.current;

    const ctx = this.context;
    const { settings } = ctx;
    this.steps++;
    Logger.info(progressRule(ctx.totalScrobbled, settings.maxScrobbles));

    const idx = Math.min(this.pool.length - 1, Math.floor(ctx.random() * this.pool.length));
    const track = this.pool[idx];
    const { artist, title, localPlaycount } = track;

    let effective: number | undefined;
    try {
      effective = await this.cache.effectivePlaycount(artist, title);
    } catch (err) {
      if (err instanceof CancelledError) {
        this.current = 'cancelled';
        return this.current;
      }
      throw err;
    }

    const reason = checkEligibility(localPlaycount, effective, this.cache.scrobbledThisRun(artist, title), settings);
    if (reason !== null || effective === undefined) {
      Logger.info(
        `[SKIP]  ${artist} – ${title} | Navidrome=${localPlaycount} Last.fm=${effective ?? 'n/a'} → ${SKIP_REASONS[reason ?? 'noRemoteData']}`,
      );
      this.pool.splice(idx, 1);
      this.skipped++;
      return this.current;
    }

    Logger.info(`[MATCH] ${artist} – ${title} | Navidrome=${localPlaycount} Last.fm=${effective} → +${localPlaycount - effective}`);
    const key = ctx.keyFor(artist, title);
    try {
      await this.emitter.emit(artist, title);
      this.cache.recordScrobble(artist, title);
      ctx.totalScrobbled++;
      ctx.consecutiveFailures.delete(key);
    } catch (err) {
      if (err instanceof CancelledError) {
        this.current = 'cancelled';
        return this.current;
      }
      this.failedAttempts++;
      const failures = (ctx.consecutiveFailures.get(key) ?? 0) + 1;
      ctx.consecutiveFailures.set(key, failures);
      if (failures >= settings.maxConsecutiveFailures) {
        Logger.warn(`  Giving up on ${artist} – ${title} after ${failures} failed scrobbles in a row (${describeError(err)}).`);
        this.pool.splice(idx, 1);
      } else {
        Logger.warn('  Scrobble failed, will retry this track later.');
      }
    }
    return this.current;
  }

  async run(): Promise<RunSummary> {
    const startedAt = this.context.now();
    const { dryRun, maxScrobbles } = this.context.settings;
    Logger.info(`Reconciling ${this.pool.length} tracks${maxScrobbles !== null ? ` (limit ${maxScrobbles} scrobbles)` : ''}...`);

    while ((await this.step()) === 'running') {
      // keep sampling
    }

    const summary: RunSummary = {
      state: this.terminalState(),
      totalScrobbled: this.context.totalScrobbled,
      steps: this.steps,
      skipped: this.skipped,
      failedAttempts: this.failedAttempts,
      durationMs: this.context.now() - startedAt,
    };

    if (summary.state === 'done') Logger.info('Done. No more tracks to process.');
    if (summary.state === 'limitReached') Logger.info(`Reached scrobble limit (${maxScrobbles}). Stopping.`);
    if (summary.state === 'cancelled') Logger.warn(`Run cancelled with ${this.pool.length} tracks left in the pool.`);

    const seconds = summary.durationMs / 1000;
    Logger.info(`Total scrobbles ${dryRun ? 'planned' : 'sent'}: ${summary.totalScrobbled}`);
    Logger.info(`Total reconciliation time: ${seconds.toFixed(2)}s (${(seconds / 60).toFixed(2)} min)`);
    if (summary.totalScrobbled > 0) {
      Logger.info(`Average time per scrobble: ${(seconds / summary.totalScrobbled).toFixed(2)}s`);
    }
    return summary;
  }

  private terminalState(): RunSummary['state'] {
    // run() only stops on a terminal state
    return this.current === 'running' ? 'done' : this.current;
  }
}
