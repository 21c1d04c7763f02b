import dayjs from 'dayjs';
import { Logger, describeError } from '../utils/logger.js';
import { BackoffExecutor } from '../utils/backoff.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import type { RetryPolicy } from '../utils/config.js';
import type { IScrobbleService, ScrobbleResult } from '../types/index.js';
import { CancelledError } from '../types/errors.js';
import type { ReconciliationContext } from './ReconciliationContext.js';

// Scrobbles are backdated by 1 minute .. 24 hours
export const MIN_BACKDATE_SECONDS = 60;
export const MAX_BACKDATE_SECONDS = 24 * 60 * 60;

export class ScrobbleEmitter {
  private ctx: ReconciliationContext;
  private service: IScrobbleService;
  private executor: BackoffExecutor;
  private retry: RetryPolicy;
  private sleep: SleepFn;

  constructor(
    ctx: ReconciliationContext,
    service: IScrobbleService,
    options: { retry: RetryPolicy; executor?: BackoffExecutor; sleep?: SleepFn },
  ) {
    this.ctx = ctx;
    this.service = service;
    this.retry = options.retry;
    this.executor = options.executor ?? new BackoffExecutor();
    this.sleep = options.sleep ?? defaultSleep;
  }

  randomTimestamp(): number {
    const nowSec = Math.floor(this.ctx.now() / 1000);
    return nowSec - this.ctx.randomInt(MIN_BACKDATE_SECONDS, MAX_BACKDATE_SECONDS);
  }

  /**
   * Sends one scrobble (or logs it in dry-run mode), then waits out the pacing delay.
   * Throws once the retry budget is spent; the caller decides what that means for the track.
   */
  async emit(artist: string, title: string): Promise<ScrobbleResult> {
    const timestamp = this.randomTimestamp();
    const dt = dayjs.unix(timestamp).format('YYYY-MM-DD HH:mm:ss');
    const { dryRun, scrobbleDelaySeconds } = this.ctx.settings;

    if (dryRun) {
      Logger.info(`  [dryRun] Would scrobble @ ${dt}: ${artist} – ${title}`);
      return { artist, title, timestamp, dryRun };
    }

    try {
      await this.executor.execute(() => this.service.scrobble(artist, title, timestamp), {
        ...this.retry,
        label: `Last.fm scrobble ${artist} - ${title}`,
        signal: this.ctx.signal,
      });
    } catch (err) {
      Logger.warn(`  Failed to scrobble after retries: ${artist} – ${title} (${describeError(err)})`);
      throw err;
    }
    Logger.info(`  Scrobbled @ ${dt}: ${artist} – ${title}`);

    if (scrobbleDelaySeconds > 0) {
      try {
        await this.sleep(scrobbleDelaySeconds * 1000, this.ctx.signal);
      } catch (err) {
        // The scrobble already went out; the loop notices the abort on its next step
        if (!(err instanceof CancelledError)) throw err;
      }
    }
    return { artist, title, timestamp, dryRun };
  }
}
