import { Logger, describeError } from '../utils/logger.js';
import type { TrackMatcher } from '../modules/matching/TrackMatcher.js';
import type { CacheEntry } from '../types/index.js';
import { CancelledError, InvariantError } from '../types/errors.js';
import type { ReconciliationContext } from './ReconciliationContext.js';

export class PlaycountCache {
  private ctx: ReconciliationContext;
  private matcher: TrackMatcher;

  constructor(ctx: ReconciliationContext, matcher: TrackMatcher) {
    this.ctx = ctx;
    this.matcher = matcher;
  }

  private async load(artist: string, title: string): Promise<CacheEntry> {
    try {
      const outcome = await this.matcher.resolve(artist, title, this.ctx.signal);
      if (outcome.kind === 'notFound') return { kind: 'noRemoteData' };
      return { kind: 'remote', remotePlaycount: outcome.remotePlaycount, scrobbledThisRun: 0 };
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      Logger.warn(`Error getting Last.fm playcount for ${artist} - ${title}: ${describeError(err)}`);
      return { kind: 'noRemoteData' };
    }
  }

  entry(artist: string, title: string): CacheEntry | undefined {
    return this.ctx.entries.get(this.ctx.keyFor(artist, title));
  }

  // Remote count plus what this run has already emitted; undefined when Last.fm has no match
  async effectivePlaycount(artist: string, title: string): Promise<number | undefined> {
    const key = this.ctx.keyFor(artist, title);
    let entry = this.ctx.entries.get(key);
    if (!entry) {
      entry = await this.load(artist, title);
      this.ctx.entries.set(key, entry);
    }
    return entry.kind === 'remote' ? entry.remotePlaycount + entry.scrobbledThisRun : undefined;
  }

  scrobbledThisRun(artist: string, title: string): number {
    const entry = this.entry(artist, title);
    return entry?.kind === 'remote' ? entry.scrobbledThisRun : 0;
  }

  recordScrobble(artist: string, title: string): void {
    const entry = this.entry(artist, title);
    if (entry?.kind !== 'remote') {
      throw new InvariantError(`recordScrobble called without remote data for ${artist} - ${title}`);
    }
    entry.scrobbledThisRun++;
  }
}
