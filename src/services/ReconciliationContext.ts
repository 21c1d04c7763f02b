import { NormalizedStringCache } from '../utils/normalize.js';
import type { SyncConfig } from '../utils/config.js';
import type { CacheEntry } from '../types/index.js';

export interface SyncSettings extends SyncConfig {
  dryRun: boolean;
  // Run-wide cap on emitted scrobbles; null means unlimited
  maxScrobbles: number | null;
}

export interface ContextOptions {
  signal?: AbortSignal;
  random?: () => number;
  now?: () => number;
  normalizer?: NormalizedStringCache;
}

/**
 * Per-run state shared by the matcher, the playcount cache, the emitter and the loop.
 * Nothing here outlives a single invocation.
 */
export class ReconciliationContext {
  readonly settings: SyncSettings;
  readonly entries: Map<string, CacheEntry> = new Map();
  readonly consecutiveFailures: Map<string, number> = new Map();
  readonly normalizer: NormalizedStringCache;
  readonly signal?: AbortSignal;
  readonly random: () => number;
  readonly now: () => number;
  totalScrobbled = 0;

  constructor(settings: SyncSettings, options: ContextOptions = {}) {
    this.settings = settings;
    this.signal = options.signal;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.normalizer = options.normalizer ?? new NormalizedStringCache();
  }

  // Case/whitespace variants of the same pair share one entry
  keyFor(artist: string, title: string): string {
    return `${this.normalizer.normalize(artist)}\u0000${this.normalizer.normalize(title)}`;
  }

  // Uniform integer in [min, max]
  randomInt(min: number, max: number): number {
    const n = Math.floor(this.random() * (max - min + 1)) + min;
    return Math.min(max, Math.max(min, n));
  }
}
