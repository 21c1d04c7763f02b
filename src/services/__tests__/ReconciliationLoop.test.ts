import { describe, it, expect, vi } from 'vitest';
import { ReconciliationLoop, checkEligibility, progressRule, type LoopOptions } from '../ReconciliationLoop.js';
import type { SyncSettings } from '../ReconciliationContext.js';
import type { TrackRecord } from '../../types/index.js';
import { LastfmApiError } from '../../types/errors.js';
import { Logger } from '../../utils/logger.js';
import { FakeScrobbleService, makeSettings, recordingSleep, TEST_RETRY } from '../../__tests__/helpers/index.js';

function track(artist: string, title: string, localPlaycount: number): TrackRecord {
  return { artist, title, localPlaycount };
}

function makeLoop(
  tracks: TrackRecord[],
  service: FakeScrobbleService,
  settings: Partial<SyncSettings> = {},
  extra: Partial<LoopOptions> = {},
) {
  const { sleep, delays } = recordingSleep();
  const loop = new ReconciliationLoop(tracks, service, {
    settings: makeSettings(settings),
    retry: TEST_RETRY,
    random: () => 0,
    now: () => 1_700_000_000_000,
    sleep,
    ...extra,
  });
  return { loop, delays };
}

describe('checkEligibility', () => {
  const limits = { maxScrobblesPerTrackPerRun: 5, maxScrobblesPerTrackTotal: 100 };

  it('names the first reason a track cannot be scrobbled', () => {
    expect(checkEligibility(10, undefined, 0, limits)).toBe('noRemoteData');
    expect(checkEligibility(10, 10, 0, limits)).toBe('caughtUp');
    expect(checkEligibility(10, 12, 0, limits)).toBe('caughtUp');
    expect(checkEligibility(10, 7, 5, limits)).toBe('perRunCap');
    expect(checkEligibility(200, 100, 0, limits)).toBe('lifetimeCap');
  });

  it('returns null for an eligible track', () => {
    expect(checkEligibility(10, 7, 2, limits)).toBeNull();
    expect(checkEligibility(1, 0, 0, limits)).toBeNull();
  });
});

describe('progressRule', () => {
  it('centres the running total in a 40 column rule', () => {
    expect(progressRule(3, 10)).toBe('=========== 3 / 10 scrobbles ===========');
    expect(progressRule(3, 10)).toHaveLength(40);
  });

  it('prints a plain rule when there is no limit', () => {
    expect(progressRule(7, null)).toBe('='.repeat(40));
  });
});

describe('ReconciliationLoop', () => {
  it('stops scrobbling a track at the per-run cap', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 7);
    const { loop } = makeLoop([track('Artist', 'Song', 20)], service, { maxScrobblesPerTrackPerRun: 3 });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 3, steps: 4, skipped: 1, failedAttempts: 0 });
    expect(service.scrobbles.length).toBe(3);
    expect(await loop.cache.effectivePlaycount('Artist', 'Song')).toBe(10);
    expect(service.calls.filter((c) => c.startsWith('getInfo:'))).toEqual(['getInfo:Artist|Song']);
  });

  it('scrobbles exactly the gap of three and then removes the track', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 7);
    const { loop } = makeLoop([track('Artist', 'Song', 10)], service, { maxScrobblesPerTrackPerRun: 3 });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 3, steps: 4, skipped: 1 });
    expect(loop.remaining).toBe(0);
  });

  it('closes the gap and then skips the caught-up track', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 1);
    const { loop } = makeLoop([track('Artist', 'Song', 3)], service);

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 2, steps: 3, skipped: 1 });
    expect(loop.remaining).toBe(0);
  });

  it('skips caught-up and unmatched tracks without scrobbling them', async () => {
    const service = new FakeScrobbleService().setTrack('Even', 'Steven', 5).setTrack('Behind', 'Track', 1);
    const { loop } = makeLoop(
      [track('Even', 'Steven', 5), track('Missing', 'Song', 4), track('Behind', 'Track', 3)],
      service,
    );

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 2, steps: 5, skipped: 3 });
    expect(service.scrobbles.map((s) => `${s.artist}|${s.title}`)).toEqual(['Behind|Track', 'Behind|Track']);
    expect(service.calls).toContain('search:Missing|Song');
  });

  it('stops at the run-wide scrobble limit', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 0);
    const { loop } = makeLoop([track('Artist', 'Song', 10)], service, { maxScrobbles: 2 });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'limitReached', totalScrobbled: 2, steps: 2 });
    expect(loop.remaining).toBe(1);
  });

  it('prints the progress rule before every step', async () => {
    const info = vi.spyOn(Logger, 'info');
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 0);
    const { loop } = makeLoop([track('Artist', 'Song', 10)], service, { maxScrobbles: 2 });

    await loop.run();

    const rules = info.mock.calls.map((call) => call[0]).filter((line) => line.includes('scrobbles ='));
    expect(rules).toEqual([progressRule(0, 2), progressRule(1, 2)]);
  });

  it('does nothing when the limit is zero', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 0);
    const { loop } = makeLoop([track('Artist', 'Song', 10)], service, { maxScrobbles: 0 });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'limitReached', totalScrobbled: 0, steps: 0 });
    expect(service.calls).toEqual([]);
  });

  it('keeps a failing track in the pool until it fails too often in a row', async () => {
    const service = new FakeScrobbleService()
      .setTrack('Artist', 'Song', 0)
      .failAlways('scrobble', new LastfmApiError(9, 'Invalid session key'));
    const { loop } = makeLoop([track('Artist', 'Song', 10)], service);

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 0, steps: 3, failedAttempts: 3, skipped: 0 });
    expect(service.calls).toEqual([
      'getInfo:Artist|Song',
      'scrobble:Artist|Song',
      'scrobble:Artist|Song',
      'scrobble:Artist|Song',
    ]);
  });

  it('resets the failure streak after a successful scrobble', async () => {
    const service = new FakeScrobbleService()
      .setTrack('Artist', 'Song', 0)
      .failNext('scrobble', new LastfmApiError(9, 'Invalid session key'));
    const { loop } = makeLoop([track('Artist', 'Song', 2)], service);

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 2, steps: 4, failedAttempts: 1, skipped: 1 });
    expect(loop.context.consecutiveFailures.size).toBe(0);
  });

  it('shares lookups and counts between spelling variants of one track', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 1);
    const { loop } = makeLoop([track('Artist', 'Song', 3), track(' artist ', 'SONG', 3)], service);

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 2, steps: 4, skipped: 2 });
    expect(service.calls.filter((c) => c.startsWith('getInfo:'))).toEqual(['getInfo:Artist|Song']);
  });

  it('skips everything when Last.fm rejects the credentials', async () => {
    const auth = new LastfmApiError(10, 'Invalid API key');
    const service = new FakeScrobbleService().failAlways('getInfo', auth).failAlways('search', auth);
    const { loop } = makeLoop([track('A', 'One', 3), track('B', 'Two', 4)], service);

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 0, steps: 2, skipped: 2 });
    expect(service.scrobbles).toEqual([]);
  });

  it('counts planned scrobbles in dry-run mode without sending any', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 1);
    const { loop } = makeLoop([track('Artist', 'Song', 3)], service, { dryRun: true, scrobbleDelaySeconds: 2 });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 2, steps: 3 });
    expect(service.calls).toEqual(['getInfo:Artist|Song']);
  });

  it('paces live scrobbles by the configured delay', async () => {
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 1);
    const { loop, delays } = makeLoop([track('Artist', 'Song', 3)], service, { scrobbleDelaySeconds: 2 });

    await loop.run();

    expect(delays).toEqual([2000, 2000]);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const service = new FakeScrobbleService().setTrack('Artist', 'Song', 0);
    const { loop } = makeLoop([track('Artist', 'Song', 3)], service, {}, { signal: controller.signal });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'cancelled', steps: 0, totalScrobbled: 0 });
    expect(service.calls).toEqual([]);
  });

  it('stops between steps once cancelled and keeps what was sent', async () => {
    const controller = new AbortController();
    class AbortingService extends FakeScrobbleService {
      override async scrobble(artist: string, title: string, timestamp: number): Promise<void> {
        await super.scrobble(artist, title, timestamp);
        controller.abort();
      }
    }
    const service = new AbortingService().setTrack('Artist', 'Song', 0);
    const { loop } = makeLoop([track('Artist', 'Song', 5)], service, {}, { signal: controller.signal });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'cancelled', totalScrobbled: 1, steps: 1 });
    expect(loop.state).toBe('cancelled');
    expect(loop.remaining).toBe(1);
  });

  it('draws from the middle of the pool and removes exactly the drawn track', async () => {
    const service = new FakeScrobbleService().setTrack('A', 'One', 1).setTrack('B', 'Two', 1).setTrack('C', 'Three', 1);
    const { loop } = makeLoop([track('A', 'One', 1), track('B', 'Two', 2), track('C', 'Three', 1)], service, {}, {
      random: () => 0.5,
    });

    expect(await loop.step()).toBe('running');
    expect(service.scrobbles.map((s) => s.title)).toEqual(['Two']);
    expect(loop.remaining).toBe(3);

    await loop.step();
    expect(loop.remaining).toBe(2);

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 1, skipped: 3 });
    expect(service.calls).toEqual(['getInfo:B|Two', 'scrobble:B|Two', 'getInfo:C|Three', 'getInfo:A|One']);
  });

  it('draws the last track of the pool', async () => {
    const service = new FakeScrobbleService().setTrack('A', 'One', 1).setTrack('B', 'Two', 1).setTrack('C', 'Three', 1);
    const { loop } = makeLoop([track('A', 'One', 1), track('B', 'Two', 1), track('C', 'Three', 2)], service, {}, {
      random: () => 0.99,
    });

    const summary = await loop.run();

    expect(summary).toMatchObject({ state: 'done', totalScrobbled: 1, steps: 4, skipped: 3 });
    expect(service.calls).toEqual(['getInfo:C|Three', 'scrobble:C|Three', 'getInfo:B|Two', 'getInfo:A|One']);
  });

  it('never takes more steps than tracks plus emitted scrobbles', async () => {
    const service = new FakeScrobbleService().setTrack('A', 'One', 2).setTrack('B', 'Two', 0).setTrack('C', 'Three', 9);
    const tracks = [track('A', 'One', 4), track('B', 'Two', 3), track('C', 'Three', 9), track('D', 'Four', 1)];
    const { loop } = makeLoop(tracks, service);

    const summary = await loop.run();

    expect(summary.totalScrobbled).toBe(5);
    expect(summary.steps).toBeLessThanOrEqual(tracks.length + summary.totalScrobbled);
    expect(summary.steps).toBe(9);
  });
});
