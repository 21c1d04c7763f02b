import { describe, it, expect } from 'vitest';
import { TrackMatcher, type Scorer } from '../TrackMatcher.js';
import { BackoffExecutor } from '../../../utils/backoff.js';
import { LastfmApiError, RetryableError } from '../../../types/errors.js';
import { FakeScrobbleService, recordingSleep, TEST_RETRY } from '../../../__tests__/helpers/index.js';

function makeMatcher(service: FakeScrobbleService, scorer?: Scorer) {
  const { sleep, delays } = recordingSleep();
  const matcher = new TrackMatcher(service, {
    fuzzyThreshold: 85,
    retry: TEST_RETRY.lookup,
    executor: new BackoffExecutor({ sleep }),
    scorer,
  });
  return { matcher, delays };
}

describe('TrackMatcher', () => {
  it('returns the exact match without searching', async () => {
    const service = new FakeScrobbleService().setTrack('Metallica', 'The Small Hours', 4);
    const { matcher } = makeMatcher(service);

    const outcome = await matcher.resolve('Metallica', 'The Small Hours');

    expect(outcome).toEqual({
      kind: 'found',
      track: { artist: 'Metallica', title: 'The Small Hours', userPlaycount: 4 },
      remotePlaycount: 4,
      via: 'exact',
    });
    expect(service.calls).toEqual(['getInfo:Metallica|The Small Hours']);
  });

  it('falls back to fuzzy search only after the exact lookup fails', async () => {
    const service = new FakeScrobbleService()
      .setTrack('Metallica', 'The Small Hours', 4)
      .setSearch('metallica', 'the small hours', [{ artist: 'Metallica', title: 'The Small Hours' }]);
    const { matcher } = makeMatcher(service);

    const outcome = await matcher.resolve('metallica', 'the small hours');

    expect(outcome.kind === 'found' && outcome.via).toBe('fuzzy');
    expect(outcome.kind === 'found' && outcome.remotePlaycount).toBe(4);
    expect(service.calls).toEqual([
      'getInfo:metallica|the small hours',
      'search:metallica|the small hours',
      'getInfo:Metallica|The Small Hours',
    ]);
  });

  it('requires both artist and title to clear the threshold', async () => {
    const scores: Record<string, number> = {
      'Artist One': 92,
      'Wrong Song': 40,
      'Artist Two': 95,
      'Right Song': 90,
    };
    const scorer: Scorer = (_input, candidate) => scores[candidate] ?? 0;
    const service = new FakeScrobbleService()
      .setTrack('Artist One', 'Wrong Song', 50)
      .setTrack('Artist Two', 'Right Song', 3)
      .setSearch('Artist', 'Song', [
        { artist: 'Artist One', title: 'Wrong Song' },
        { artist: 'Artist Two', title: 'Right Song' },
      ]);
    const { matcher } = makeMatcher(service, scorer);

    const outcome = await matcher.resolve('Artist', 'Song');

    expect(outcome.kind === 'found' && outcome.track.title).toBe('Right Song');
    expect(outcome.kind === 'found' && outcome.remotePlaycount).toBe(3);
    expect(service.calls).not.toContain('getInfo:Artist One|Wrong Song');
  });

  it('skips a candidate whose play count cannot be read', async () => {
    const service = new FakeScrobbleService()
      .setTrack('Band', 'Tune (Live)', 2)
      .setSearch('Band', 'Tune', [
        { artist: 'Band', title: 'Tune' },
        { artist: 'Band', title: 'Tune (Live)' },
      ]);
    const { matcher } = makeMatcher(service, () => 100);

    const outcome = await matcher.resolve('Band', 'Tune');

    expect(outcome.kind === 'found' && outcome.track.title).toBe('Tune (Live)');
    expect(service.calls).toEqual(['getInfo:Band|Tune', 'search:Band|Tune', 'getInfo:Band|Tune', 'getInfo:Band|Tune (Live)']);
  });

  it('only considers the top ten search results', async () => {
    const results = Array.from({ length: 12 }, (_, i) => ({ artist: 'Band', title: `Take ${i + 1}` }));
    const service = new FakeScrobbleService().setTrack('Band', 'Take 11', 9).setSearch('Band', 'Take', results);
    const { matcher } = makeMatcher(service, () => 100);

    await expect(matcher.resolve('Band', 'Take')).resolves.toEqual({ kind: 'notFound' });
    expect(service.calls.filter((c) => c.startsWith('getInfo:')).length).toBe(11);
  });

  it('reports notFound when nothing is accepted', async () => {
    const service = new FakeScrobbleService();
    const { matcher } = makeMatcher(service);

    await expect(matcher.resolve('Nobody', 'Nothing')).resolves.toEqual({ kind: 'notFound' });
  });

  it('retries the whole resolve after a transient failure', async () => {
    const service = new FakeScrobbleService()
      .setSearch('Band', 'Tune', [{ artist: 'Band', title: 'Tune!' }])
      .setTrack('Band', 'Tune!', 1)
      .failNext('search', new RetryableError('connection reset'));
    const { matcher, delays } = makeMatcher(service, () => 100);

    const outcome = await matcher.resolve('Band', 'Tune');

    expect(outcome.kind).toBe('found');
    expect(delays).toEqual([1000]);
    expect(service.calls.filter((c) => c === 'getInfo:Band|Tune').length).toBe(2);
  });

  it('surfaces a non-retryable search failure', async () => {
    const auth = new LastfmApiError(9, 'Invalid session key');
    const service = new FakeScrobbleService().failAlways('search', auth);
    const { matcher, delays } = makeMatcher(service);

    await expect(matcher.resolve('Band', 'Tune')).rejects.toBe(auth);
    expect(delays).toEqual([]);
  });
});
