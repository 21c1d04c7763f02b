import crypto from 'crypto';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import Bottleneck from 'bottleneck';
import { Logger } from '../../utils/logger.js';
import { parseRetryAfter } from '../../utils/backoff.js';
import type { LastfmConfig, RateLimitBucketConfig } from '../../utils/config.js';
import type { IScrobbleService, RemoteTrack } from '../../types/index.js';
import { FatalError, LastfmApiError, RetryableError } from '../../types/errors.js';

const API_ROOT = 'https://ws.audioscrobbler.com/2.0/';

type Params = Record<string, string>;
type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

// Last.fm returns a bare object instead of a one-element array
function list(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

export function md5(input: string): string {
  return crypto.createHash('md5').update(input, 'utf8').digest('hex');
}

// api_sig: sorted name+value pairs followed by the shared secret; format/callback excluded
export function signParams(params: Params, secret: string): string {
  const payload = Object.keys(params)
    .filter((k) => k !== 'format' && k !== 'callback')
    .sort()
    .map((k) => `${k}${params[k]}`)
    .join('');
  return md5(payload + secret);
}

function artistName(value: unknown): string | undefined {
  if (isJson(value)) return text(value.name) ?? text(value['#text']);
  return text(value);
}

export class LastfmClient implements IScrobbleService {
  private http: Pick<AxiosInstance, 'get' | 'post'>;
  private limiter: Bottleneck;
  private cfg: LastfmConfig;
  private sessionKey: Promise<string> | null = null;

  constructor(cfg: LastfmConfig, rateLimit: RateLimitBucketConfig, http?: Pick<AxiosInstance, 'get' | 'post'>) {
    this.cfg = cfg;
    this.http = http ?? axios.create({ baseURL: API_ROOT, timeout: 30_000 });
    this.limiter = new Bottleneck({ maxConcurrent: rateLimit.maxConcurrent, minTime: rateLimit.minTime });
    if (cfg.sessionKey) this.sessionKey = Promise.resolve(cfg.sessionKey);
  }

  private unwrap(res: AxiosResponse<unknown>, method: string): Json {
    const body: unknown = res.data;
    if (res.status === 429) {
      throw new RetryableError(`${method}: HTTP 429`, { status: 429, retryAfterSeconds: parseRetryAfter(res.headers['retry-after']) });
    }
    if (res.status >= 500) {
      throw new RetryableError(`${method}: HTTP ${res.status}`, { status: res.status });
    }
    if (isJson(body) && typeof body.error === 'number') {
      throw new LastfmApiError(body.error, text(body.message) ?? 'unknown error');
    }
    if (res.status >= 400) {
      throw new FatalError(`${method}: HTTP ${res.status}`, { status: res.status });
    }
    if (!isJson(body)) {
      throw new FatalError(`${method}: malformed response`);
    }
    return body;
  }

  private async read(method: string, params: Params): Promise<Json> {
    const query: Params = { ...params, method, api_key: this.cfg.apiKey, format: 'json' };
    Logger.debug(`Last.fm GET ${method} ${params.artist ?? ''} - ${params.track ?? ''}`);
    const res = await this.limiter.schedule(() =>
      this.http.get<unknown>('', { params: query, validateStatus: () => true }),
    );
    return this.unwrap(res, method);
  }

  private async write(method: string, params: Params): Promise<Json> {
    const signed: Params = { ...params, method, api_key: this.cfg.apiKey };
    signed.api_sig = signParams(signed, this.cfg.apiSecret);
    const form = new URLSearchParams({ ...signed, format: 'json' });
    const res = await this.limiter.schedule(() =>
      this.http.post<unknown>('', form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        validateStatus: () => true,
      }),
    );
    return this.unwrap(res, method);
  }

  private async openSession(): Promise<string> {
    const hash = this.cfg.passwordHash ?? (this.cfg.password ? md5(this.cfg.password) : null);
    if (!hash) throw new FatalError('Last.fm: no credentials available to open a session.');
    const body = await this.write('auth.getMobileSession', {
      username: this.cfg.username,
      authToken: md5(this.cfg.username + hash),
    });
    const key = isJson(body.session) ? text(body.session.key) : undefined;
    if (!key) throw new FatalError('Last.fm: session response carried no key.');
    Logger.debug(`Last.fm session opened for ${this.cfg.username}.`);
    return key;
  }

  private async getSessionKey(): Promise<string> {
    if (!this.sessionKey) this.sessionKey = this.openSession();
    try {
      return await this.sessionKey;
    } catch (err) {
      // A failed handshake must not be cached
      this.sessionKey = null;
      throw err;
    }
  }

  async getUserPlaycount(artist: string, title: string): Promise<RemoteTrack & { userPlaycount: number }> {
    const body = await this.read('track.getInfo', {
      artist,
      track: title,
      username: this.cfg.username,
      autocorrect: '0',
    });
    const track = body.track;
    if (!isJson(track)) throw new FatalError('track.getInfo: malformed response');
    const count = Number(text(track.userplaycount) ?? 0);
    return {
      artist: artistName(track.artist) ?? artist,
      title: text(track.name) ?? title,
      url: text(track.url),
      userPlaycount: Number.isFinite(count) ? count : 0,
    };
  }

  async searchTracks(artist: string, title: string, limit: number): Promise<RemoteTrack[]> {
    const body = await this.read('track.search', { artist, track: title, limit: String(limit) });
    const results = body.results;
    if (!isJson(results)) throw new FatalError('track.search: malformed response');
    const matches = isJson(results.trackmatches) ? list(results.trackmatches.track) : [];
    const out: RemoteTrack[] = [];
    for (const m of matches) {
      if (!isJson(m)) continue;
      const a = artistName(m.artist);
      const t = text(m.name);
      if (a && t) out.push({ artist: a, title: t, url: text(m.url) });
    }
    return out.slice(0, limit);
  }

  async scrobble(artist: string, title: string, timestamp: number): Promise<void> {
    const sk = await this.getSessionKey();
    const body = await this.write('track.scrobble', {
      artist,
      track: title,
      timestamp: String(timestamp),
      sk,
    });
    const scrobbles = body.scrobbles;
    const attr = isJson(scrobbles) ? scrobbles['@attr'] : undefined;
    const accepted = isJson(attr) ? Number(text(attr.accepted) ?? 0) : 0;
    if (accepted < 1) {
      const first = isJson(scrobbles) ? list(scrobbles.scrobble)[0] : undefined;
      const ignored = isJson(first) && isJson(first.ignoredMessage) ? text(first.ignoredMessage['#text']) : undefined;
      throw new FatalError(`track.scrobble ignored${ignored ? `: ${ignored}` : ''}`);
    }
  }
}
