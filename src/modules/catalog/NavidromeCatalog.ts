import crypto from 'crypto';
import axios, { type AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import { Logger, describeError } from '../../utils/logger.js';
import { BackoffExecutor } from '../../utils/backoff.js';
import type { NavidromeConfig, RetryPolicy } from '../../utils/config.js';
import type { ICatalog, TrackRecord } from '../../types/index.js';
import { CancelledError, CatalogError, FatalError } from '../../types/errors.js';

const API_VERSION = '1.16.1';

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function list(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

function stripTrailingSlashes(s: string): string {
  return s.replace(/\/+$/, '');
}

// Songs of one album that were played at least once
export function playedSongs(album: Json): TrackRecord[] {
  const tracks: TrackRecord[] = [];
  for (const s of list(album.song)) {
    if (!isJson(s)) continue;
    const playCount = typeof s.playCount === 'number' ? s.playCount : 0;
    if (playCount > 0 && typeof s.artist === 'string' && typeof s.title === 'string') {
      tracks.push({ artist: s.artist, title: s.title, localPlaycount: playCount });
    }
  }
  return tracks;
}

export class NavidromeCatalog implements ICatalog {
  private cfg: NavidromeConfig;
  private retry: RetryPolicy;
  private http: Pick<AxiosInstance, 'get'>;
  private executor: BackoffExecutor;

  constructor(cfg: NavidromeConfig, retry: RetryPolicy, deps: { http?: Pick<AxiosInstance, 'get'>; executor?: BackoffExecutor } = {}) {
    this.cfg = cfg;
    this.retry = retry;
    this.http = deps.http ?? axios.create({ baseURL: `${stripTrailingSlashes(cfg.url)}/rest/`, timeout: 30_000 });
    this.executor = deps.executor ?? new BackoffExecutor();
  }

  // Salted token auth (t = md5(password + salt)); an "enc:" hex password is passed through as p
  private authParams(): Record<string, string> {
    const common = { u: this.cfg.username, v: API_VERSION, c: this.cfg.client, f: 'json' };
    if (this.cfg.password.startsWith('enc:')) {
      return { ...common, p: this.cfg.password };
    }
    const salt = crypto.randomBytes(6).toString('hex');
    return {
      ...common,
      t: crypto.createHash('md5').update(this.cfg.password + salt, 'utf8').digest('hex'),
      s: salt,
    };
  }

  private async call(endpoint: string, params: Record<string, string | number>, signal?: AbortSignal): Promise<Json> {
    return this.executor.execute(
      async () => {
        const res = await this.http.get<unknown>(`${endpoint}.view`, {
          params: { ...this.authParams(), ...params },
          signal,
        });
        const body: unknown = res.data;
        if (!isJson(body) || !isJson(body['subsonic-response'])) {
          throw new FatalError(`Invalid Navidrome response for ${endpoint}: missing 'subsonic-response'`);
        }
        const data = body['subsonic-response'];
        if (data.status === 'failed') {
          const error = isJson(data.error) ? data.error : {};
          const message = typeof error.message === 'string' ? error.message : 'Unknown error';
          throw new FatalError(`Navidrome API error: ${message}`);
        }
        return data;
      },
      { ...this.retry, label: `Navidrome ${endpoint}`, signal },
    );
  }

  async fetchAlbumSongs(albumId: string, signal?: AbortSignal): Promise<TrackRecord[]> {
    try {
      const data = await this.call('getAlbum', { id: albumId }, signal);
      return isJson(data.album) ? playedSongs(data.album) : [];
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      Logger.warn(`Failed to fetch album ${albumId}: ${describeError(err)}`);
      return [];
    }
  }

  async fetchAllTracks(signal?: AbortSignal): Promise<TrackRecord[]> {
    const tracks: TrackRecord[] = [];
    const size = this.cfg.pageSize;
    const pool = new Bottleneck({ maxConcurrent: this.cfg.maxWorkers });
    let offset = 0;

    while (true) {
      try {
        const data = await this.call('getAlbumList2', { type: 'alphabeticalByName', offset, size }, signal);
        const albums = isJson(data.albumList2) ? list(data.albumList2.album) : [];
        const albumIds = albums
          .map((a) => (isJson(a) && typeof a.id === 'string' ? a.id : null))
          .filter((id): id is string => id !== null);
        if (albums.length === 0) break;

        Logger.info(`Fetching songs for ${albumIds.length} albums (${this.cfg.maxWorkers} workers)...`);
        // Completion order does not matter; the pool is an unordered collection
        const perAlbum = await Promise.all(albumIds.map((id) => pool.schedule(() => this.fetchAlbumSongs(id, signal))));
        for (const albumTracks of perAlbum) tracks.push(...albumTracks);
        Logger.info(`Fetched ${tracks.length} played tracks so far.`);

        offset += albums.length;
        if (albums.length < size) break;
        if (this.cfg.firstPageOnly) break;
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        Logger.error(`Failed to fetch album list at offset ${offset}.`, err);
        if (tracks.length > 0) {
          Logger.warn(`Proceeding with ${tracks.length} tracks already fetched.`);
          break;
        }
        throw new CatalogError(`Could not fetch any tracks from Navidrome: ${describeError(err, 200)}`, { cause: err });
      }
    }

    return tracks;
  }
}
