// A local catalog track with at least one play
export interface TrackRecord {
  readonly artist: string;
  readonly title: string;
  readonly localPlaycount: number;
}

// Last.fm-side identity of a track (as returned by getInfo / search)
export interface RemoteTrack {
  artist: string;
  title: string;
  url?: string;
}

export type MatchOutcome =
  | { kind: 'found'; track: RemoteTrack; remotePlaycount: number; via: 'exact' | 'fuzzy' }
  | { kind: 'notFound' };

export type CacheEntry =
  | { kind: 'noRemoteData' }
  | { kind: 'remote'; remotePlaycount: number; scrobbledThisRun: number };

export interface ScrobbleResult {
  artist: string;
  title: string;
  timestamp: number; // unix seconds
  dryRun: boolean;
}

export type LoopState = 'running' | 'done' | 'limitReached' | 'cancelled';

export interface RunSummary {
  state: Exclude<LoopState, 'running'>;
  totalScrobbled: number;
  steps: number;
  skipped: number;
  failedAttempts: number;
  durationMs: number;
}

// Interfaces for the collaborators the engine talks to
export interface ICatalog {
  fetchAllTracks(signal?: AbortSignal): Promise<TrackRecord[]>;
}

export interface IScrobbleService {
  // Throws when the track is unknown to the service
  getUserPlaycount(artist: string, title: string): Promise<RemoteTrack & { userPlaycount: number }>;
  searchTracks(artist: string, title: string, limit: number): Promise<RemoteTrack[]>;
  scrobble(artist: string, title: string, timestamp: number): Promise<void>;
}
