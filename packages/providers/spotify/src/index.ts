import {
  createTrack,
  isRateLimited,
  MAX_BATCH_SIZE,
  PermanentFailureError,
  type AddResult,
  type Candidate,
  type Collection,
  type ProviderAuth,
  type ProviderName,
  type TargetCatalog,
  type Track,
} from '@tracksync/contracts';
import type { CacheBackend, Sleep } from '@tracksync/providers-core';

import {
  SpotifyClient,
  type SpotifyPage,
  type SpotifyPlaylist,
  type SpotifyPlaylistItem,
  type SpotifyTrack,
} from './spotify.client';

type SearchPass = 'isrc' | 'strict' | 'free_text';

const PLAYLIST_PAGE_SIZE = 50;
const TRACK_PAGE_SIZE = 100;
const DEFAULT_SEARCH_LIMIT = 20;
const DEFAULT_TOP_K = 3;
const DEFAULT_RATE_LIMIT_RETRIES = 3;
const EXACT_CONFIDENCE = 0.95;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface SpotifyCatalogOptions {
  auth?: ProviderAuth;
  baseUrl?: string;
  market?: string;
  searchLimit?: number;
  /** Waits allowed per search when the API answers 429. */
  rateLimitRetries?: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
  cache?: CacheBackend;
}

/** Jaccard index over the character sets of two strings. */
export function characterSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const char of left) {
    if (right.has(char)) shared += 1;
  }
  const union = left.size + right.size - shared;
  return union > 0 ? shared / union : 0;
}

/** 1 within 2s, falling linearly to 0 at 5s apart. */
export function durationSimilarity(sourceMs: number, targetMs: number): number {
  const diff = Math.abs(sourceMs - targetMs);
  if (diff <= 2000) return 1;
  return Math.max(0, 1 - (diff - 2000) / 3000);
}

export function scoreCandidate(source: Track, target: SpotifyTrack): number {
  const title = characterSimilarity(source.title.toLowerCase(), target.name.toLowerCase());
  const sourceArtist = source.artists[0]?.toLowerCase() ?? '';
  const targetArtist = target.artists?.[0]?.name?.toLowerCase() ?? '';
  const artist = characterSimilarity(sourceArtist, targetArtist);
  const duration = durationSimilarity(source.durationMs, target.duration_ms ?? 0);
  return Math.min(1, title * 0.5 + artist * 0.4 + duration * 0.1);
}

export function buildSearchQueries(track: Track): Array<[SearchPass, string]> {
  const queries: Array<[SearchPass, string]> = [];
  if (track.isrc) {
    queries.push(['isrc', `isrc:${track.isrc}`]);
  }
  const primaryArtist = track.artists[0];
  if (track.title && primaryArtist) {
    queries.push(['strict', `track:"${track.title}" artist:"${primaryArtist}"`]);
    queries.push(['free_text', `${track.title} ${primaryArtist}`]);
  }
  return queries.filter(([, query]) => query.trim().length > 0);
}

const trackUri = (track: SpotifyTrack): string | null => track.uri ?? (track.id ? `spotify:track:${track.id}` : null);

const toCandidate = (source: Track, target: SpotifyTrack, pass: SearchPass, rank: number): Candidate | null => {
  const uri = trackUri(target);
  if (!uri) return null;
  const confidence = pass === 'isrc' ? 1 : scoreCandidate(source, target);
  const reason = pass === 'isrc' ? 'isrc_exact' : confidence >= EXACT_CONFIDENCE ? 'exact_match' : 'fuzzy_match';
  return {
    uri,
    confidence,
    reason,
    title: target.name,
    artists: (target.artists ?? []).map((artist) => artist.name).filter(Boolean),
    album: target.album?.name ?? null,
    durationMs: target.duration_ms ?? null,
    rank,
    albumType: target.album?.album_type ?? null,
  };
};

const mapTrack = (item: SpotifyPlaylistItem): Track | undefined => {
  const track = item.track;
  if (!track || track.is_local || !track.id) {
    return undefined;
  }
  return createTrack({
    id: track.id,
    sourceId: track.id,
    title: track.name,
    artists: (track.artists ?? []).map((artist) => artist?.name).filter((name): name is string => Boolean(name)),
    durationMs: track.duration_ms ?? 0,
    isrc: track.external_ids?.isrc ?? null,
    album: track.album?.name ?? null,
    uri: trackUri(track),
  });
};

const toCollection = (playlist: SpotifyPlaylist, userId: string): Collection => ({
  id: playlist.id,
  name: playlist.name,
  ownerId: playlist.owner.id,
  isOwned: playlist.owner.id === userId,
  trackCount: playlist.tracks?.total ?? 0,
});

/** Read-write Spotify catalog. */
export default class SpotifyCatalog implements TargetCatalog {
  public readonly name: ProviderName = 'spotify';
  public readonly role = 'target' as const;

  private readonly options: SpotifyCatalogOptions;
  private readonly sleep: Sleep;
  private client?: SpotifyClient;
  private userId?: string;

  constructor(options?: SpotifyCatalogOptions) {
    this.options = options ?? {};
    this.sleep = this.options.sleep ?? defaultSleep;
  }

  private ensureClient(): SpotifyClient {
    if (this.client) return this.client;
    const token = this.options.auth?.token;
    if (!token) {
      throw new PermanentFailureError('Spotify auth token is required');
    }
    this.client = new SpotifyClient({
      token,
      baseUrl: this.options.baseUrl,
      fetch: this.options.fetch,
      sleep: this.options.sleep,
      cache: this.options.cache,
    });
    return this.client;
  }

  private async currentUserId(): Promise<string> {
    if (this.userId) return this.userId;
    const profile = await this.ensureClient().getCurrentUser();
    this.userId = profile.id;
    return profile.id;
  }

  private async fetchAll<T>(load: (offset: number) => Promise<SpotifyPage<T>>): Promise<T[]> {
    const items: T[] = [];
    let offset = 0;
    while (true) {
      const page = await load(offset);
      items.push(...page.items);
      offset += page.items.length;
      if (!page.next || page.items.length === 0) {
        return items;
      }
    }
  }

  private async runWithBackoff<T>(fn: () => Promise<T>): Promise<T> {
    const retries = this.options.rateLimitRetries ?? DEFAULT_RATE_LIMIT_RETRIES;
    let attempt = 0;

    while (true) {
      try {
        return await fn();
      } catch (error) {
        if (!isRateLimited(error) || attempt >= retries) {
          throw error;
        }
        attempt += 1;
        await this.sleep(error.retryAfterMs);
      }
    }
  }

  async listOwnedCollections(): Promise<Collection[]> {
    const client = this.ensureClient();
    const userId = await this.currentUserId();
    const playlists = await this.fetchAll((offset) => client.getMyPlaylists({ offset, limit: PLAYLIST_PAGE_SIZE }));
    return playlists.map((playlist) => toCollection(playlist, userId)).filter((collection) => collection.isOwned);
  }

  async listTracks(collectionId: string): Promise<Track[]> {
    const client = this.ensureClient();
    const items = await this.fetchAll((offset) =>
      client.getPlaylistTracks(collectionId, { offset, limit: TRACK_PAGE_SIZE }),
    );
    return items.map(mapTrack).filter((track): track is Track => track !== undefined);
  }

  async findCandidates(track: Track, topK = DEFAULT_TOP_K): Promise<Candidate[]> {
    const client = this.ensureClient();
    const limit = this.options.searchLimit ?? DEFAULT_SEARCH_LIMIT;
    const candidates: Candidate[] = [];
    const seen = new Set<string>();

    for (const [pass, query] of buildSearchQueries(track)) {
      const response = await this.runWithBackoff(() =>
        client.searchTracks(query, { limit, market: this.options.market }),
      );
      const items = response.tracks?.items ?? [];

      for (const [index, item] of items.entries()) {
        const candidate = toCandidate(track, item, pass, index);
        if (!candidate || seen.has(candidate.uri)) continue;
        if (pass === 'isrc') {
          return [candidate];
        }
        seen.add(candidate.uri);
        candidates.push(candidate);
        if (candidates.length >= topK) break;
      }

      if (candidates.length >= topK) break;
    }

    return candidates.sort((a, b) => b.confidence - a.confidence).slice(0, topK);
  }

  async resolveOrCreateCollection(name: string): Promise<Collection> {
    const wanted = name.toLowerCase();
    const existing = (await this.listOwnedCollections()).find((collection) => collection.name.toLowerCase() === wanted);
    if (existing) {
      return existing;
    }

    const userId = await this.currentUserId();
    const created = await this.ensureClient().createPlaylist(userId, { name, public: false });
    return { ...toCollection(created, userId), isOwned: true, trackCount: 0 };
  }

  async addTracksBatch(collectionId: string, uris: readonly string[]): Promise<AddResult> {
    if (uris.length === 0) {
      return { added: 0, duplicates: 0, errors: 0 };
    }
    const client = this.ensureClient();
    const totals: AddResult = { added: 0, duplicates: 0, errors: 0 };
    // The API takes at most 100 uris per request.
    for (let start = 0; start < uris.length; start += MAX_BATCH_SIZE) {
      const chunk = uris.slice(start, start + MAX_BATCH_SIZE);
      const result = await client.addTracks(collectionId, chunk);
      if (result?.snapshot_id) {
        totals.added += chunk.length;
      } else {
        totals.errors += chunk.length;
      }
    }
    return totals;
  }
}

export { SpotifyCatalog };
export { SpotifyClient } from './spotify.client';
