import { HttpClient, type CacheBackend, type Sleep } from '@tracksync/providers-core';

export interface SpotifyClientOptions {
  token: string;
  baseUrl?: string;
  fetch?: typeof fetch;
  sleep?: Sleep;
  cache?: CacheBackend;
}

export interface SpotifyUserProfile {
  id: string;
}

export interface SpotifyArtist {
  name: string;
}

export interface SpotifyAlbum {
  name?: string | null;
  album_type?: string | null;
}

export interface SpotifyTrack {
  id?: string | null;
  uri?: string | null;
  name: string;
  duration_ms?: number | null;
  external_ids?: { isrc?: string | null } | null;
  artists?: SpotifyArtist[] | null;
  album?: SpotifyAlbum | null;
  is_local?: boolean | null;
}

export interface SpotifyPlaylistItem {
  track: SpotifyTrack | null;
}

export interface SpotifyPage<T> {
  items: T[];
  next: string | null;
  offset: number;
  limit: number;
  total: number;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  owner: { id: string };
  tracks?: { total?: number | null } | null;
}

export interface SpotifySearchResponse {
  tracks?: { items?: SpotifyTrack[] | null } | null;
}

export interface SpotifySnapshot {
  snapshot_id?: string | null;
}

const defaultBaseUrl = 'https://api.spotify.com/v1';

export class SpotifyClient {
  private readonly http: HttpClient;

  constructor(options: SpotifyClientOptions) {
    if (!options.token) {
      throw new Error('Spotify token is required');
    }
    this.http = new HttpClient({
      baseUrl: options.baseUrl ?? defaultBaseUrl,
      getAuthHeader: async () => `Bearer ${options.token}`,
      fetch: options.fetch,
      sleep: options.sleep,
      cache: options.cache,
      getCacheScope: () => options.token.slice(-8),
    });
  }

  getCurrentUser(): Promise<SpotifyUserProfile> {
    return this.http.request<SpotifyUserProfile>('GET', '/me');
  }

  getMyPlaylists(opts: { offset: number; limit: number }): Promise<SpotifyPage<SpotifyPlaylist>> {
    return this.http.request<SpotifyPage<SpotifyPlaylist>>('GET', '/me/playlists', {
      query: { offset: opts.offset, limit: opts.limit },
    });
  }

  getPlaylistTracks(id: string, opts: { offset: number; limit: number }): Promise<SpotifyPage<SpotifyPlaylistItem>> {
    const encoded = encodeURIComponent(id);
    return this.http.request<SpotifyPage<SpotifyPlaylistItem>>('GET', `/playlists/${encoded}/tracks`, {
      query: { offset: opts.offset, limit: opts.limit },
    });
  }

  searchTracks(query: string, opts: { limit: number; market?: string }): Promise<SpotifySearchResponse> {
    return this.http.request<SpotifySearchResponse>('GET', '/search', {
      query: { q: query, type: 'track', limit: opts.limit, market: opts.market },
    });
  }

  createPlaylist(userId: string, payload: { name: string; public: boolean }): Promise<SpotifyPlaylist> {
    const encoded = encodeURIComponent(userId);
    return this.http.request<SpotifyPlaylist>('POST', `/users/${encoded}/playlists`, { body: payload });
  }

  addTracks(playlistId: string, uris: readonly string[]): Promise<SpotifySnapshot | undefined> {
    const encoded = encodeURIComponent(playlistId);
    return this.http.request<SpotifySnapshot | undefined>('POST', `/playlists/${encoded}/tracks`, {
      body: { uris },
    });
  }
}
