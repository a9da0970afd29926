/** Provider-independent track as listed from a catalog. Adapters build these; nothing mutates them afterwards. */
export interface Track {
  readonly id?: string | null;
  readonly sourceId: string;
  readonly title: string;
  /** Ordered artist names; empty when the catalog has none, never null. */
  readonly artists: readonly string[];
  readonly durationMs: number;
  readonly isrc?: string | null;
  readonly album?: string | null;
  readonly uri?: string | null;
}

export interface Collection {
  readonly id: string;
  readonly name: string;
  readonly ownerId: string;
  readonly isOwned: boolean;
  readonly trackCount: number;
}

/** A possible correspondence in the target catalog, as returned by search. */
export interface Candidate {
  readonly uri: string;
  /** 0..1 */
  readonly confidence: number;
  readonly reason: string;
  // Descriptive metadata, used for tie-breaks and diagnostics only
  readonly title?: string | null;
  readonly artists?: readonly string[] | null;
  readonly album?: string | null;
  readonly durationMs?: number | null;
  readonly rank?: number | null;
  readonly albumType?: string | null;
}

export interface AddResult {
  added: number;
  duplicates: number;
  errors: number;
}

export function createTrack(input: Omit<Track, 'artists'> & { artists?: readonly string[] | null }): Track {
  return Object.freeze({
    ...input,
    artists: Object.freeze([...(input.artists ?? [])]),
  });
}
