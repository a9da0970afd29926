import {
  UnsupportedOperationError,
  type AddResult,
  type Candidate,
  type Collection,
  type SourceCatalog,
  type Track,
} from '@tracksync/contracts';

/**
 * Catalog restricted to the source role. Reads pass through; search and
 * write operations reject with UnsupportedOperationError instead of being stubbed.
 */
export class ReadOnlySource implements SourceCatalog {
  readonly role = 'source' as const;

  constructor(private readonly inner: Omit<SourceCatalog, 'role'>) {}

  get name() {
    return this.inner.name;
  }

  listOwnedCollections(): Promise<Collection[]> {
    return this.inner.listOwnedCollections();
  }

  listTracks(collectionId: string): Promise<Track[]> {
    return this.inner.listTracks(collectionId);
  }

  async findCandidates(_track: Track, _topK?: number): Promise<Candidate[]> {
    throw new UnsupportedOperationError(this.name, 'findCandidates', this.role);
  }

  async resolveOrCreateCollection(_name: string): Promise<Collection> {
    throw new UnsupportedOperationError(this.name, 'resolveOrCreateCollection', this.role);
  }

  async addTracksBatch(_collectionId: string, _uris: readonly string[]): Promise<AddResult> {
    throw new UnsupportedOperationError(this.name, 'addTracksBatch', this.role);
  }
}

export function readOnlySource(catalog: Omit<SourceCatalog, 'role'>): ReadOnlySource {
  return catalog instanceof ReadOnlySource ? catalog : new ReadOnlySource(catalog);
}
