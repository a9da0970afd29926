import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { NotFoundError, type Collection, type SourceCatalog, type Track } from '@tracksync/contracts';
import { readOnlySource, type ReadOnlySource } from '@tracksync/providers-core';

import { FileImportError } from '../importers/common';
import { parseCsvTracks } from '../importers/csv';

export interface FileSourceOptions {
  /** CSV files; each one is listed as a collection named after the file. */
  files: readonly string[];
  ownerId?: string;
}

export const collectionIdForFile = (file: string): string => path.basename(file, path.extname(file));

/** Local playlist exports, one collection per CSV file. */
export class FileSourceCatalog implements Omit<SourceCatalog, 'role'> {
  readonly name = 'file' as const;

  private readonly files = new Map<string, string>();
  private readonly ownerId: string;

  constructor(options: FileSourceOptions) {
    for (const file of options.files) {
      const id = collectionIdForFile(file);
      const existing = this.files.get(id);
      if (existing !== undefined) {
        throw new FileImportError(`Playlist files ${existing} and ${path.resolve(file)} share the name "${id}"`, {
          id,
        });
      }
      this.files.set(id, path.resolve(file));
    }
    this.ownerId = options.ownerId ?? 'local';
  }

  async listOwnedCollections(): Promise<Collection[]> {
    const collections: Collection[] = [];
    for (const [id] of this.files) {
      const tracks = await this.listTracks(id);
      collections.push({ id, name: id, ownerId: this.ownerId, isOwned: true, trackCount: tracks.length });
    }
    return collections;
  }

  async listTracks(collectionId: string): Promise<Track[]> {
    const file = this.files.get(collectionId);
    if (!file) {
      throw new NotFoundError(`No playlist file for collection "${collectionId}"`);
    }
    return parseCsvTracks(await readFile(file, 'utf8'));
  }
}

export function createFileSource(options: FileSourceOptions): ReadOnlySource {
  return readOnlySource(new FileSourceCatalog(options));
}
