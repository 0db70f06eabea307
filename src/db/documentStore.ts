// ============================================
// src/db/documentStore.ts - Data access contract
// ============================================

import mongoose from 'mongoose';
import type { IModule } from '../models/Module';
import type { IProgress } from '../models/Progress';
import type { INote } from '../models/Note';
import { InvalidIdError } from '../utils/errors';

export interface CollectionRecords {
  module: IModule;
  progress: IProgress;
  note: INote;
}

export type CollectionName = keyof CollectionRecords;

export type DocumentFilter = Record<string, string | number | boolean>;

export interface StoredDocument {
  _id: unknown;
  [field: string]: unknown;
}

export const DEFAULT_LIMIT = 50;

/**
 * Everything the API layer needs from the database. One instance is created
 * per process and handed to the controllers.
 *
 * Every operation rejects with a StorageError when the database cannot be
 * reached or refuses the operation.
 */
export interface DocumentStore {
  /** False when there is no usable database handle at all. */
  readonly connected: boolean;

  /** Inserts one document and resolves with its id as a hex string. */
  insert<C extends CollectionName>(collection: C, document: CollectionRecords[C]): Promise<string>;

  /** Exact-match filter, natural order, at most `limit` documents. */
  findMany(collection: CollectionName, filter?: DocumentFilter, limit?: number): Promise<StoredDocument[]>;

  findOne(collection: CollectionName, filter: DocumentFilter): Promise<StoredDocument | null>;

  /** Rejects with InvalidIdError when `id` is not an ObjectId hex string. */
  findById(collection: CollectionName, id: string): Promise<StoredDocument | null>;

  /**
   * Inserts the document when nothing matches `filter`, otherwise overwrites
   * the matching document's fields. Resolves with the stored document.
   */
  upsertOne<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter,
    document: CollectionRecords[C]
  ): Promise<StoredDocument>;

  count(collection: CollectionName): Promise<number>;

  listCollections(): Promise<string[]>;
}

export const parseObjectId = (id: string): mongoose.Types.ObjectId => {
  if (!mongoose.isObjectIdOrHexString(id)) {
    throw new InvalidIdError(id);
  }
  return new mongoose.Types.ObjectId(id);
};
