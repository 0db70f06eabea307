// ============================================
// src/db/mongoStore.ts - MongoDB-backed DocumentStore
// ============================================

import mongoose, { Connection } from 'mongoose';
import { Module } from '../models/Module';
import { Progress } from '../models/Progress';
import { Note } from '../models/Note';
import { AppError, StorageError, errorMessage } from '../utils/errors';
import {
  CollectionName,
  CollectionRecords,
  DEFAULT_LIMIT,
  DocumentFilter,
  DocumentStore,
  StoredDocument,
  parseObjectId,
} from './documentStore';

/** The driver calls the store makes on a collection. */
export interface CollectionDriver {
  insertOne(document: object): Promise<{ insertedId: { toString(): string } }>;
  find(filter: DocumentFilter): { limit(limit: number): { toArray(): Promise<StoredDocument[]> } };
  findOne(filter: DocumentFilter | { _id: mongoose.Types.ObjectId }): Promise<StoredDocument | null>;
  findOneAndUpdate(
    filter: DocumentFilter,
    update: { $set: object },
    options: { upsert: boolean; returnDocument: 'after' }
  ): Promise<StoredDocument | null>;
  countDocuments(filter: DocumentFilter): Promise<number>;
}

/** What the store needs from a model: its native collection and its indexes. */
export interface CollectionSource {
  readonly collection: CollectionDriver;
  createIndexes(): Promise<unknown>;
}

export type CollectionModels = Record<CollectionName, CollectionSource>;

const defaultModels: CollectionModels = {
  module: Module,
  progress: Progress,
  note: Note,
};

// Driver failures surface as StorageError; our own errors pass through
const guard = async <T>(operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new StorageError(errorMessage(error));
  }
};

/**
 * Reads and writes go straight to the native collections behind the
 * Mongoose models, so documents are stored exactly as the API layer built
 * them. The models contribute collection names and indexes.
 */
export class MongoStore implements DocumentStore {
  readonly connected = true;

  constructor(
    private readonly connection: Connection = mongoose.connection,
    private readonly models: CollectionModels = defaultModels
  ) {}

  private collection(name: CollectionName): CollectionDriver {
    return this.models[name].collection;
  }

  async ensureIndexes(): Promise<void> {
    await guard(async () => {
      await Promise.all([
        this.models.module.createIndexes(),
        this.models.progress.createIndexes(),
        this.models.note.createIndexes(),
      ]);
    });
  }

  insert<C extends CollectionName>(collection: C, document: CollectionRecords[C]): Promise<string> {
    return guard(async () => {
      // insertOne adds _id to the object it is given
      const result = await this.collection(collection).insertOne({ ...document });
      return result.insertedId.toString();
    });
  }

  findMany(
    collection: CollectionName,
    filter: DocumentFilter = {},
    limit: number = DEFAULT_LIMIT
  ): Promise<StoredDocument[]> {
    return guard(() => this.collection(collection).find(filter).limit(limit).toArray());
  }

  findOne(collection: CollectionName, filter: DocumentFilter): Promise<StoredDocument | null> {
    return guard(() => this.collection(collection).findOne(filter));
  }

  findById(collection: CollectionName, id: string): Promise<StoredDocument | null> {
    return guard(() => {
      const _id = parseObjectId(id);
      return this.collection(collection).findOne({ _id });
    });
  }

  upsertOne<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter,
    document: CollectionRecords[C]
  ): Promise<StoredDocument> {
    return guard(async () => {
      const stored = await this.collection(collection).findOneAndUpdate(
        filter,
        { $set: { ...document } },
        { upsert: true, returnDocument: 'after' }
      );
      if (!stored) {
        throw new StorageError(`Upsert into "${collection}" returned no document`);
      }
      return stored;
    });
  }

  count(collection: CollectionName): Promise<number> {
    return guard(() => this.collection(collection).countDocuments({}));
  }

  listCollections(): Promise<string[]> {
    return guard(async () => {
      const db = this.connection.db;
      if (!db) {
        throw new StorageError('MongoDB connection is not open');
      }
      const collections = await db.listCollections({}, { nameOnly: true }).toArray();
      return collections.map((collection) => collection.name);
    });
  }
}
