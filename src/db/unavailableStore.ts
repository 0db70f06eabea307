import { StorageError } from '../utils/errors';
import type { DocumentStore, StoredDocument } from './documentStore';

/**
 * Stand-in used when the process has no database handle (no DATABASE_URL,
 * or the initial connection failed). The server still starts; every data
 * operation fails with a StorageError carrying `reason`.
 */
export class UnavailableStore implements DocumentStore {
  readonly connected = false;

  constructor(private readonly reason: string = 'Database is not initialized') {}

  private fail(): Promise<never> {
    return Promise.reject(new StorageError(this.reason));
  }

  insert(): Promise<string> {
    return this.fail();
  }

  findMany(): Promise<StoredDocument[]> {
    return this.fail();
  }

  findOne(): Promise<StoredDocument | null> {
    return this.fail();
  }

  findById(): Promise<StoredDocument | null> {
    return this.fail();
  }

  upsertOne(): Promise<StoredDocument> {
    return this.fail();
  }

  count(): Promise<number> {
    return this.fail();
  }

  listCollections(): Promise<string[]> {
    return this.fail();
  }
}
