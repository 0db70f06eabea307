import mongoose from 'mongoose';
import {
  CollectionName,
  CollectionRecords,
  DEFAULT_LIMIT,
  DocumentFilter,
  DocumentStore,
  StoredDocument,
  parseObjectId,
} from './documentStore';

interface Entry {
  _id: mongoose.Types.ObjectId;
  data: Record<string, unknown>;
}

const toPlainRecord = (value: object): Record<string, unknown> =>
  structuredClone(Object.fromEntries(Object.entries(value)));

const matches = (entry: Entry, filter: DocumentFilter): boolean =>
  Object.entries(filter).every(([field, value]) => entry.data[field] === value);

const toStored = (entry: Entry): StoredDocument => ({
  ...toPlainRecord(entry.data),
  _id: entry._id,
});

/**
 * In-process DocumentStore keeping documents in insertion order. Ids are
 * real ObjectIds so id parsing behaves as it does against MongoDB.
 */
export class MemoryStore implements DocumentStore {
  readonly connected = true;
  private readonly collections = new Map<CollectionName, Entry[]>();

  private entries(collection: CollectionName): Entry[] {
    let entries = this.collections.get(collection);
    if (!entries) {
      entries = [];
      this.collections.set(collection, entries);
    }
    return entries;
  }

  async insert<C extends CollectionName>(collection: C, document: CollectionRecords[C]): Promise<string> {
    const _id = new mongoose.Types.ObjectId();
    this.entries(collection).push({ _id, data: toPlainRecord(document) });
    return _id.toHexString();
  }

  async findMany(
    collection: CollectionName,
    filter: DocumentFilter = {},
    limit: number = DEFAULT_LIMIT
  ): Promise<StoredDocument[]> {
    return this.entries(collection)
      .filter((entry) => matches(entry, filter))
      .slice(0, limit)
      .map(toStored);
  }

  async findOne(collection: CollectionName, filter: DocumentFilter): Promise<StoredDocument | null> {
    const entry = this.entries(collection).find((candidate) => matches(candidate, filter));
    return entry ? toStored(entry) : null;
  }

  async findById(collection: CollectionName, id: string): Promise<StoredDocument | null> {
    const _id = parseObjectId(id);
    const entry = this.entries(collection).find((candidate) => candidate._id.equals(_id));
    return entry ? toStored(entry) : null;
  }

  async upsertOne<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter,
    document: CollectionRecords[C]
  ): Promise<StoredDocument> {
    const entries = this.entries(collection);
    const existing = entries.find((candidate) => matches(candidate, filter));
    if (existing) {
      existing.data = { ...existing.data, ...toPlainRecord(document) };
      return toStored(existing);
    }
    const created: Entry = {
      _id: new mongoose.Types.ObjectId(),
      data: { ...filter, ...toPlainRecord(document) },
    };
    entries.push(created);
    return toStored(created);
  }

  async count(collection: CollectionName): Promise<number> {
    return this.entries(collection).length;
  }

  async listCollections(): Promise<string[]> {
    return [...this.collections.entries()]
      .filter(([, entries]) => entries.length > 0)
      .map(([name]) => name);
  }
}
