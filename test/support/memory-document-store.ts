import { mongo } from 'mongoose';
import {
  DocumentData,
  DocumentFilter,
  DocumentStore,
  StoredDocument,
  parseDocumentId,
  stampDocument,
} from '../../src/connections/db/document-store';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const cloneValue = (value: unknown): unknown => {
  if (value instanceof mongo.ObjectId) {
    return value;
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isRecord(value)) {
    return cloneData(value);
  }
  return value;
};

const cloneData = (data: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(data).map(([key, value]) => [key, cloneValue(value)]));

const valuesEqual = (left: unknown, right: unknown): boolean => {
  if (left instanceof mongo.ObjectId && right instanceof mongo.ObjectId) {
    return left.equals(right);
  }
  return left === right;
};

/**
 * In-process DocumentStore for tests. Filters match on top-level equality only.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, StoredDocument[]>();

  configured = true;
  connected = true;
  /** when set, every operation rejects with this error */
  failWith: Error | null = null;
  insertManyCalls = 0;

  isConfigured(): boolean {
    return this.configured;
  }

  isConnected(): boolean {
    return this.configured && this.connected;
  }

  /** raw stored documents, for assertions */
  documents(collection: string): StoredDocument[] {
    return this.collections.get(collection) ?? [];
  }

  private guard(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }

  private bucket(collection: string): StoredDocument[] {
    let docs = this.collections.get(collection);
    if (!docs) {
      docs = [];
      this.collections.set(collection, docs);
    }
    return docs;
  }

  private matches(doc: StoredDocument, filter: DocumentFilter): boolean {
    return Object.entries(filter).every(([key, value]) => valuesEqual(doc[key], value));
  }

  private clone(doc: StoredDocument): StoredDocument {
    return { ...cloneData(doc), _id: doc._id };
  }

  async insertOne(collection: string, data: DocumentData): Promise<string> {
    this.guard();
    const _id = new mongo.ObjectId();
    this.bucket(collection).push({ ...cloneData(stampDocument(data)), _id });
    return _id.toHexString();
  }

  async insertMany(collection: string, data: DocumentData[]): Promise<string[]> {
    this.guard();
    this.insertManyCalls++;
    const now = new Date();
    return data.map((item) => {
      const _id = new mongo.ObjectId();
      this.bucket(collection).push({ ...cloneData(stampDocument(item, now)), _id });
      return _id.toHexString();
    });
  }

  async find(collection: string, filter: DocumentFilter = {}): Promise<StoredDocument[]> {
    this.guard();
    return this.documents(collection)
      .filter((doc) => this.matches(doc, filter))
      .map((doc) => this.clone(doc));
  }

  async findOne(collection: string, filter: DocumentFilter): Promise<StoredDocument | null> {
    this.guard();
    const doc = this.documents(collection).find((item) => this.matches(item, filter));
    return doc ? this.clone(doc) : null;
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    this.guard();
    return this.findOne(collection, { _id: parseDocumentId(id) });
  }

  async count(collection: string, filter: DocumentFilter = {}): Promise<number> {
    this.guard();
    return this.documents(collection).filter((doc) => this.matches(doc, filter)).length;
  }

  async listCollections(): Promise<string[]> {
    this.guard();
    return Array.from(this.collections.keys());
  }
}
