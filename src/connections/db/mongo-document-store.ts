import { Connection, ConnectionStates, mongo } from 'mongoose';
import { DatabaseUnavailableError } from '../../utils/errors';
import {
  DocumentData,
  DocumentFilter,
  DocumentStore,
  StoredDocument,
  parseDocumentId,
  stampDocument,
} from './document-store';

/**
 * DocumentStore backed by a mongoose connection.
 * Built with `null` when no database is configured; every operation then
 * rejects with DatabaseUnavailableError.
 */
export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly connection: Connection | null) {}

  isConfigured(): boolean {
    return this.connection !== null;
  }

  isConnected(): boolean {
    return this.connection !== null && this.connection.readyState === ConnectionStates.connected;
  }

  private db(): mongo.Db {
    const db = this.connection?.db;
    if (!db) {
      throw new DatabaseUnavailableError();
    }
    return db;
  }

  private collection(name: string): mongo.Collection {
    return this.db().collection(name);
  }

  async insertOne(collection: string, data: DocumentData): Promise<string> {
    const result = await this.collection(collection).insertOne(stampDocument(data));
    return String(result.insertedId);
  }

  async insertMany(collection: string, data: DocumentData[]): Promise<string[]> {
    if (data.length === 0) {
      return [];
    }
    const now = new Date();
    const result = await this.collection(collection).insertMany(data.map((item) => stampDocument(item, now)));
    return Object.values(result.insertedIds).map((id) => String(id));
  }

  async find(collection: string, filter: DocumentFilter = {}): Promise<StoredDocument[]> {
    return this.collection(collection).find(filter).toArray();
  }

  async findOne(collection: string, filter: DocumentFilter): Promise<StoredDocument | null> {
    return this.collection(collection).findOne(filter);
  }

  async findById(collection: string, id: string): Promise<StoredDocument | null> {
    const _id = parseDocumentId(id);
    return this.collection(collection).findOne({ _id });
  }

  async count(collection: string, filter: DocumentFilter = {}): Promise<number> {
    return this.collection(collection).countDocuments(filter);
  }

  async listCollections(): Promise<string[]> {
    const collections = await this.db().listCollections({}, { nameOnly: true }).toArray();
    return collections.map((info) => info.name);
  }
}
