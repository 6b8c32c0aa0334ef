import { mongo } from 'mongoose';
import { BadRequestError } from '../../utils/errors';

export type DocumentId = mongo.ObjectId;
export type DocumentData = Record<string, unknown>;
export type DocumentFilter = mongo.Filter<mongo.Document>;
export type StoredDocument = DocumentData & { _id: DocumentId };

/**
 * Generic create/read access to named collections.
 * Identifiers are store-generated ObjectIds, exchanged as 24-char hex strings.
 */
export interface DocumentStore {
  /** true once a connection has been configured, even if it is not live */
  isConfigured(): boolean;
  isConnected(): boolean;

  insertOne(collection: string, data: DocumentData): Promise<string>;
  insertMany(collection: string, data: DocumentData[]): Promise<string[]>;
  find(collection: string, filter?: DocumentFilter): Promise<StoredDocument[]>;
  findOne(collection: string, filter: DocumentFilter): Promise<StoredDocument | null>;
  findById(collection: string, id: string): Promise<StoredDocument | null>;
  count(collection: string, filter?: DocumentFilter): Promise<number>;
  listCollections(): Promise<string[]>;
}

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

export const isDocumentId = (value: unknown): value is DocumentId => value instanceof mongo.ObjectId;

/**
 * Convert a transport id into an ObjectId
 * @throws BadRequestError when the string is not a 24-char hex ObjectId
 */
export const parseDocumentId = (id: string): DocumentId => {
  if (!OBJECT_ID_PATTERN.test(id)) {
    throw new BadRequestError(`'${id}' is not a valid ObjectId, it must be a 24-character hex string`, 'INVALID_ID');
  }
  return new mongo.ObjectId(id);
};

/**
 * Copy of the data with created_at / updated_at set to the same instant
 */
export const stampDocument = (data: DocumentData, now: Date = new Date()): DocumentData => ({
  ...data,
  created_at: now,
  updated_at: now,
});
