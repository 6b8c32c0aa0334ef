import { isDocumentId } from '../connections/db/document-store';

export type SerializedDocument = Record<string, unknown>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date) && !isDocumentId(value);

const serializeValue = (value: unknown): unknown => {
  if (isDocumentId(value)) {
    return value.toHexString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(serializeValue);
  }
  if (isPlainObject(value)) {
    return serializeDocument(value);
  }
  return value;
};

/**
 * Make a stored document safe for JSON transport: `_id` becomes a string `id`,
 * ObjectIds and Dates at any depth become strings.
 */
export const serializeDocument = (doc: Record<string, unknown>): SerializedDocument => {
  const { _id, ...rest } = doc;
  const serialized: SerializedDocument = {};

  if (_id !== undefined && _id !== null) {
    serialized.id = isDocumentId(_id) ? _id.toHexString() : String(_id);
  }

  for (const [key, value] of Object.entries(rest)) {
    serialized[key] = serializeValue(value);
  }

  return serialized;
};
