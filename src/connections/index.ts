// Database
export {
  connectDatabase,
  disconnectDatabase,
  MongoDocumentStore,
  parseDocumentId,
  isDocumentId,
  stampDocument,
} from './db';
export type { DocumentStore, DocumentData, DocumentFilter, DocumentId, StoredDocument } from './db';

// Config - All configurations in one place
export { appConfig, dbConfig } from './config/app.config';
export type { DatabaseConfig } from './config/app.config';
