export { connectDatabase, disconnectDatabase } from './connection';
export { MongoDocumentStore } from './mongo-document-store';
export * from './document-store';
