export const QDRANT_CLIENT = Symbol('QDRANT_CLIENT');

export const DEFAULT_COLLECTION_NAME = 'legal_documents';
