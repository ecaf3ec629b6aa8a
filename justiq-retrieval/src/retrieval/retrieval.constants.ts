export const QDRANT_CLIENT = Symbol('QDRANT_CLIENT');
export const VECTOR_STORE = Symbol('VECTOR_STORE');
export const COMPLETION_CLIENT = Symbol('COMPLETION_CLIENT');

export const DEFAULT_COLLECTION_NAME = 'legal_documents';
export const DEFAULT_N_RESULTS = 5;
export const MAX_N_RESULTS = 50;
