export * from './chunk.types';
