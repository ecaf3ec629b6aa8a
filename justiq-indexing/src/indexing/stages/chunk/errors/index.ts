export * from './chunk-errors';
