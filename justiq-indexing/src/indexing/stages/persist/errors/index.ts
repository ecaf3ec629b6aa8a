export * from './persist-errors';
