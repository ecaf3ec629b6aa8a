export * from './persist.types';
