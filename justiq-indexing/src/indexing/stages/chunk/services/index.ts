export * from './sentence-window-splitter.service';
export * from './chunk-id-generator.service';
