export * from './csv-reader.service';
export * from './column-extractor.service';
