export * from './chunk-input.dto';
export * from './chunk-output.dto';
