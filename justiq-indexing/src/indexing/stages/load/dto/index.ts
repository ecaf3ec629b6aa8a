export * from './load-input.dto';
export * from './load-output.dto';
