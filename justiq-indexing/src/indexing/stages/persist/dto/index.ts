export * from './persist-input.dto';
export * from './persist-output.dto';
