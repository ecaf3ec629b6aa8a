/**
 * Load Stage Errors
 * Every error here is scoped to a single file: the file is skipped and the
 * load pass continues.
 */

/**
 * Base class for all Load Stage errors
 */
export abstract class LoadStageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Neither the primary nor the fallback encoding could decode the file
 */
export class EncodingError extends LoadStageError {
  constructor(
    filePath: string,
    public readonly attemptedEncodings: string[],
  ) {
    super(
      `Unable to decode ${filePath} (tried ${attemptedEncodings.join(', ')})`,
      'LOAD_ENCODING_FAILED',
      false,
    );
  }
}

export class EmptyFileError extends LoadStageError {
  constructor(filePath: string) {
    super(`No header row found in ${filePath}`, 'LOAD_EMPTY_FILE', false);
  }
}

export class MalformedCsvError extends LoadStageError {
  constructor(
    filePath: string,
    reason: string,
    public readonly originalError?: Error,
  ) {
    super(`Malformed CSV ${filePath}: ${reason}`, 'LOAD_MALFORMED_CSV', false);
  }
}

export class FileReadError extends LoadStageError {
  constructor(
    filePath: string,
    reason: string,
    public readonly originalError?: Error,
  ) {
    super(`Cannot read ${filePath}: ${reason}`, 'LOAD_READ_FAILED', false);
  }
}
