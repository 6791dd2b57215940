/**
 * Error taxonomy for the extraction and QC pipeline.
 */

export class QcError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number) {
    super(message);
    this.name = 'QcError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * A structural section marker is missing or its block is unusable.
 */
export class BlockNotFoundError extends QcError {
  readonly block: 'mfi' | 'count';

  constructor(block: 'mfi' | 'count', message: string) {
    super('BLOCK_NOT_FOUND', message, 422);
    this.name = 'BlockNotFoundError';
    this.block = block;
  }
}

/**
 * A required column is absent from a block header.
 */
export class SchemaError extends QcError {
  readonly column: string;

  constructor(column: string, message: string) {
    super('SCHEMA_ERROR', message, 422);
    this.name = 'SchemaError';
    this.column = column;
  }
}

export type AlignmentCheck =
  | 'missing-location'
  | 'duplicate-location'
  | 'missing-sample'
  | 'column-mismatch'
  | 'location-order';

/**
 * Bead-count and MFI tables disagree on wells or analytes.
 */
export class AlignmentError extends QcError {
  readonly check: AlignmentCheck;

  constructor(check: AlignmentCheck, message: string) {
    super('ALIGNMENT_ERROR', `${check}: ${message}`, 422);
    this.name = 'AlignmentError';
    this.check = check;
  }
}

/**
 * A configured analyte or setting cannot be applied to the data.
 */
export class ConfigError extends QcError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 400);
    this.name = 'ConfigError';
  }
}

/**
 * Errors that skip a file in folder mode instead of aborting the run.
 */
export function isSkippableError(err: unknown): err is BlockNotFoundError | SchemaError {
  return err instanceof BlockNotFoundError || err instanceof SchemaError;
}
