export type ConversionErrorCode = 'STORE_UNREADABLE' | 'SCHEMA_MISMATCH' | 'WRITE_FAILURE';

export interface ConversionErrorOptions {
  message: string;
  cause?: unknown;
  metadata?: Record<string, unknown>;
}

/**
 * Base class for the fatal failures of a conversion run.
 *
 * Every failure carries a stable `code` so the CLI can map it to an exit status,
 * the underlying `cause` when one exists, and optional metadata for the log.
 */
export abstract class ConversionError extends Error {
  abstract readonly code: ConversionErrorCode;
  public readonly metadata?: Record<string, unknown>;

  protected constructor(options: ConversionErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.metadata = options.metadata;

    if (options.cause instanceof Error && options.cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/** The store file is missing, is not a SQLite database, or cannot be read. */
export class StoreUnreadableError extends ConversionError {
  readonly code = 'STORE_UNREADABLE';

  constructor(options: ConversionErrorOptions) {
    super(options);
  }
}

/** The store opened, but the AddressBook tables, columns or row shapes are not what the reader expects. */
export class SchemaMismatchError extends ConversionError {
  readonly code = 'SCHEMA_MISMATCH';

  constructor(options: ConversionErrorOptions) {
    super(options);
  }
}

/** The output sink rejected a write. Lines already written stay in place. */
export class WriteFailureError extends ConversionError {
  readonly code = 'WRITE_FAILURE';

  constructor(options: ConversionErrorOptions) {
    super(options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
