export type NoteStoreErrorCode =
  | 'VALIDATION'
  | 'INVALID_IDENTIFIER'
  | 'BACKEND_UNAVAILABLE'
  | 'QUERY_FAILURE';

/**
 * Base class of every error the storage contract raises.
 * "Not found" is never an error; it is an `undefined` / `false` result.
 */
export abstract class NoteStoreError extends Error {
  abstract readonly code: NoteStoreErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Empty title/content, bad limit or window. */
export class ValidationError extends NoteStoreError {
  readonly code = 'VALIDATION';
}

/** Identifier is not in the active backend's key format. */
export class InvalidIdentifierError extends NoteStoreError {
  readonly code = 'INVALID_IDENTIFIER';

  constructor(
    readonly rawId: string,
    reason: string
  ) {
    super(`Invalid note id "${rawId}": ${reason}`);
  }
}

/** Connection or initialization failure. Fatal at startup. */
export class BackendUnavailableError extends NoteStoreError {
  readonly code = 'BACKEND_UNAVAILABLE';
}

/** The request reached the engine and failed there. */
export class QueryFailureError extends NoteStoreError {
  readonly code = 'QUERY_FAILURE';

  constructor(
    readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an engine error, leaving contract errors untouched.
 */
export function toQueryFailure(operation: string, error: unknown): NoteStoreError {
  if (error instanceof NoteStoreError) {
    return error;
  }
  return new QueryFailureError(operation, errorMessage(error), { cause: error });
}
