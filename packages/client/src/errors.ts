/**
 * Error taxonomy for the chronokv client.
 *
 * Every error carries a stable `code`. Servers report failures as
 * `{ code, message }` pairs or as `[CODE] message` strings; both map back to
 * the classes below through {@link toChronoKvError}.
 */

export type ErrorCode =
  | 'MISSING_REQUIRED_ARGUMENTS'
  | 'AMBIGUOUS_ARGUMENTS'
  | 'INVALID_ARGUMENTS'
  | 'UNSUPPORTED_SHAPE'
  | 'ILLEGAL_STATE_TRANSITION'
  | 'TRANSACTION_CONFLICT'
  | 'TRANSPORT_FAILURE'
  | 'AUTHENTICATION_FAILURE'
  | 'CONFIG_INVALID';

/** Base class for all errors raised by the client. */
export class ChronoKvError extends Error {
  constructor(
    public readonly code: ErrorCode | (string & {}),
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ChronoKvError';
  }
}

/** No registered operation variant matches the supplied arguments. */
export class MissingRequiredArgumentsError extends ChronoKvError {
  public readonly required: string;

  constructor(required: string) {
    super('MISSING_REQUIRED_ARGUMENTS', `Must specify ${required}`);
    this.name = 'MissingRequiredArgumentsError';
    this.required = required;
  }
}

/** Mutually exclusive parameters were supplied together. */
export class AmbiguousArgumentsError extends ChronoKvError {
  public readonly conflicting: readonly string[];

  constructor(conflicting: readonly string[]) {
    super('AMBIGUOUS_ARGUMENTS', `Cannot specify ${conflicting.join(' and ')} together`);
    this.name = 'AmbiguousArgumentsError';
    this.conflicting = conflicting;
  }
}

/** A parameter was present but held a value of the wrong type. */
export class InvalidArgumentsError extends ChronoKvError {
  public readonly parameter: string;

  constructor(parameter: string, expected: string) {
    super('INVALID_ARGUMENTS', `Parameter '${parameter}' must be ${expected}`);
    this.name = 'InvalidArgumentsError';
    this.parameter = parameter;
  }
}

/** The resolver produced a shape the dispatch table has no entry for. */
export class UnsupportedShapeError extends ChronoKvError {
  constructor(
    public readonly family: string,
    public readonly tag: string,
  ) {
    super('UNSUPPORTED_SHAPE', `No '${family}' operation is registered for shape '${tag}'`);
    this.name = 'UnsupportedShapeError';
  }
}

export class IllegalStateTransitionError extends ChronoKvError {
  constructor(message: string) {
    super('ILLEGAL_STATE_TRANSITION', message);
    this.name = 'IllegalStateTransitionError';
  }
}

export class TransactionConflictError extends ChronoKvError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(
      'TRANSACTION_CONFLICT',
      message ??
        'Another client has made changes to data used within the current transaction, so it cannot continue. Abort the transaction and try again.',
      options,
    );
    this.name = 'TransactionConflictError';
  }
}

/** Connection-level failure. The connection should be considered unusable. */
export class TransportFailureError extends ChronoKvError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_FAILURE', message, options);
    this.name = 'TransportFailureError';
  }
}

export class AuthenticationFailureError extends ChronoKvError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION_FAILURE', message, options);
    this.name = 'AuthenticationFailureError';
  }
}

/** The server rejected an operation for a reason outside the taxonomy above. */
export class RemoteOperationError extends ChronoKvError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'RemoteOperationError';
  }
}

/**
 * Map a server-reported error code to its client error class.
 */
export function toChronoKvError(code: string, message: string): ChronoKvError {
  switch (code) {
    case 'TRANSACTION_CONFLICT':
      return new TransactionConflictError(message);
    case 'AUTHENTICATION_FAILURE':
      return new AuthenticationFailureError(message);
    case 'TRANSPORT_FAILURE':
      return new TransportFailureError(message);
    default:
      return new RemoteOperationError(code, message);
  }
}

/**
 * Parse an error whose message has the form `[CODE] Human-readable message`.
 * Anything else becomes an `UNKNOWN` remote error.
 */
export function parseRemoteError(err: unknown): ChronoKvError {
  if (err instanceof ChronoKvError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const match = /^\[([A-Z_]+)\]\s*(.+)$/.exec(message);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return toChronoKvError(match[1], match[2]);
  }
  return new RemoteOperationError('UNKNOWN', message);
}
