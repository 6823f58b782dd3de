// ============================================================================
// @dagwire/core — Error Types
// ============================================================================
//
// Every failure in the engine surfaces as a DagwireError. Errors carry a
// status code and a list of context notes; each frame the error unwinds
// through may append a note, and the rendered message is the base text
// followed by the notes joined with "; ".
// ============================================================================

/**
 * Status codes used across the engine.
 */
export type StatusCode =
  | 'INVALID_ARGUMENT'
  | 'FAILED_PRECONDITION'
  | 'NOT_FOUND'
  | 'UNIMPLEMENTED'
  | 'INTERNAL'
  | 'UNKNOWN';

/**
 * Base error class for all dagwire errors.
 */
export class DagwireError extends Error {
  public readonly code: StatusCode;
  public readonly baseMessage: string;
  public readonly context: string[] = [];

  constructor(code: StatusCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DagwireError';
    this.code = code;
    this.baseMessage = message;
  }

  /** Append a context note and re-render the message. */
  addContext(note: string): this {
    this.context.push(note);
    this.message = [this.baseMessage, ...this.context].join('; ');
    return this;
  }
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

/**
 * Malformed input: a bad index, a missing field, an unknown name.
 */
export class InvalidArgumentError extends DagwireError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The operation is not allowed in the current state: slot collisions,
 * a frozen registry, a broken internal invariant.
 */
export class FailedPreconditionError extends DagwireError {
  constructor(message: string) {
    super('FAILED_PRECONDITION', message);
    this.name = 'FailedPreconditionError';
  }
}

/**
 * A lookup found nothing, e.g. a codec that does not recognise a payload.
 */
export class NotFoundError extends DagwireError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * The requested feature has no implementation, e.g. no encoder for a qtype.
 */
export class UnimplementedError extends DagwireError {
  constructor(message: string) {
    super('UNIMPLEMENTED', message);
    this.name = 'UnimplementedError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Annotate an error with a context note.
 *
 * A DagwireError is annotated in place, keeping its code. Anything else
 * (a codec throwing a plain Error, say) is wrapped with code UNKNOWN and
 * kept as `cause`.
 */
export function withContext(err: unknown, note: string): DagwireError {
  if (err instanceof DagwireError) {
    return err.addContext(note);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new DagwireError('UNKNOWN', message, { cause: err }).addContext(note);
}

/**
 * Run `fn`, annotating anything it throws with `note`.
 */
export function annotate<T>(note: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw withContext(err, note);
  }
}

/**
 * Check if an error carries the given status code.
 */
export function hasStatus(err: unknown, code: StatusCode): boolean {
  return err instanceof DagwireError && err.code === code;
}
