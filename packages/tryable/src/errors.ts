/**
 * tryable/errors
 *
 * Error classes used by the outcome algebra, and the rule that splits thrown
 * values into checked (recoverable) and unchecked (programming) failures.
 *
 * The checked discipline captures checked failures and lets unchecked ones
 * escape; the catch-all discipline captures everything.
 *
 * @example
 * ```typescript
 * import { IllegalStateError, isChecked, isUnchecked } from 'tryable/errors';
 *
 * isChecked(new Error('disk full'));          // true
 * isUnchecked(new IllegalStateError('bug'));  // true
 * isUnchecked(new TypeError('x is null'));    // true
 * isChecked('a thrown string');               // false (and not unchecked either)
 * ```
 */

// =============================================================================
// Throwable
// =============================================================================

/**
 * Anything that can be thrown once `null` and `undefined` are ruled out.
 * Causes held by a failure always have this type.
 */
export type Throwable = NonNullable<unknown>;

/**
 * I/O failure as raised by Node's `fs`, `net` and friends.
 */
export type IOError = NodeJS.ErrnoException;

function errorArguments(
  messageOrCause: string | Error | undefined,
  options: ErrorOptions | undefined
): [string | undefined, ErrorOptions | undefined] {
  if (messageOrCause instanceof Error) {
    return [String(messageOrCause), { ...options, cause: messageOrCause }];
  }
  return [messageOrCause, options];
}

// =============================================================================
// Unchecked Errors
// =============================================================================

/**
 * Base class of failures that signal a programming error rather than a
 * recoverable condition. The checked discipline never captures them.
 *
 * Accepts either a message or the error it wraps; in the latter case the
 * message is the wrapped error's string form and `cause` points to it.
 */
export class UncheckedError extends Error {
  constructor(messageOrCause?: string | Error, options?: ErrorOptions) {
    super(...errorArguments(messageOrCause, options));
    this.name = "UncheckedError";
  }
}

/**
 * An operation was invoked at a time the receiver's state does not allow.
 */
export class IllegalStateError extends UncheckedError {
  constructor(messageOrCause?: string | Error, options?: ErrorOptions) {
    super(messageOrCause, options);
    this.name = "IllegalStateError";
  }
}

/**
 * An argument does not satisfy the documented precondition.
 */
export class IllegalArgumentError extends UncheckedError {
  constructor(messageOrCause?: string | Error, options?: ErrorOptions) {
    super(messageOrCause, options);
    this.name = "IllegalArgumentError";
  }
}

/**
 * Something the code considered impossible happened.
 */
export class VerifyError extends UncheckedError {
  constructor(messageOrCause?: string | Error, options?: ErrorOptions) {
    super(messageOrCause, options);
    this.name = "VerifyError";
  }
}

/**
 * Unchecked wrapper around an {@link IOError}.
 *
 * @see IO_UNCHECKER in `tryable/unchecker`, which produces it from `fs` failures.
 */
export class UncheckedIOError extends UncheckedError {
  declare readonly cause: IOError;

  constructor(cause: IOError, message?: string) {
    super(message ?? String(cause), { cause });
    this.name = "UncheckedIOError";
  }
}

/**
 * A value was required but `null` or `undefined` was found: a callback
 * returned nothing where a result was expected, or threw `null`/`undefined`.
 *
 * Extends `TypeError`, so it escapes the checked discipline and is captured
 * by the catch-all discipline.
 */
export class NullValueError extends TypeError {
  constructor(message = "Expected a value, found null or undefined") {
    super(message);
    this.name = "NullValueError";
  }
}

// =============================================================================
// Checked Errors
// =============================================================================

/**
 * A string could not be parsed as a URI reference.
 */
export class URISyntaxError extends Error {
  readonly input: string;
  readonly reason: string;

  constructor(input: string, reason: string) {
    super(`${reason}: ${input}`);
    this.name = "URISyntaxError";
    this.input = input;
    this.reason = reason;
  }
}

// =============================================================================
// Classification
// =============================================================================

const PROGRAMMING_ERRORS = [
  TypeError,
  RangeError,
  ReferenceError,
  SyntaxError,
  EvalError,
  URIError,
] as const;

/**
 * Check if a thrown value is an unchecked failure: an {@link UncheckedError},
 * or one of the built-in errors the runtime raises on programming mistakes.
 */
export function isUnchecked(thrown: unknown): boolean {
  return (
    thrown instanceof UncheckedError ||
    PROGRAMMING_ERRORS.some((type) => thrown instanceof type)
  );
}

/**
 * Check if a thrown value is a checked failure: an `Error` that is not
 * unchecked. Thrown non-errors are neither checked nor unchecked.
 */
export function isChecked(thrown: unknown): thrown is Error {
  return thrown instanceof Error && !isUnchecked(thrown);
}

/**
 * Narrows a checked failure to the type its callback declared.
 *
 * The declaration is taken on trust: a callback typed as raising `X` raises
 * only `X` or unchecked failures.
 */
export function isDeclaredChecked<X extends Error>(thrown: unknown): thrown is X {
  return isChecked(thrown);
}

/**
 * Replaces a thrown `null` or `undefined` by a {@link NullValueError}.
 */
export function toThrowable(thrown: unknown): Throwable {
  if (thrown === null || thrown === undefined) {
    return new NullValueError(`Thrown value was ${String(thrown)}`);
  }
  return thrown;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is an I/O error raised by Node.
 */
export function isIOError(error: unknown): error is IOError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  );
}

/**
 * Check if an error is a NullValueError.
 */
export function isNullValueError(error: unknown): error is NullValueError {
  return error instanceof NullValueError;
}

/**
 * Check if an error is a URISyntaxError.
 */
export function isURISyntaxError(error: unknown): error is URISyntaxError {
  return error instanceof URISyntaxError;
}

/**
 * Union of the error classes defined by this package.
 */
export type TryableError = UncheckedError | NullValueError | URISyntaxError;

/**
 * Check if an error is any TryableError.
 */
export function isTryableError(error: unknown): error is TryableError {
  return (
    error instanceof UncheckedError ||
    error instanceof NullValueError ||
    error instanceof URISyntaxError
  );
}
