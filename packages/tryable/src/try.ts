/**
 * tryable/try
 *
 * Try and TryVoid: outcomes that capture checked failures only. Unchecked
 * failures thrown by their callbacks (`TypeError`, `IllegalStateError` and the
 * like) escape, since they signal bugs rather than recoverable conditions.
 *
 * @example
 * ```typescript
 * import { readFileSync } from 'node:fs';
 * import { Try, TryVoid } from 'tryable/try';
 *
 * const config = Try.get(() => readFileSync('app.json', 'utf8'))
 *   .andApply((text) => parseConfig(text))
 *   .orMapCause(() => DEFAULT_CONFIG);
 *
 * TryVoid.run(() => unlinkSync(lockFile)).ifFailed((cause) => report(cause));
 * ```
 */

import { CHECKED, ValueTry, VoidTry } from "./core";
import type { TRunnable, TSupplier } from "./throwing";

/**
 * A success holding a `T` or a failure holding a checked `X`.
 */
export type Try<T, X extends Error = Error> = ValueTry<T, X, Error>;

/**
 * A success or a failure holding a checked `X`.
 */
export type TryVoid<X extends Error = Error> = VoidTry<X, Error>;

export const Try = {
  /**
   * A success holding `value`. Throws NullValueError on `null` or `undefined`.
   */
  success<T, X extends Error = Error>(value: T): Try<NonNullable<T>, X> {
    return ValueTry.success<T, X, Error>(CHECKED, value);
  },

  /**
   * A failure holding `cause`.
   */
  failure<T, X extends Error = Error>(cause: X): Try<T, X> {
    return ValueTry.failure<T, X, Error>(CHECKED, cause);
  },

  /**
   * Invokes `supplier`: a success with its result, or a failure with the
   * checked failure it throws. A `null` or `undefined` result throws a
   * NullValueError.
   */
  get<T, X extends Error = Error>(supplier: TSupplier<T, X>): Try<NonNullable<T>, X> {
    return ValueTry.get<T, X, Error>(CHECKED, supplier);
  },
};

export const TryVoid = {
  success<X extends Error = Error>(): TryVoid<X> {
    return VoidTry.success<X, Error>(CHECKED);
  },

  failure<X extends Error = Error>(cause: X): TryVoid<X> {
    return VoidTry.failure<X, Error>(CHECKED, cause);
  },

  /**
   * Runs `runnable`: a success if it completes, a failure with the checked
   * failure it throws.
   */
  run<X extends Error = Error>(runnable: TRunnable<X>): TryVoid<X> {
    return VoidTry.run<X, Error>(CHECKED, runnable);
  },
};
