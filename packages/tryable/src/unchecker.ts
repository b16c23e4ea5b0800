/**
 * tryable/unchecker
 *
 * Turns callbacks that raise a declared checked failure into callbacks that
 * only raise unchecked ones, so they can be handed to code that does not
 * expect recoverable failures (array methods, sort comparators, event
 * handlers).
 *
 * @example
 * ```typescript
 * import { readFileSync } from 'node:fs';
 * import { IO_UNCHECKER } from 'tryable/unchecker';
 *
 * const contents = paths.map(
 *   IO_UNCHECKER.wrapFunction((path: string) => readFileSync(path, 'utf8'))
 * );
 * // An ENOENT now surfaces as an UncheckedIOError.
 * ```
 */

import {
  type IOError,
  type URISyntaxError,
  type UncheckedError,
  UncheckedIOError,
  VerifyError,
  isDeclaredChecked,
} from "./errors";
import type {
  TBiConsumer,
  TBiFunction,
  TBinaryOperator,
  TComparator,
  TConsumer,
  TFunction,
  TPredicate,
  TRunnable,
  TSupplier,
} from "./throwing";

/**
 * Converts a checked failure of type `EF` to an unchecked failure `ET`.
 */
export type CauseWrapper<EF extends Error, ET extends UncheckedError> = (cause: EF) => ET;

/**
 * Runs or wraps callbacks declared to raise `EF`, rethrowing any `EF` they
 * raise as the `ET` produced by the wrapper. Unchecked failures, and thrown
 * values that are not errors at all, pass through unchanged.
 *
 * A callback given to an Unchecker must raise only `EF` or unchecked
 * failures; any other checked failure is handed to the wrapper as if it
 * were an `EF`.
 */
export class Unchecker<EF extends Error, ET extends UncheckedError> {
  private constructor(private readonly wrapper: CauseWrapper<EF, ET>) {}

  /**
   * An Unchecker that rethrows checked failures through `wrapper`.
   *
   * @example
   * ```typescript
   * const unchecker = Unchecker.wrappingWith((cause: Error) => new IllegalStateError(cause));
   * unchecker.call(() => { throw new Error('stale'); }); // throws IllegalStateError
   * ```
   */
  static wrappingWith<EF extends Error, ET extends UncheckedError>(
    wrapper: CauseWrapper<EF, ET>
  ): Unchecker<EF, ET> {
    return new Unchecker(wrapper);
  }

  /**
   * An Unchecker for failures that cannot happen: any checked failure
   * becomes a {@link VerifyError} wrapping it.
   */
  static convertingToVerifyError<EF extends Error = Error>(): Unchecker<EF, VerifyError> {
    return new Unchecker((cause: EF) => new VerifyError(cause));
  }

  // ===========================================================================
  // Immediate Execution
  // ===========================================================================

  /**
   * Runs `runnable` now.
   */
  call(runnable: TRunnable<EF>): void {
    this.getUsing(runnable);
  }

  /**
   * Invokes `supplier` now and returns its result.
   */
  getUsing<T>(supplier: TSupplier<T, EF>): T {
    try {
      return supplier();
    } catch (thrown) {
      if (isDeclaredChecked<EF>(thrown)) {
        throw this.wrapper(thrown);
      }
      throw thrown;
    }
  }

  // ===========================================================================
  // Wrapping
  // ===========================================================================

  wrapRunnable(runnable: TRunnable<EF>): () => void {
    return () => this.call(runnable);
  }

  wrapSupplier<T>(supplier: TSupplier<T, EF>): () => T {
    return () => this.getUsing(supplier);
  }

  wrapFunction<T, R>(fn: TFunction<T, R, EF>): (arg: T) => R {
    return (arg) => this.getUsing(() => fn(arg));
  }

  wrapPredicate<T>(predicate: TPredicate<T, EF>): (arg: T) => boolean {
    return (arg) => this.getUsing(() => predicate(arg));
  }

  wrapConsumer<T>(consumer: TConsumer<T, EF>): (arg: T) => void {
    return (arg) => this.call(() => consumer(arg));
  }

  wrapBiConsumer<T, U>(consumer: TBiConsumer<T, U, EF>): (first: T, second: U) => void {
    return (first, second) => this.call(() => consumer(first, second));
  }

  wrapBiFunction<T, U, R>(fn: TBiFunction<T, U, R, EF>): (first: T, second: U) => R {
    return (first, second) => this.getUsing(() => fn(first, second));
  }

  wrapBinaryOperator<T>(operator: TBinaryOperator<T, EF>): (first: T, second: T) => T {
    return (first, second) => this.getUsing(() => operator(first, second));
  }

  /**
   * Wraps a comparator for use with `Array.prototype.sort`.
   */
  wrapComparator<T>(comparator: TComparator<T, EF>): (first: T, second: T) => number {
    return (first, second) => this.getUsing(() => comparator(first, second));
  }
}

// =============================================================================
// Instances
// =============================================================================

/**
 * Rethrows Node I/O errors as {@link UncheckedIOError}.
 */
export const IO_UNCHECKER: Unchecker<IOError, UncheckedIOError> = Unchecker.wrappingWith(
  (cause: IOError) => new UncheckedIOError(cause)
);

/**
 * Rethrows {@link URISyntaxError} as {@link VerifyError}, for URIs known to
 * be well formed.
 */
export const URI_UNCHECKER: Unchecker<URISyntaxError, VerifyError> = Unchecker.wrappingWith(
  (cause: URISyntaxError) => new VerifyError(cause)
);
