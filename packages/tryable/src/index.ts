/**
 * tryable
 *
 * Synchronous outcome types: the success or failure of a computation as a
 * value, with combinators to sequence, merge and recover from failures
 * instead of letting exceptions unwind the stack.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Try, TryVoid, IO_UNCHECKER } from 'tryable';
 *
 * const total = Try.get(() => readFileSync('a.txt', 'utf8'))
 *   .and(Try.get(() => readFileSync('b.txt', 'utf8')), (a, b) => a.length + b.length)
 *   .orMapCause(() => 0);
 *
 * const lines = files.map(IO_UNCHECKER.wrapFunction((f: string) => readFileSync(f, 'utf8')));
 * ```
 *
 * ## Entry Points
 *
 * - `tryable` - everything below
 * - `tryable/try` - Try and TryVoid (checked failures only)
 * - `tryable/try-catch-all` - TryCatchAll and TryCatchAllVoid (any thrown value)
 * - `tryable/throwing` - callback types declaring their failure, and composition
 * - `tryable/unchecker` - rethrowing checked failures as unchecked ones
 * - `tryable/errors` - error classes and the checked/unchecked rule
 * - `tryable/core` - the outcome union and Try classes by discipline
 */

// =============================================================================
// Try Variants
// =============================================================================
export { Try, TryVoid } from "./try";
export { TryCatchAll, TryCatchAllVoid } from "./try-catch-all";
export { ValueTry, VoidTry, type Discipline, CHECKED, CATCH_ALL } from "./core";

// =============================================================================
// Throwing Callbacks
// =============================================================================
export {
  type Declares,
  type Comparable,
  type TSupplier,
  type TRunnable,
  TFunction,
  TConsumer,
  TPredicate,
  TComparator,
  TBiFunction,
  TBiConsumer,
  TBiPredicate,
  TUnaryOperator,
  TBinaryOperator,
} from "./throwing";

// =============================================================================
// Unchecker
// =============================================================================
export { Unchecker, type CauseWrapper, IO_UNCHECKER, URI_UNCHECKER } from "./unchecker";

// =============================================================================
// Errors
// =============================================================================
export {
  type Throwable,
  type IOError,
  type TryableError,
  UncheckedError,
  IllegalStateError,
  IllegalArgumentError,
  VerifyError,
  UncheckedIOError,
  NullValueError,
  URISyntaxError,
  isUnchecked,
  isChecked,
  isIOError,
  isNullValueError,
  isURISyntaxError,
  isTryableError,
} from "./errors";
