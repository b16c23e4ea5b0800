/**
 * tryable/throwing
 *
 * Callback types that declare the failure type they may throw, and the usual
 * composition operators over them.
 *
 * TypeScript has no throws clause, so the declared failure type `X` rides
 * along as a phantom member of the callable. Any arrow function is assignable
 * to these types; a callback explicitly typed as raising `X` keeps that
 * declaration through composition, where the declared failure types of the
 * parts are joined into a union.
 *
 * @example
 * ```typescript
 * import { TFunction, type TSupplier } from 'tryable/throwing';
 *
 * const readConfig: TSupplier<string, IOError> = () => readFileSync('app.json', 'utf8');
 * const parse: TFunction<string, Config, ConfigError> = (text) => toConfig(JSON.parse(text));
 *
 * // TFunction<void, Config, IOError | ConfigError>
 * const load = TFunction.andThen(() => readConfig(), parse);
 * ```
 */

import type { Throwable } from "../errors";
import { payloadsEqual } from "../outcome";

declare const declaredFailure: unique symbol;

/**
 * Phantom member recording the failure type a callback declares.
 * Never present at run time.
 */
export interface Declares<X> {
  readonly [declaredFailure]?: X;
}

// =============================================================================
// Callback Types
// =============================================================================

/** Supplies a result, or throws `X`. */
export interface TSupplier<T, X = Throwable> extends Declares<X> {
  (): T;
}

/** Runs for its side effects, or throws `X`. */
export interface TRunnable<X = Throwable> extends Declares<X> {
  (): void;
}

/** Maps a `T` to an `R`, or throws `X`. */
export interface TFunction<T, R, X = Throwable> extends Declares<X> {
  (arg: T): R;
}

/** Consumes a `T`, or throws `X`. */
export interface TConsumer<T, X = Throwable> extends Declares<X> {
  (arg: T): void;
}

/** Tests a `T`, or throws `X`. */
export interface TPredicate<T, X = Throwable> extends Declares<X> {
  (arg: T): boolean;
}

/**
 * Orders two `T`s (negative, zero or positive, as `Array.prototype.sort`
 * expects), or throws `X`.
 */
export interface TComparator<T, X = Throwable> extends Declares<X> {
  (first: T, second: T): number;
}

/** Maps a `T` and a `U` to an `R`, or throws `X`. */
export interface TBiFunction<T, U, R, X = Throwable> extends Declares<X> {
  (first: T, second: U): R;
}

/** Consumes a `T` and a `U`, or throws `X`. */
export interface TBiConsumer<T, U, X = Throwable> extends Declares<X> {
  (first: T, second: U): void;
}

/** Tests a `T` and a `U`, or throws `X`. */
export interface TBiPredicate<T, U, X = Throwable> extends Declares<X> {
  (first: T, second: U): boolean;
}

/** Maps a `T` to another `T`, or throws `X`. */
export interface TUnaryOperator<T, X = Throwable> extends TFunction<T, T, X> {}

/** Combines two `T`s into a `T`, or throws `X`. */
export interface TBinaryOperator<T, X = Throwable> extends TBiFunction<T, T, T, X> {}

// =============================================================================
// Functions
// =============================================================================

/**
 * Composition operators for {@link TFunction}.
 */
export const TFunction = {
  /**
   * A function that returns its argument.
   */
  identity<T>(): TFunction<T, T, never> {
    return (arg) => arg;
  },

  /**
   * Applies `first`, then `then` to its result.
   *
   * @example
   * ```typescript
   * const length = TFunction.andThen((s: string) => s.trim(), (s) => s.length);
   * length('  ab '); // 2
   * ```
   */
  andThen<T, R, V, X, Y>(
    first: TFunction<T, R, X>,
    then: TFunction<R, V, Y>
  ): TFunction<T, V, X | Y> {
    return (arg) => then(first(arg));
  },

  /**
   * Applies `before`, then `fn` to its result (right-to-left).
   */
  compose<T, R, V, X, Y>(
    fn: TFunction<R, V, Y>,
    before: TFunction<T, R, X>
  ): TFunction<T, V, X | Y> {
    return (arg) => fn(before(arg));
  },
};

/**
 * Composition operators for {@link TBiFunction}.
 */
export const TBiFunction = {
  /**
   * Applies `first`, then `then` to its result.
   */
  andThen<T, U, R, V, X, Y>(
    first: TBiFunction<T, U, R, X>,
    then: TFunction<R, V, Y>
  ): TBiFunction<T, U, V, X | Y> {
    return (a, b) => then(first(a, b));
  },
};

/**
 * Composition operators for {@link TUnaryOperator}.
 */
export const TUnaryOperator = {
  identity<T>(): TUnaryOperator<T, never> {
    return (arg) => arg;
  },
};

// =============================================================================
// Consumers
// =============================================================================

/**
 * Composition operators for {@link TConsumer}.
 */
export const TConsumer = {
  /**
   * Feeds the argument to `first`, then to `then`. If `first` throws,
   * `then` is not invoked.
   */
  andThen<T, X, Y>(first: TConsumer<T, X>, then: TConsumer<T, Y>): TConsumer<T, X | Y> {
    return (arg) => {
      first(arg);
      then(arg);
    };
  },
};

/**
 * Composition operators for {@link TBiConsumer}.
 */
export const TBiConsumer = {
  andThen<T, U, X, Y>(
    first: TBiConsumer<T, U, X>,
    then: TBiConsumer<T, U, Y>
  ): TBiConsumer<T, U, X | Y> {
    return (a, b) => {
      first(a, b);
      then(a, b);
    };
  },
};

// =============================================================================
// Predicates
// =============================================================================

/**
 * Logical operators for {@link TPredicate}. `and` and `or` short-circuit:
 * the second predicate is not evaluated when the first decides.
 */
export const TPredicate = {
  and<T, X, Y>(first: TPredicate<T, X>, other: TPredicate<T, Y>): TPredicate<T, X | Y> {
    return (arg) => first(arg) && other(arg);
  },

  or<T, X, Y>(first: TPredicate<T, X>, other: TPredicate<T, Y>): TPredicate<T, X | Y> {
    return (arg) => first(arg) || other(arg);
  },

  negate<T, X>(predicate: TPredicate<T, X>): TPredicate<T, X> {
    return (arg) => !predicate(arg);
  },

  /**
   * Same as {@link TPredicate.negate}, reads better at call sites:
   * `values.filter(TPredicate.not(isEmpty))`.
   */
  not<T, X>(predicate: TPredicate<T, X>): TPredicate<T, X> {
    return (arg) => !predicate(arg);
  },

  /**
   * Tests whether its argument is equal to `target`, by `Object.is` or by
   * `target.equals` when `target` provides one.
   */
  isEqual<T>(target: T): TPredicate<T, never> {
    return (arg) => payloadsEqual(target, arg);
  },
};

/**
 * Logical operators for {@link TBiPredicate}.
 */
export const TBiPredicate = {
  and<T, U, X, Y>(
    first: TBiPredicate<T, U, X>,
    other: TBiPredicate<T, U, Y>
  ): TBiPredicate<T, U, X | Y> {
    return (a, b) => first(a, b) && other(a, b);
  },

  or<T, U, X, Y>(
    first: TBiPredicate<T, U, X>,
    other: TBiPredicate<T, U, Y>
  ): TBiPredicate<T, U, X | Y> {
    return (a, b) => first(a, b) || other(a, b);
  },

  negate<T, U, X>(predicate: TBiPredicate<T, U, X>): TBiPredicate<T, U, X> {
    return (a, b) => !predicate(a, b);
  },
};

// =============================================================================
// Comparators
// =============================================================================

/** Values with a natural order under `<` and `>`. */
export type Comparable = string | number | bigint;

function naturalOrder<T extends Comparable>(): TComparator<T, never> {
  return (a, b) => (a < b ? -1 : a > b ? 1 : 0);
}

function comparing<T, K extends Comparable, X>(
  keyExtractor: TFunction<T, K, X>
): TComparator<T, X>;
function comparing<T, K, X, Y>(
  keyExtractor: TFunction<T, K, X>,
  keyComparator: TComparator<K, Y>
): TComparator<T, X | Y>;
function comparing<T, K, X, Y>(
  keyExtractor: TFunction<T, K, X>,
  keyComparator?: TComparator<K, Y>
): TComparator<T, X | Y> {
  if (keyComparator === undefined) {
    return (a, b) => compareNaturally(keyExtractor(a), keyExtractor(b));
  }
  return (a, b) => keyComparator(keyExtractor(a), keyExtractor(b));
}

function compareNaturally(a: unknown, b: unknown): number {
  if (isComparable(a) && isComparable(b) && typeof a === typeof b) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeError(`Cannot compare ${typeof a} with ${typeof b}`);
}

function isComparable(value: unknown): value is Comparable {
  return typeof value === "string" || typeof value === "number" || typeof value === "bigint";
}

/**
 * Factories and operators for {@link TComparator}.
 *
 * @example
 * ```typescript
 * const byAgeThenName = TComparator.thenComparing(
 *   TComparator.comparing((p: Person) => p.age),
 *   TComparator.comparing((p: Person) => p.name)
 * );
 * people.sort(TComparator.reversed(byAgeThenName));
 * ```
 */
export const TComparator = {
  naturalOrder,
  comparing,

  /**
   * The opposite order.
   */
  reversed<T, X>(comparator: TComparator<T, X>): TComparator<T, X> {
    return (a, b) => comparator(b, a);
  },

  /**
   * Orders by `first`; ties are broken by `other`, which is only invoked on
   * ties.
   */
  thenComparing<T, X, Y>(
    first: TComparator<T, X>,
    other: TComparator<T, Y>
  ): TComparator<T, X | Y> {
    return (a, b) => {
      const result = first(a, b);
      return result !== 0 ? result : other(a, b);
    };
  },
};

/**
 * Factories for {@link TBinaryOperator}.
 */
export const TBinaryOperator = {
  /**
   * Returns the lesser of its arguments, the first one on ties.
   */
  minBy<T, X>(comparator: TComparator<T, X>): TBinaryOperator<T, X> {
    return (a, b) => (comparator(a, b) <= 0 ? a : b);
  },

  /**
   * Returns the greater of its arguments, the first one on ties.
   */
  maxBy<T, X>(comparator: TComparator<T, X>): TBinaryOperator<T, X> {
    return (a, b) => (comparator(a, b) >= 0 ? a : b);
  },
};
