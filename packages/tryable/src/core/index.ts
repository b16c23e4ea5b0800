/**
 * The combinator algebra shared by every Try variant.
 *
 * {@link ValueTry} holds a value or a cause, {@link VoidTry} holds nothing or
 * a cause. Both are parameterized by a {@link Discipline} with ceiling `Z`
 * that decides which failures thrown by the callbacks they run are captured.
 * Application code uses them through the `Try`, `TryVoid`, `TryCatchAll` and
 * `TryCatchAllVoid` factories.
 *
 * Two families of combinators:
 * - "and" (`andRun`, `andConsume`, `andApply`, `and`, `andGet`) aborts on the
 *   first failure and keeps it;
 * - "or" (`or`) keeps the first success and only attempts the alternative on
 *   failure.
 *
 * Only primary computations are captured. A failure thrown by a merger or a
 * cause transformation propagates out of the call.
 */

import { NullValueError, type Throwable, toThrowable } from "../errors";
import {
  type Outcome,
  type VoidOutcome,
  VOID_SUCCESS,
  failure,
  fold,
  sameOutcome,
  success,
} from "../outcome";
import type {
  TBiFunction,
  TConsumer,
  TFunction,
  TRunnable,
  TSupplier,
} from "../throwing";
import { type Discipline, attempt, attemptRun } from "./discipline";

export {
  type Discipline,
  CATCH_ALL,
  CHECKED,
  attempt,
  attemptRun,
  captureOrRethrow,
} from "./discipline";

// =============================================================================
// Base
// =============================================================================

/**
 * State and equality common to both shapes.
 */
export abstract class TryBase<
  O extends Outcome<unknown, Throwable> | VoidOutcome<Throwable>,
  Z extends Throwable,
> {
  protected constructor(
    protected readonly discipline: Discipline<Z>,
    protected readonly outcome: O
  ) {
    const state: Outcome<unknown, Throwable> | VoidOutcome<Throwable> = outcome;
    if (state.ok ? "value" in state && state.value == null : state.cause == null) {
      throw new NullValueError("A Try cannot hold null or undefined");
    }
  }

  isSuccess(): boolean {
    return this.outcome.ok;
  }

  isFailure(): boolean {
    return !this.outcome.ok;
  }

  /**
   * Equal when both follow the same discipline and hold equal values or
   * equal causes. Payloads compare with `Object.is`, or their own `equals`
   * method when they have one.
   *
   * A void failure equals a value-bearing failure with the same cause; a void
   * success never equals a value-bearing success.
   */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof TryBase)) return false;
    return (
      other.discipline.name === this.discipline.name &&
      sameOutcome(this.outcome, other.outcome)
    );
  }

  /**
   * Debug form, such as `Try{result=5}` or `TryVoid{cause=Error: boom}`.
   */
  abstract toString(): string;
}

function printable(payload: unknown): string {
  try {
    return String(payload);
  } catch {
    // Objects without a usable toString, such as Object.create(null).
    return Object.prototype.toString.call(payload);
  }
}

function describeCause(label: string, cause: Throwable): string {
  return `${label}{cause=${printable(cause)}}`;
}

// =============================================================================
// Value-bearing Try
// =============================================================================

/**
 * Either a success holding a `T` or a failure holding an `X`, under a
 * discipline with ceiling `Z`.
 */
export class ValueTry<T, X extends Z, Z extends Throwable> extends TryBase<Outcome<T, X>, Z> {
  constructor(discipline: Discipline<Z>, outcome: Outcome<T, X>) {
    super(discipline, outcome);
  }

  static success<T, X extends Z, Z extends Throwable>(
    discipline: Discipline<Z>,
    value: T
  ): ValueTry<NonNullable<T>, X, Z> {
    return new ValueTry<NonNullable<T>, X, Z>(discipline, success(value));
  }

  static failure<T, X extends Z, Z extends Throwable>(
    discipline: Discipline<Z>,
    cause: X
  ): ValueTry<T, X, Z> {
    return new ValueTry<T, X, Z>(discipline, failure(cause));
  }

  /**
   * Invokes `supplier` and captures its result or its failure.
   */
  static get<T, X extends Z, Z extends Throwable>(
    discipline: Discipline<Z>,
    supplier: TSupplier<T, X>
  ): ValueTry<NonNullable<T>, X, Z> {
    return new ValueTry<NonNullable<T>, X, Z>(discipline, attempt<T, X, Z>(discipline, supplier));
  }

  private derive<U, Y extends Z>(outcome: Outcome<U, Y>): ValueTry<U, Y, Z> {
    return new ValueTry<U, Y, Z>(this.discipline, outcome);
  }

  /**
   * The value, or `undefined` on failure.
   */
  result(): T | undefined {
    return this.outcome.ok ? this.outcome.value : undefined;
  }

  /**
   * The cause, or `undefined` on success.
   */
  cause(): X | undefined {
    return this.outcome.ok ? undefined : this.outcome.cause;
  }

  // ===========================================================================
  // Eliminators
  // ===========================================================================

  /**
   * Applies `transformation` to the value or `causeTransformation` to the
   * cause. Exactly one of them is invoked; whatever it throws propagates.
   *
   * @example
   * ```typescript
   * const message = Try.get(() => readFileSync(path, 'utf8')).map(
   *   (text) => `read ${text.length} chars`,
   *   (cause) => `failed: ${cause.message}`
   * );
   * ```
   */
  map<D>(transformation: TFunction<T, D>, causeTransformation: TFunction<X, D>): D {
    return fold(this.outcome, transformation, causeTransformation);
  }

  /**
   * The value, or the cause transformed into a `T`.
   */
  orMapCause(causeTransformation: TFunction<X, T>): T {
    return this.map((value) => value, causeTransformation);
  }

  /**
   * The value; on failure, hands the cause to `consumer` and returns
   * `undefined`.
   */
  orConsumeCause(consumer: TConsumer<X>): T | undefined {
    if (this.outcome.ok) return this.outcome.value;
    consumer(this.outcome.cause);
    return undefined;
  }

  /**
   * The value; on failure, throws the cause, or what `causeTransformation`
   * makes of it.
   */
  orThrow(): T;
  orThrow<Y>(causeTransformation: TFunction<X, Y>): T;
  orThrow<Y>(causeTransformation?: TFunction<X, Y>): T {
    if (this.outcome.ok) return this.outcome.value;
    if (causeTransformation === undefined) throw this.outcome.cause;
    throw toThrowable(causeTransformation(this.outcome.cause));
  }

  // ===========================================================================
  // "and" Family
  // ===========================================================================

  /**
   * On success, runs `runnable`: returns this Try if it completes, a failure
   * if it throws a captured failure. On failure, returns this Try without
   * running anything.
   */
  andRun(runnable: TRunnable<X>): ValueTry<T, X, Z> {
    if (!this.outcome.ok) return this;
    const ran = attemptRun<X, Z>(this.discipline, runnable);
    return ran.ok ? this : this.derive<T, X>(ran);
  }

  /**
   * On success, hands the value to `consumer`, as {@link andRun} does.
   */
  andConsume(consumer: TConsumer<T, X>): ValueTry<T, X, Z> {
    const outcome = this.outcome;
    if (!outcome.ok) return this;
    return this.andRun(() => consumer(outcome.value));
  }

  /**
   * On success, applies `mapper` to the value, capturing its failure. A
   * failure is carried over unchanged.
   *
   * @example
   * ```typescript
   * Try.get(() => 1).andApply((i) => i + 4); // Try{result=5}
   * ```
   */
  andApply<U>(mapper: TFunction<T, U, X>): ValueTry<NonNullable<U>, X, Z> {
    const outcome = this.outcome;
    if (!outcome.ok) return this.derive<NonNullable<U>, X>(outcome);
    return this.derive<NonNullable<U>, X>(
      attempt<U, X, Z>(this.discipline, () => mapper(outcome.value))
    );
  }

  /**
   * Merges this Try with an already computed one. Both successes give the
   * success of `merger`; otherwise the failure is kept, this Try's failure
   * when both failed. `merger` is not captured: what it throws propagates.
   */
  and<U, V>(other: ValueTry<U, X, Z>, merger: TBiFunction<T, U, V>): ValueTry<NonNullable<V>, X, Z> {
    const left = this.outcome;
    const right = other.outcome;
    if (!left.ok) return this.derive<NonNullable<V>, X>(left);
    if (!right.ok) return this.derive<NonNullable<V>, X>(right);
    return this.derive<NonNullable<V>, X>(success(merger(left.value, right.value)));
  }

  // ===========================================================================
  // "or" Family
  // ===========================================================================

  /**
   * On failure, attempts `alternative`. Its success replaces the failure; its
   * failure is merged with the original cause by `exceptionsMerger`, whose
   * own failures propagate. On success, `alternative` is not invoked.
   *
   * @example
   * ```typescript
   * Try.failure(ioError).or(() => 6, (first) => first); // Try{result=6}
   * ```
   */
  or<Y extends Z, W extends Z>(
    alternative: TSupplier<T, Y>,
    exceptionsMerger: TBiFunction<X, Y, W>
  ): ValueTry<T, W, Z> {
    const outcome = this.outcome;
    if (outcome.ok) return this.derive<T, W>(outcome);
    const next = attempt<T, Y, Z>(this.discipline, alternative);
    if (next.ok) return this.derive<T, W>(next);
    return this.derive<T, W>(failure(exceptionsMerger(outcome.cause, next.cause)));
  }

  toString(): string {
    const label = this.discipline.labels.value;
    return this.outcome.ok
      ? `${label}{result=${printable(this.outcome.value)}}`
      : describeCause(label, this.outcome.cause);
  }
}

// =============================================================================
// Void Try
// =============================================================================

/**
 * Either a success holding nothing or a failure holding an `X`, under a
 * discipline with ceiling `Z`.
 */
export class VoidTry<X extends Z, Z extends Throwable> extends TryBase<VoidOutcome<X>, Z> {
  constructor(discipline: Discipline<Z>, outcome: VoidOutcome<X>) {
    super(discipline, outcome);
  }

  static success<X extends Z, Z extends Throwable>(discipline: Discipline<Z>): VoidTry<X, Z> {
    return new VoidTry<X, Z>(discipline, VOID_SUCCESS);
  }

  static failure<X extends Z, Z extends Throwable>(
    discipline: Discipline<Z>,
    cause: X
  ): VoidTry<X, Z> {
    return new VoidTry<X, Z>(discipline, failure(cause));
  }

  /**
   * Runs `runnable` and captures its failure.
   */
  static run<X extends Z, Z extends Throwable>(
    discipline: Discipline<Z>,
    runnable: TRunnable<X>
  ): VoidTry<X, Z> {
    return new VoidTry<X, Z>(discipline, attemptRun<X, Z>(discipline, runnable));
  }

  /**
   * The cause, or `undefined` on success.
   */
  cause(): X | undefined {
    return this.outcome.ok ? undefined : this.outcome.cause;
  }

  /**
   * Invokes `supplier` on success or `causeTransformation` on failure, and
   * returns what it returns.
   */
  map<D>(supplier: TSupplier<D>, causeTransformation: TFunction<X, D>): D {
    return this.outcome.ok ? supplier() : causeTransformation(this.outcome.cause);
  }

  /**
   * Hands the cause to `consumer` on failure.
   */
  ifFailed(consumer: TConsumer<X>): void {
    if (!this.outcome.ok) consumer(this.outcome.cause);
  }

  /**
   * Throws the cause, or what `causeTransformation` makes of it, on failure.
   */
  orThrow(): void;
  orThrow<Y>(causeTransformation: TFunction<X, Y>): void;
  orThrow<Y>(causeTransformation?: TFunction<X, Y>): void {
    if (this.outcome.ok) return;
    if (causeTransformation === undefined) throw this.outcome.cause;
    throw toThrowable(causeTransformation(this.outcome.cause));
  }

  /**
   * On success, invokes `supplier` and captures its result or failure. On
   * failure, carries the cause over to a value-bearing Try without invoking
   * `supplier`.
   */
  andGet<T>(supplier: TSupplier<T, X>): ValueTry<NonNullable<T>, X, Z> {
    const outcome = this.outcome;
    if (!outcome.ok) return new ValueTry<NonNullable<T>, X, Z>(this.discipline, outcome);
    return ValueTry.get<T, X, Z>(this.discipline, supplier);
  }

  /**
   * On success, runs `runnable` and captures its failure. On failure, returns
   * this Try without running anything.
   */
  andRun(runnable: TRunnable<X>): VoidTry<X, Z> {
    if (!this.outcome.ok) return this;
    return VoidTry.run<X, Z>(this.discipline, runnable);
  }

  /**
   * On failure, runs `runnable`. Without a merger the original cause is
   * dropped and the outcome of `runnable` is returned; with one, a second
   * failure is merged with the first as the value-bearing `or` does. On
   * success, `runnable` is not invoked.
   */
  or<Y extends Z>(runnable: TRunnable<Y>): VoidTry<Y, Z>;
  or<Y extends Z, W extends Z>(
    runnable: TRunnable<Y>,
    exceptionsMerger: TBiFunction<X, Y, W>
  ): VoidTry<W, Z>;
  or<Y extends Z, W extends Z>(
    runnable: TRunnable<Y>,
    exceptionsMerger?: TBiFunction<X, Y, W>
  ): VoidTry<Y, Z> | VoidTry<W, Z> {
    const outcome = this.outcome;
    if (outcome.ok) return VoidTry.success<Y, Z>(this.discipline);
    const next = attemptRun<Y, Z>(this.discipline, runnable);
    if (next.ok || exceptionsMerger === undefined) {
      return new VoidTry<Y, Z>(this.discipline, next);
    }
    return VoidTry.failure<W, Z>(this.discipline, exceptionsMerger(outcome.cause, next.cause));
  }

  toString(): string {
    const label = this.discipline.labels.void;
    return this.outcome.ok ? `${label}{success}` : describeCause(label, this.outcome.cause);
  }
}
