/**
 * Catching disciplines: which thrown values a Try captures as a failure and
 * which it lets escape.
 */

import {
  NullValueError,
  type Throwable,
  isDeclaredChecked,
  toThrowable,
} from "../errors";
import type { Outcome, VoidOutcome } from "../outcome";
import type { TRunnable, TSupplier } from "../throwing";

/**
 * A catching discipline with ceiling `Z`: the widest failure type a Try
 * following it may hold.
 */
export interface Discipline<Z extends Throwable> {
  readonly name: "checked" | "catch-all";
  /** Names used by `toString()` for value-bearing and void Trys. */
  readonly labels: { readonly value: string; readonly void: string };
  /**
   * Whether `thrown` is captured. A callback declared to raise `X` is trusted
   * to raise only `X` among the captured failures, hence the narrowing.
   */
  captures<X extends Z>(thrown: Throwable): thrown is X;
}

/**
 * Captures checked failures; unchecked failures and thrown non-errors escape.
 */
export const CHECKED: Discipline<Error> = {
  name: "checked",
  labels: { value: "Try", void: "TryVoid" },
  captures<X extends Error>(thrown: Throwable): thrown is X {
    return isDeclaredChecked<X>(thrown);
  },
};

/**
 * Captures everything.
 */
export const CATCH_ALL: Discipline<Throwable> = {
  name: "catch-all",
  labels: { value: "TryCatchAll", void: "TryCatchAllVoid" },
  captures<X extends Throwable>(_thrown: Throwable): _thrown is X {
    return true;
  },
};

/**
 * Returns `thrown` as a cause if the discipline captures it, rethrows it
 * otherwise. A thrown `null` or `undefined` is first replaced by a
 * {@link NullValueError}.
 */
export function captureOrRethrow<X extends Z, Z extends Throwable>(
  discipline: Discipline<Z>,
  thrown: unknown
): X {
  const normalized = toThrowable(thrown);
  if (discipline.captures<X>(normalized)) {
    return normalized;
  }
  throw normalized;
}

/**
 * Invokes `supplier` under `discipline`. A `null` or `undefined` result counts
 * as a thrown {@link NullValueError}.
 */
export function attempt<T, X extends Z, Z extends Throwable>(
  discipline: Discipline<Z>,
  supplier: TSupplier<T, X>
): Outcome<NonNullable<T>, X> {
  let value: T;
  try {
    value = supplier();
  } catch (thrown) {
    return { ok: false, cause: captureOrRethrow<X, Z>(discipline, thrown) };
  }
  if (value === null || value === undefined) {
    const cause = new NullValueError(`Supplier returned ${String(value)}`);
    return { ok: false, cause: captureOrRethrow<X, Z>(discipline, cause) };
  }
  return { ok: true, value };
}

/**
 * Runs `runnable` under `discipline`.
 */
export function attemptRun<X extends Z, Z extends Throwable>(
  discipline: Discipline<Z>,
  runnable: TRunnable<X>
): VoidOutcome<X> {
  try {
    runnable();
    return { ok: true };
  } catch (thrown) {
    return { ok: false, cause: captureOrRethrow<X, Z>(discipline, thrown) };
  }
}
