/**
 * tryable/outcome (internal)
 *
 * The tagged union underneath every Try variant, and the payload equality
 * shared by the variants. Kept free of the Try classes so that the throwing
 * types and the disciplines can depend on it.
 */

import { NullValueError } from "./errors";

// =============================================================================
// Outcome Types
// =============================================================================

/**
 * A computation that produced a value.
 */
export type Success<T> = { readonly ok: true; readonly value: T };

/**
 * A computation that failed with a cause.
 */
export type Failure<X> = { readonly ok: false; readonly cause: X };

/**
 * Exactly one of a success holding a `T` or a failure holding an `X`.
 */
export type Outcome<T, X> = Success<T> | Failure<X>;

/**
 * A computation run for its side effects that completed normally.
 */
export type VoidSuccess = { readonly ok: true };

/**
 * A computation run for its side effects: completed, or failed with `X`.
 */
export type VoidOutcome<X> = VoidSuccess | Failure<X>;

// =============================================================================
// Constructors
// =============================================================================

function requireValue<T>(payload: T, kind: "value" | "cause"): NonNullable<T> {
  if (payload === null || payload === undefined) {
    throw new NullValueError(`A ${kind} must not be ${String(payload)}`);
  }
  return payload;
}

/**
 * Creates a success. Throws {@link NullValueError} on `null` or `undefined`.
 */
export const success = <T>(value: T): Success<NonNullable<T>> => ({
  ok: true,
  value: requireValue(value, "value"),
});

/**
 * Creates a failure. Throws {@link NullValueError} on `null` or `undefined`.
 */
export const failure = <X>(cause: X): Failure<NonNullable<X>> => ({
  ok: false,
  cause: requireValue(cause, "cause"),
});

/**
 * The one void success.
 */
export const VOID_SUCCESS: VoidSuccess = Object.freeze({ ok: true });

// =============================================================================
// Elimination
// =============================================================================

/**
 * Applies `onSuccess` to the value or `onFailure` to the cause, whichever is
 * held.
 */
export function fold<T, X, R>(
  outcome: Outcome<T, X>,
  onSuccess: (value: T) => R,
  onFailure: (cause: X) => R
): R {
  return outcome.ok ? onSuccess(outcome.value) : onFailure(outcome.cause);
}

// =============================================================================
// Equality
// =============================================================================

/**
 * A value that defines its own equality.
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * Checks if a value has an `equals(other)` method.
 */
export const isEquatable = (value: unknown): value is Equatable =>
  typeof value === "object" &&
  value !== null &&
  "equals" in value &&
  typeof value.equals === "function";

/**
 * `Object.is`, or `a.equals(b)` when `a` provides it.
 */
export function payloadsEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  return isEquatable(a) ? a.equals(b) : false;
}

/**
 * Structural equality of two outcomes, void or not.
 *
 * Failures are equal when their causes are; successes when both carry values
 * and the values are equal, or when both are void.
 */
export function sameOutcome(
  a: Outcome<unknown, unknown> | VoidOutcome<unknown>,
  b: Outcome<unknown, unknown> | VoidOutcome<unknown>
): boolean {
  if (!a.ok || !b.ok) {
    return !a.ok && !b.ok && payloadsEqual(a.cause, b.cause);
  }
  if ("value" in a && "value" in b) return payloadsEqual(a.value, b.value);
  return !("value" in a) && !("value" in b);
}
