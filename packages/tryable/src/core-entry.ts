/**
 * tryable/core
 *
 * The outcome union and the Try classes parameterized by their catching
 * discipline. Use this to build a Try variant with its own factories; the
 * `Try`, `TryVoid`, `TryCatchAll` and `TryCatchAllVoid` factories cover the
 * usual cases.
 *
 * @example
 * ```typescript
 * import { CHECKED, ValueTry } from 'tryable/core';
 *
 * const parsed = ValueTry.get(CHECKED, () => loadSettings());
 * ```
 */

// =============================================================================
// Outcome Union
// =============================================================================
export {
  type Success,
  type Failure,
  type Outcome,
  type VoidSuccess,
  type VoidOutcome,
  type Equatable,
  success,
  failure,
  fold,
  isEquatable,
  payloadsEqual,
  sameOutcome,
  VOID_SUCCESS,
} from "./outcome";

// =============================================================================
// Disciplines and Try Classes
// =============================================================================
export {
  type Discipline,
  CHECKED,
  CATCH_ALL,
  attempt,
  attemptRun,
  captureOrRethrow,
  TryBase,
  ValueTry,
  VoidTry,
} from "./core";
