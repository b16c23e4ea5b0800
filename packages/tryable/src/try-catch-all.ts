/**
 * tryable/try-catch-all
 *
 * TryCatchAll and TryCatchAllVoid: outcomes that capture anything their
 * callbacks throw, programming errors and thrown non-errors included. Meant
 * for boundaries where nothing may escape, such as a request handler or a
 * plugin host.
 *
 * @example
 * ```typescript
 * import { TryCatchAll } from 'tryable/try-catch-all';
 *
 * const parsed = TryCatchAll.get(() => JSON.parse(body));
 * if (parsed.isFailure()) {
 *   return badRequest(String(parsed.cause()));
 * }
 * ```
 */

import type { Throwable } from "./errors";
import { CATCH_ALL, ValueTry, VoidTry } from "./core";
import type { TRunnable, TSupplier } from "./throwing";

/**
 * A success holding a `T` or a failure holding any thrown value.
 */
export type TryCatchAll<T> = ValueTry<T, Throwable, Throwable>;

/**
 * A success or a failure holding any thrown value.
 */
export type TryCatchAllVoid = VoidTry<Throwable, Throwable>;

export const TryCatchAll = {
  success<T>(value: T): TryCatchAll<NonNullable<T>> {
    return ValueTry.success<T, Throwable, Throwable>(CATCH_ALL, value);
  },

  failure<T>(cause: Throwable): TryCatchAll<T> {
    return ValueTry.failure<T, Throwable, Throwable>(CATCH_ALL, cause);
  },

  /**
   * Invokes `supplier` and captures whatever it throws. A `null` or
   * `undefined` result becomes a failure holding a NullValueError.
   */
  get<T>(supplier: TSupplier<T>): TryCatchAll<NonNullable<T>> {
    return ValueTry.get<T, Throwable, Throwable>(CATCH_ALL, supplier);
  },
};

export const TryCatchAllVoid = {
  success(): TryCatchAllVoid {
    return VoidTry.success<Throwable, Throwable>(CATCH_ALL);
  },

  failure(cause: Throwable): TryCatchAllVoid {
    return VoidTry.failure<Throwable, Throwable>(CATCH_ALL, cause);
  },

  run(runnable: TRunnable): TryCatchAllVoid {
    return VoidTry.run<Throwable, Throwable>(CATCH_ALL, runnable);
  },
};
