/**
 * Tests for errors.ts - error classes and the checked/unchecked rule
 */
import { describe, it, expect } from "vitest";
import {
  UncheckedError,
  IllegalStateError,
  IllegalArgumentError,
  VerifyError,
  UncheckedIOError,
  NullValueError,
  URISyntaxError,
  isUnchecked,
  isChecked,
  isDeclaredChecked,
  toThrowable,
  isIOError,
  isNullValueError,
  isURISyntaxError,
  isTryableError,
  type IOError,
} from "./errors";

function ioError(code: string, message: string): IOError {
  return Object.assign(new Error(message), { code });
}

describe("Error classes", () => {
  describe("UncheckedError", () => {
    it("creates error with message", () => {
      const error = new UncheckedError("broken invariant");
      expect(error.name).toBe("UncheckedError");
      expect(error.message).toBe("broken invariant");
      expect(error.cause).toBeUndefined();
      expect(error instanceof Error).toBe(true);
    });

    it("wraps a cause, taking its string form as message", () => {
      const cause = new Error("stale handle");
      const error = new UncheckedError(cause);
      expect(error.message).toBe("Error: stale handle");
      expect(error.cause).toBe(cause);
    });

    it("creates error without message", () => {
      expect(new UncheckedError().message).toBe("");
    });
  });

  describe("subclasses", () => {
    it("set their own names", () => {
      expect(new IllegalStateError("x").name).toBe("IllegalStateError");
      expect(new IllegalArgumentError("x").name).toBe("IllegalArgumentError");
      expect(new VerifyError("x").name).toBe("VerifyError");
    });

    it("are unchecked errors", () => {
      expect(new IllegalStateError("x") instanceof UncheckedError).toBe(true);
      expect(new IllegalArgumentError("x") instanceof UncheckedError).toBe(true);
      expect(new VerifyError("x") instanceof UncheckedError).toBe(true);
    });

    it("accept a message and a cause", () => {
      const cause = new Error("root");
      const error = new IllegalStateError("wrapped", { cause });
      expect(error.message).toBe("wrapped");
      expect(error.cause).toBe(cause);
    });
  });

  describe("UncheckedIOError", () => {
    it("wraps an I/O error", () => {
      const cause = ioError("ENOENT", "no such file");
      const error = new UncheckedIOError(cause);
      expect(error.name).toBe("UncheckedIOError");
      expect(error.message).toBe("Error: no such file");
      expect(error.cause).toBe(cause);
      expect(error.cause.code).toBe("ENOENT");
    });

    it("accepts an explicit message", () => {
      const error = new UncheckedIOError(ioError("EACCES", "denied"), "cannot read settings");
      expect(error.message).toBe("cannot read settings");
    });
  });

  describe("NullValueError", () => {
    it("has a default message", () => {
      const error = new NullValueError();
      expect(error.name).toBe("NullValueError");
      expect(error.message).toBe("Expected a value, found null or undefined");
    });

    it("is a TypeError", () => {
      expect(new NullValueError() instanceof TypeError).toBe(true);
    });
  });

  describe("URISyntaxError", () => {
    it("keeps input and reason", () => {
      const error = new URISyntaxError("ht tp://host", "Illegal character in scheme");
      expect(error.name).toBe("URISyntaxError");
      expect(error.input).toBe("ht tp://host");
      expect(error.reason).toBe("Illegal character in scheme");
      expect(error.message).toBe("Illegal character in scheme: ht tp://host");
    });
  });
});

describe("Classification", () => {
  it("treats plain errors as checked", () => {
    expect(isChecked(new Error("disk full"))).toBe(true);
    expect(isUnchecked(new Error("disk full"))).toBe(false);
  });

  it("treats I/O and URI syntax errors as checked", () => {
    expect(isChecked(ioError("ENOENT", "missing"))).toBe(true);
    expect(isChecked(new URISyntaxError("::", "Expected scheme name"))).toBe(true);
  });

  it("treats UncheckedError and its subclasses as unchecked", () => {
    expect(isUnchecked(new UncheckedError("x"))).toBe(true);
    expect(isUnchecked(new IllegalStateError("x"))).toBe(true);
    expect(isUnchecked(new UncheckedIOError(ioError("EIO", "x")))).toBe(true);
    expect(isChecked(new IllegalStateError("x"))).toBe(false);
  });

  it("treats built-in programming errors as unchecked", () => {
    expect(isUnchecked(new TypeError("x"))).toBe(true);
    expect(isUnchecked(new RangeError("x"))).toBe(true);
    expect(isUnchecked(new ReferenceError("x"))).toBe(true);
    expect(isUnchecked(new SyntaxError("x"))).toBe(true);
    expect(isUnchecked(new EvalError("x"))).toBe(true);
    expect(isUnchecked(new URIError("x"))).toBe(true);
    expect(isUnchecked(new NullValueError())).toBe(true);
  });

  it("treats subclasses of checked errors as checked", () => {
    class QueryError extends Error {}
    expect(isChecked(new QueryError("timeout"))).toBe(true);
  });

  it("treats thrown non-errors as neither", () => {
    for (const thrown of ["text", 42, { code: "E" }, Symbol("s")]) {
      expect(isChecked(thrown)).toBe(false);
      expect(isUnchecked(thrown)).toBe(false);
    }
  });

  it("isDeclaredChecked follows isChecked", () => {
    expect(isDeclaredChecked<Error>(new Error("x"))).toBe(true);
    expect(isDeclaredChecked<Error>(new TypeError("x"))).toBe(false);
    expect(isDeclaredChecked<Error>("x")).toBe(false);
  });
});

describe("toThrowable", () => {
  it("replaces null and undefined", () => {
    const fromUndefined = toThrowable(undefined);
    const fromNull = toThrowable(null);
    expect(fromUndefined).toBeInstanceOf(NullValueError);
    expect(fromNull).toBeInstanceOf(NullValueError);
    expect(isNullValueError(fromUndefined) && fromUndefined.message).toBe(
      "Thrown value was undefined"
    );
    expect(isNullValueError(fromNull) && fromNull.message).toBe("Thrown value was null");
  });

  it("keeps other values", () => {
    const error = new Error("x");
    expect(toThrowable(error)).toBe(error);
    expect(toThrowable("text")).toBe("text");
    expect(toThrowable(0)).toBe(0);
  });
});

describe("Type Guards", () => {
  it("isIOError recognizes errors with a code", () => {
    expect(isIOError(ioError("ENOENT", "missing"))).toBe(true);
    expect(isIOError(new Error("x"))).toBe(false);
    expect(isIOError({ code: "ENOENT" })).toBe(false);
  });

  it("isURISyntaxError", () => {
    expect(isURISyntaxError(new URISyntaxError("a b", "Illegal character"))).toBe(true);
    expect(isURISyntaxError(new Error("x"))).toBe(false);
  });

  it("isTryableError covers the package's classes only", () => {
    expect(isTryableError(new VerifyError("x"))).toBe(true);
    expect(isTryableError(new NullValueError())).toBe(true);
    expect(isTryableError(new URISyntaxError("a b", "Illegal character"))).toBe(true);
    expect(isTryableError(new TypeError("x"))).toBe(false);
    expect(isTryableError("x")).toBe(false);
  });
});
