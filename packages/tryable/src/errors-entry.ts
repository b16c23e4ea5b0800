/**
 * tryable/errors entry point
 *
 * Error classes and the checked/unchecked classification.
 */
export {
  // Types
  type Throwable,
  type IOError,
  // Unchecked errors
  UncheckedError,
  IllegalStateError,
  IllegalArgumentError,
  VerifyError,
  UncheckedIOError,
  NullValueError,
  // Checked errors
  URISyntaxError,
  // Classification
  isUnchecked,
  isChecked,
  isDeclaredChecked,
  toThrowable,
  // Union type
  type TryableError,
  // Type guards
  isIOError,
  isNullValueError,
  isURISyntaxError,
  isTryableError,
} from "./errors";
