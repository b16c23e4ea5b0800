import { UncheckedError } from "tryable/errors";

/**
 * No source holds the requested credentials.
 */
export class CredentialsNotFoundError extends UncheckedError {
  readonly keys: readonly string[];

  constructor(keys: readonly string[], source: string, options?: ErrorOptions) {
    super(
      `No credential information found (searching for keys [${keys.join(", ")}] in properties, in environment, and in source ${source}).`,
      options
    );
    this.name = "CredentialsNotFoundError";
    this.keys = keys;
  }
}

/**
 * Check if an error is a CredentialsNotFoundError.
 */
export function isCredentialsNotFoundError(error: unknown): error is CredentialsNotFoundError {
  return error instanceof CredentialsNotFoundError;
}
