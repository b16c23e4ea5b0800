/**
 * tryable-credentials
 *
 * Reads API credentials from explicit properties, the environment, or a
 * source file.
 *
 * @example
 * ```typescript
 * import { CredentialsReader } from 'tryable-credentials';
 *
 * const { username, password } = CredentialsReader.classicalReader().getCredentials();
 * ```
 */

export {
  CredentialsReader,
  DEFAULT_SOURCE,
  type CredentialsReaderOptions,
  type ReaderOverrides,
  type CredentialsEvent,
  type CredentialsOrigin,
} from "./credentials-reader";
export { Credentials, KeyCredential } from "./credentials";
export { CredentialsNotFoundError, isCredentialsNotFoundError } from "./errors";
