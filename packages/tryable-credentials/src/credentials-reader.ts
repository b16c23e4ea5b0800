/**
 * Reads a fixed set of string credentials from, in order: explicit
 * properties, environment variables, then a source file holding one value per
 * line in key order.
 */

import { readFileSync } from "node:fs";
import { IllegalArgumentError, IllegalStateError, type IOError } from "tryable/errors";
import { Try } from "tryable/try";
import { IO_UNCHECKER } from "tryable/unchecker";
import { Credentials, KeyCredential } from "./credentials";
import { CredentialsNotFoundError } from "./errors";

/** Default source file, relative to the working directory. */
export const DEFAULT_SOURCE = "API_credentials.txt";

export type CredentialsOrigin = "properties" | "env" | "file";

/**
 * Emitted once the credentials have been found.
 */
export type CredentialsEvent = {
  type: "credentials_found";
  origin: CredentialsOrigin;
  keys: readonly string[];
  /** Path of the source file, for the `file` origin. */
  source?: string;
};

type StringRecord = Readonly<Record<string, string | undefined>>;

/**
 * Options shared by every reader.
 */
export interface ReaderOverrides {
  /** File to read when neither properties nor environment hold the keys. @default 'API_credentials.txt' */
  source?: string;
  /** Explicit settings, searched first. @default {} */
  properties?: StringRecord;
  /** Environment variables, searched second. @default process.env */
  env?: StringRecord;
  /** Notified when the credentials are found. */
  onEvent?: (event: CredentialsEvent) => void;
}

export interface CredentialsReaderOptions<K extends string, C> extends ReaderOverrides {
  /** Keys to look for, in the order their values appear in the source file. */
  keys: readonly K[];
  /** Builds the credentials from the values, given in key order. */
  build: (values: readonly string[]) => C;
}

export class CredentialsReader<K extends string, C> {
  readonly keys: readonly K[];
  readonly source: string;
  private readonly build: (values: readonly string[]) => C;
  private readonly properties: StringRecord;
  private readonly env: StringRecord;
  private readonly onEvent: ((event: CredentialsEvent) => void) | undefined;

  private constructor(options: CredentialsReaderOptions<K, C>) {
    if (options.keys.length === 0 || new Set(options.keys).size !== options.keys.length) {
      throw new IllegalArgumentError(`Keys must be distinct and non-empty: [${options.keys.join(", ")}]`);
    }
    this.keys = [...options.keys];
    this.build = options.build;
    this.source = options.source ?? DEFAULT_SOURCE;
    this.properties = options.properties ?? {};
    this.env = options.env ?? process.env;
    this.onEvent = options.onEvent;
  }

  static using<K extends string, C>(options: CredentialsReaderOptions<K, C>): CredentialsReader<K, C> {
    return new CredentialsReader(options);
  }

  /**
   * Reads a username and a password under the keys `API_USERNAME` and
   * `API_PASSWORD`.
   */
  static classicalReader(
    overrides: ReaderOverrides = {}
  ): CredentialsReader<"API_USERNAME" | "API_PASSWORD", Credentials> {
    return new CredentialsReader({
      ...overrides,
      keys: ["API_USERNAME", "API_PASSWORD"],
      build: ([username, password]) => new Credentials(username, password),
    });
  }

  /**
   * Reads an API key under the key `API_KEY`.
   */
  static keyReader(overrides: ReaderOverrides = {}): CredentialsReader<"API_KEY", KeyCredential> {
    return new CredentialsReader({
      ...overrides,
      keys: ["API_KEY"],
      build: ([key]) => new KeyCredential(key),
    });
  }

  /**
   * Finds the credentials.
   *
   * @throws IllegalStateError when properties or environment hold some keys
   * but not all, or when the source file has non-empty content after the
   * last key's line
   * @throws CredentialsNotFoundError when no source holds them
   * @throws UncheckedIOError when the source file cannot be read
   */
  getCredentials(): C {
    const fromProperties = this.findIn(this.properties, "properties");
    if (fromProperties !== undefined) {
      this.onEvent?.({ type: "credentials_found", origin: "properties", keys: this.keys });
      return this.build(fromProperties);
    }

    const fromEnv = this.findIn(this.env, "environment variables");
    if (fromEnv !== undefined) {
      this.onEvent?.({ type: "credentials_found", origin: "env", keys: this.keys });
      return this.build(fromEnv);
    }

    const fromFile = this.readSource();
    this.onEvent?.({
      type: "credentials_found",
      origin: "file",
      keys: this.keys,
      source: this.source,
    });
    return this.build(fromFile);
  }

  private findIn(record: StringRecord, description: string): string[] | undefined {
    const found = this.keys.filter((key) => record[key] !== undefined);
    if (found.length === 0) return undefined;
    if (found.length < this.keys.length) {
      const missing = this.keys.filter((key) => record[key] === undefined);
      throw new IllegalStateError(
        `Partial credential information found in ${description}: [${found.join(", ")}], missing: [${missing.join(", ")}]`
      );
    }
    return this.keys.map((key) => record[key] ?? "");
  }

  private readSource(): string[] {
    const content = IO_UNCHECKER.getUsing(() =>
      Try.get<string, IOError>(() => readFileSync(this.source, "utf8")).orThrow((cause) =>
        cause.code === "ENOENT"
          ? new CredentialsNotFoundError(this.keys, this.source, { cause })
          : cause
      )
    );
    const lines = content.split(/\r\n|\r|\n/);
    const supplementary = lines.slice(this.keys.length);
    if (supplementary.some((line) => line !== "")) {
      throw new IllegalStateError(
        `Source content ${this.source} is too long: it has non-empty content after line number ${this.keys.length}.`
      );
    }
    // Missing lines read as empty values.
    return this.keys.map((_, index) => lines[index] ?? "");
  }
}
