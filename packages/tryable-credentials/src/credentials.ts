/**
 * Value objects produced by the credentials readers.
 */

/**
 * A username and a password. `toString()` never shows the password.
 */
export class Credentials {
  constructor(
    readonly username: string,
    readonly password: string
  ) {}

  equals(other: unknown): boolean {
    return (
      other instanceof Credentials &&
      other.username === this.username &&
      other.password === this.password
    );
  }

  toString(): string {
    const masked = this.password === "" ? "" : "****";
    return `Credentials{username=${this.username}, password=${masked}}`;
  }
}

/**
 * A single API key. `toString()` never shows it.
 */
export class KeyCredential {
  constructor(readonly key: string) {}

  equals(other: unknown): boolean {
    return other instanceof KeyCredential && other.key === this.key;
  }

  toString(): string {
    return `KeyCredential{key=${this.key === "" ? "" : "****"}}`;
  }
}
