/**
 * MWS credentials.
 *
 * The secret access key is only ever read by the HMAC step; everywhere else
 * it travels wrapped in a {@link SecretString} so that logging, string
 * interpolation and JSON serialization show a placeholder instead.
 *
 * @module credentials
 */

/**
 * Placeholder rendered in place of a secret value.
 */
export const REDACTED = '[REDACTED]';

/**
 * Wrapper for sensitive strings that prevents accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  /**
   * True when the wrapped value is empty or whitespace.
   */
  isEmpty(): boolean {
    return this.value.trim() === '';
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }
}

/**
 * Credentials used to sign MWS requests.
 */
export interface MwsCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: SecretString;
}

/**
 * Wraps a raw secret, leaving an existing SecretString as is.
 */
export function toSecretString(secret: string | SecretString): SecretString {
  return secret instanceof SecretString ? secret : new SecretString(secret);
}
