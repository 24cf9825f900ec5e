/**
 * MWS Signing Error Types
 *
 * Every failure of the signer is a programmer-input error raised
 * synchronously, before anything is signed.
 *
 * @module error
 */

import type { ZodIssue } from 'zod';

/**
 * Error codes for signing operations.
 */
export type MwsErrorCode =
  | 'MISSING_CREDENTIAL' // Access key id or secret key empty
  | 'MISSING_REQUIRED' // Action, seller id, version, host or uri path empty
  | 'INVALID_URI_PATH' // Uri path does not begin with '/'
  | 'INVALID_PARAMETER'; // Unsupported parameter shape or malformed value

const ERROR_CODES: ReadonlySet<string> = new Set<MwsErrorCode>([
  'MISSING_CREDENTIAL',
  'MISSING_REQUIRED',
  'INVALID_URI_PATH',
  'INVALID_PARAMETER',
]);

/**
 * Error thrown when a request cannot be signed.
 *
 * @example
 * ```typescript
 * throw new MwsError('uriPath must begin with "/"', 'INVALID_URI_PATH', 'uriPath');
 * ```
 */
export class MwsError extends Error {
  /**
   * Error code indicating the type of failure.
   */
  public readonly code: MwsErrorCode;

  /**
   * Name of the offending input, as a dotted path for nested values
   * (e.g. `params.outer`).
   */
  public readonly field: string;

  constructor(message: string, code: MwsErrorCode, field: string) {
    super(message);
    this.name = 'MwsError';
    this.code = code;
    this.field = field;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MwsError);
    }

    Object.setPrototypeOf(this, MwsError.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Convert error to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      field: this.field,
    };
  }
}

/**
 * Type guard to check if an error is an MwsError.
 */
export function isMwsError(error: unknown): error is MwsError {
  return error instanceof MwsError;
}

/**
 * Type guard for the error code carried in custom zod issue params.
 */
export function isMwsErrorCode(value: unknown): value is MwsErrorCode {
  return typeof value === 'string' && ERROR_CODES.has(value);
}

/**
 * Codes used when a field is absent altogether.
 */
const MISSING_FIELD_CODES: Readonly<Record<string, MwsErrorCode>> = {
  accessKeyId: 'MISSING_CREDENTIAL',
  secretAccessKey: 'MISSING_CREDENTIAL',
  action: 'MISSING_REQUIRED',
  sellerId: 'MISSING_REQUIRED',
  version: 'MISSING_REQUIRED',
  host: 'MISSING_REQUIRED',
  uriPath: 'MISSING_REQUIRED',
};

/**
 * Map a zod validation issue to an MwsError.
 *
 * Custom issues raised by the schemas carry their code in `params.code`;
 * a required field that was never supplied maps to the missing code for
 * that field; everything else is an invalid parameter.
 *
 * @example
 * ```typescript
 * const result = schema.safeParse(options);
 * if (!result.success) {
 *   throw fromZodIssue(result.error.issues[0]);
 * }
 * ```
 */
export function fromZodIssue(issue: ZodIssue): MwsError {
  const field = issue.path.length > 0 ? issue.path.map(String).join('.') : 'options';
  const customCode: unknown = issue.code === 'custom' ? issue.params?.code : undefined;
  let code: MwsErrorCode = 'INVALID_PARAMETER';

  if (isMwsErrorCode(customCode)) {
    code = customCode;
  } else if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    code = MISSING_FIELD_CODES[field] ?? 'INVALID_PARAMETER';
  }

  const message = issue.message.startsWith(`${field}: `)
    ? issue.message
    : `${field}: ${issue.message}`;

  return new MwsError(message, code, field);
}
