/**
 * MWS Signer Configuration Module
 *
 * Defaults, validation schemas for request options, and the builder for
 * settings shared across requests (endpoint, credentials, seller).
 *
 * @module config
 */

import { z } from 'zod';
import { SecretString, toSecretString } from '../credentials';
import { fromZodIssue, isMwsError, type MwsErrorCode } from '../error';
import { NoopLogger, type Logger } from '../observability';
import { hasLoneSurrogate } from '../signing/canonical';
import { Timestamp } from '../signing/timestamp';
import type { HttpVerb } from '../types';
import { resolveEndpoint } from './endpoints';

export { MWS_ENDPOINTS, isMwsRegion, resolveEndpoint } from './endpoints';
export type { MwsRegion } from './endpoints';

/** Default HTTP method. */
export const DEFAULT_VERB: HttpVerb = 'GET';

/** Default request path. */
export const DEFAULT_URI_PATH = '/';

/** Signature method sent as `SignatureMethod`. */
export const SIGNATURE_METHOD = 'HmacSHA256' as const;

/** Signature version sent as `SignatureVersion`. */
export const SIGNATURE_VERSION = 2 as const;

/**
 * DNS host name: dot-separated labels, no scheme, port or path.
 */
const HOST_NAME = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)*$/;

function addIssue(ctx: z.RefinementCtx, message: string, code: MwsErrorCode): void {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message, params: { code } });
}

/** A string that can be percent-encoded as UTF-8. */
export const encodableString = z.string().superRefine((value, ctx) => {
  if (hasLoneSurrogate(value)) {
    addIssue(ctx, 'contains a lone surrogate and cannot be encoded', 'INVALID_PARAMETER');
  }
});

function requiredString(code: 'MISSING_REQUIRED' | 'MISSING_CREDENTIAL') {
  return encodableString.superRefine((value, ctx) => {
    if (value.trim() === '') {
      addIssue(ctx, 'must not be empty', code);
    }
  });
}

export const hostSchema = z.string().transform((value, ctx) => {
  const host = value.trim().toLowerCase();
  if (host === '') {
    addIssue(ctx, 'must not be empty', 'MISSING_REQUIRED');
    return z.NEVER;
  }
  if (!HOST_NAME.test(host)) {
    addIssue(ctx, `must be a host name without scheme, port or path, got "${value}"`, 'INVALID_PARAMETER');
    return z.NEVER;
  }
  return host;
});

export const uriPathSchema = z
  .string()
  .default(DEFAULT_URI_PATH)
  .superRefine((value, ctx) => {
    if (value === '') {
      addIssue(ctx, 'must not be empty', 'MISSING_REQUIRED');
    } else if (!value.startsWith('/')) {
      addIssue(ctx, `must begin with "/", got "${value}"`, 'INVALID_URI_PATH');
    } else if (/[?#]/.test(value)) {
      addIssue(ctx, `must not carry a query or fragment, got "${value}"`, 'INVALID_URI_PATH');
    }
  });

/**
 * Secret key as a string or SecretString; the value never appears in
 * an issue message.
 */
export const secretSchema = z.unknown().transform((value, ctx): SecretString => {
  if (typeof value === 'string' || value instanceof SecretString) {
    const secret = toSecretString(value);
    if (secret.isEmpty()) {
      addIssue(ctx, 'must not be empty', 'MISSING_CREDENTIAL');
      return z.NEVER;
    }
    return secret;
  }
  if (value === undefined) {
    addIssue(ctx, 'is required', 'MISSING_CREDENTIAL');
    return z.NEVER;
  }
  addIssue(ctx, 'must be a string or SecretString', 'INVALID_PARAMETER');
  return z.NEVER;
});

/** Empty and absent tokens are the same thing. */
export const mwsAuthTokenSchema = encodableString
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const timestampInstanceSchema = z.custom<Timestamp>(
  (value) => value instanceof Timestamp,
  'unsupported value type'
);

export const timestampSchema = z
  .union([z.string(), z.date(), timestampInstanceSchema])
  .optional()
  .transform((value, ctx): Timestamp => {
    try {
      if (value === undefined) {
        return Timestamp.now();
      }
      if (typeof value === 'string') {
        return Timestamp.parse(value);
      }
      return value instanceof Date ? Timestamp.fromDate(value) : value;
    } catch (error) {
      if (isMwsError(error)) {
        addIssue(ctx, error.message, error.code);
        return z.NEVER;
      }
      throw error;
    }
  });

export const primitiveSchema = z.union([
  encodableString,
  z.number().finite(),
  z.boolean(),
  z.date(),
  timestampInstanceSchema,
]);

/** A primitive or one level of nesting; deeper nesting is rejected. */
export const paramValueSchema = z.union([
  primitiveSchema,
  z.record(encodableString, primitiveSchema),
]);

export const structuredListSchema = z.object({
  label: encodableString.pipe(z.string().min(1, 'label must not be empty')),
  values: z.array(primitiveSchema),
});

export const requestContextSchema = z.object({
  host: hostSchema,
  accessKeyId: requiredString('MISSING_CREDENTIAL'),
  secretAccessKey: secretSchema,
  action: requiredString('MISSING_REQUIRED'),
  sellerId: requiredString('MISSING_REQUIRED'),
  version: requiredString('MISSING_REQUIRED'),
  verb: z.enum(['GET', 'POST']).default(DEFAULT_VERB),
  uriPath: uriPathSchema,
  timestamp: timestampSchema,
  mwsAuthToken: mwsAuthTokenSchema,
  params: z.record(encodableString, paramValueSchema).default({}),
  structuredLists: z.record(structuredListSchema).default({}),
});

export type ResolvedRequestOptions = z.output<typeof requestContextSchema>;

/**
 * Validate request options and apply defaults. Accepts untyped input so
 * callers outside TypeScript get the same field-level errors.
 *
 * @throws {MwsError} for the first invalid field
 */
export function parseRequestOptions(options: unknown): ResolvedRequestOptions {
  const result = requestContextSchema.safeParse(options);
  if (!result.success) {
    throw fromZodIssue(result.error.issues[0]);
  }
  return result.data;
}

/**
 * Settings shared by every request made for one seller account.
 */
export interface MwsConfig {
  /** Endpoint host name */
  readonly host: string;
  readonly accessKeyId: string;
  readonly secretAccessKey: SecretString;
  readonly sellerId: string;
  /** Delegation token applied to every request unless overridden */
  readonly mwsAuthToken?: string | undefined;
  readonly logger: Logger;
}

const mwsConfigSchema = z.object({
  host: hostSchema,
  accessKeyId: requiredString('MISSING_CREDENTIAL'),
  secretAccessKey: secretSchema,
  sellerId: requiredString('MISSING_REQUIRED'),
  mwsAuthToken: mwsAuthTokenSchema,
});

/**
 * MWS signer configuration builder.
 *
 * @example
 * ```typescript
 * const config = new MwsConfigBuilder()
 *   .region('EU')
 *   .credentials('test-access-key', 'test-secret')
 *   .sellerId('A2SELLER')
 *   .build();
 * ```
 */
export class MwsConfigBuilder {
  private hostValue?: string;
  private accessKeyIdValue?: string;
  private secretValue?: string | SecretString;
  private sellerIdValue?: string;
  private mwsAuthTokenValue?: string;
  private loggerValue: Logger = new NoopLogger();

  host(host: string): this {
    this.hostValue = host;
    return this;
  }

  /**
   * Use the endpoint of a marketplace region.
   *
   * @throws {MwsError} INVALID_PARAMETER for an unknown region
   */
  region(region: string): this {
    this.hostValue = resolveEndpoint(region);
    return this;
  }

  credentials(accessKeyId: string, secretAccessKey: string | SecretString): this {
    this.accessKeyIdValue = accessKeyId;
    this.secretValue = secretAccessKey;
    return this;
  }

  sellerId(sellerId: string): this {
    this.sellerIdValue = sellerId;
    return this;
  }

  mwsAuthToken(token: string): this {
    this.mwsAuthTokenValue = token;
    return this;
  }

  logger(logger: Logger): this {
    this.loggerValue = logger;
    return this;
  }

  /**
   * @throws {MwsError} for the first missing or invalid setting
   */
  build(): MwsConfig {
    const result = mwsConfigSchema.safeParse({
      host: this.hostValue,
      accessKeyId: this.accessKeyIdValue,
      secretAccessKey: this.secretValue,
      sellerId: this.sellerIdValue,
      mwsAuthToken: this.mwsAuthTokenValue,
    });
    if (!result.success) {
      throw fromZodIssue(result.error.issues[0]);
    }

    return Object.freeze({ ...result.data, logger: this.loggerValue });
  }
}

/**
 * Create a new configuration builder.
 */
export function configBuilder(): MwsConfigBuilder {
  return new MwsConfigBuilder();
}
