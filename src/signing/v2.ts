/**
 * AWS Signature Version 2 (HmacSHA256)
 *
 * @see https://docs.aws.amazon.com/general/latest/gr/signature-version-2.html
 */

import { createHmac } from 'crypto';
import type { SecretString } from '../credentials';
import { MwsError } from '../error';
import type { RequestContext } from '../types';
import { canonical } from './canonical';

/**
 * Compute the HMAC-SHA256 of a string, base64-encoded with padding.
 *
 * @throws {MwsError} MISSING_CREDENTIAL if the secret is empty
 */
export function calculateSignature(secret: SecretString, stringToSign: string): string {
  if (secret.isEmpty()) {
    throw new MwsError('secret access key is empty', 'MISSING_CREDENTIAL', 'secretAccessKey');
  }

  return createHmac('sha256', secret.expose()).update(stringToSign, 'utf8').digest('base64');
}

/**
 * Sign a request context.
 *
 * Returns the raw base64 signature; it is percent-encoded only when it is
 * added to the query.
 *
 * @example
 * ```typescript
 * sign(context); // '7XZO1dSv7BHElkee33Rt7L5PNFiBET13pg3pOWKeoo0='
 * ```
 */
export function sign(context: RequestContext): string {
  return calculateSignature(context.credentials.secretAccessKey, canonical(context));
}
