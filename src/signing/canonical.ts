/**
 * MWS Canonical String Building
 *
 * Functions for creating the string to sign according to AWS Signature
 * Version 2:
 *
 * ```
 * HTTPVerb + '\n' +
 * HostHeaderInLowercase + '\n' +
 * HTTPRequestURI + '\n' +
 * CanonicalizedQueryString
 * ```
 *
 * @see https://docs.aws.amazon.com/general/latest/gr/signature-version-2.html
 */

import { MwsError } from '../error';
import type { NormalizedParams, RequestContext } from '../types';
import { normalize } from './normalize';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * True when a string has no UTF-8 encoding.
 */
export function hasLoneSurrogate(input: string): boolean {
  return LONE_SURROGATE.test(input);
}

/**
 * Percent-encode a key or value.
 *
 * - Leaves the unreserved characters (A-Z, a-z, 0-9, hyphen, underscore,
 *   period, tilde) as they are
 * - Encodes space as + (the form the MWS endpoints verify against)
 * - Encodes every other UTF-8 byte as %HH with upper-case hex
 *
 * The canonical string and the on-wire query both go through this function.
 *
 * @example
 * ```typescript
 * percentEncode('Seller ID'); // 'Seller+ID'
 * percentEncode('2013-01-01T00:00:00-02:00'); // '2013-01-01T00%3A00%3A00-02%3A00'
 * percentEncode('abc='); // 'abc%3D'
 * ```
 */
export function percentEncode(input: string, field: string = 'value'): string {
  if (hasLoneSurrogate(input)) {
    throw new MwsError(
      `${field}: contains a lone surrogate and cannot be encoded`,
      'INVALID_PARAMETER',
      field
    );
  }

  // encodeURIComponent leaves !'()* alone; AWS wants them encoded
  return encodeURIComponent(input)
    .replace(/!/g, '%21')
    .replace(/'/g, '%27')
    .replace(/\(/g, '%28')
    .replace(/\)/g, '%29')
    .replace(/\*/g, '%2A')
    .replace(/%20/g, '+');
}

/**
 * Byte-wise comparison of the UTF-8 encodings of two keys.
 */
export function compareKeys(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Create the canonical query string from a flat parameter map.
 *
 * - Sort parameters by key, byte-wise
 * - Percent-encode keys and values
 * - Join as key=value pairs separated by &
 *
 * @example
 * ```typescript
 * canonicalQueryString({ Version: '2010-01-01', Action: 'ListOrders' });
 * // 'Action=ListOrders&Version=2010-01-01'
 * ```
 */
export function canonicalQueryString(params: NormalizedParams): string {
  return Object.keys(params)
    .sort(compareKeys)
    .map((key) => `${percentEncode(key)}=${percentEncode(params[key] ?? '')}`)
    .join('&');
}

/**
 * Query component for a context, with the signature added when given.
 *
 * The signature is sorted in with the other parameters.
 */
export function queryString(context: RequestContext, signature?: string): string {
  const params = normalize(context);
  if (signature === undefined) {
    return canonicalQueryString(params);
  }
  return canonicalQueryString({ ...params, Signature: signature });
}

/**
 * Create the string to sign for a context.
 *
 * @example
 * ```typescript
 * canonical(context);
 * // 'GET\nmws-eu.amazonservices.com\n/\nAWSAccessKeyId=key&Action=ListOrders&...'
 * ```
 */
export function canonical(context: RequestContext): string {
  return [context.verb, context.host.toLowerCase(), context.uriPath, queryString(context)].join('\n');
}
