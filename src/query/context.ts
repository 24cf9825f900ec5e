/**
 * Request context construction.
 */

import { parseRequestOptions, SIGNATURE_METHOD, SIGNATURE_VERSION } from '../config';
import type { RequestContext, RequestContextOptions } from '../types';

/**
 * Validate options, apply defaults and freeze the result.
 *
 * When no timestamp is given the current time is captured here, once;
 * every value derived from the context afterwards uses that instant.
 *
 * @throws {MwsError} naming the first missing or invalid field
 *
 * @example
 * ```typescript
 * const context = createRequestContext({
 *   host: 'mws-eu.amazonservices.com',
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 *   action: 'ListOrders',
 *   sellerId: 'A2SELLER',
 *   version: '2013-09-01',
 *   uriPath: '/Orders/2013-09-01',
 * });
 * ```
 */
export function createRequestContext(options: RequestContextOptions): RequestContext {
  const resolved = parseRequestOptions(options);

  const context: RequestContext = {
    verb: resolved.verb,
    uriPath: resolved.uriPath,
    host: resolved.host,
    credentials: Object.freeze({
      accessKeyId: resolved.accessKeyId,
      secretAccessKey: resolved.secretAccessKey,
    }),
    action: resolved.action,
    sellerId: resolved.sellerId,
    version: resolved.version,
    timestamp: resolved.timestamp,
    mwsAuthToken: resolved.mwsAuthToken,
    signatureMethod: SIGNATURE_METHOD,
    signatureVersion: SIGNATURE_VERSION,
    extraParams: Object.freeze(resolved.params),
    structuredLists: Object.freeze(resolved.structuredLists),
  };

  return Object.freeze(context);
}
