/**
 * Query assembly: signed query strings, request URIs and signed requests.
 */

import { canonical, queryString } from '../signing/canonical';
import { normalize } from '../signing/normalize';
import type { Timestamp } from '../signing/timestamp';
import { sign } from '../signing/v2';
import type {
  HttpVerb,
  NormalizedParams,
  RequestContext,
  RequestContextOptions,
  SignedRequest,
} from '../types';
import { createRequestContext } from './context';

/** Content type of a POST body carrying the signed query. */
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8';

/**
 * The query string, unsigned, or with `Signature` sorted in when given.
 */
export function buildQuery(context: RequestContext, signature?: string): string {
  return queryString(context, signature);
}

function endpointUrl(context: RequestContext): string {
  return `https://${context.host}${context.uriPath}`;
}

/**
 * The full signed request URI.
 *
 * @example
 * ```typescript
 * requestUri(context);
 * // 'https://mws-eu.amazonservices.com/?AWSAccessKeyId=key&Action=ListOrders&...&Signature=...%3D&...'
 * ```
 */
export function requestUri(context: RequestContext): string {
  return `${endpointUrl(context)}?${buildQuery(context, sign(context))}`;
}

/**
 * Shape a signed request for an HTTP client: GET carries the signed query
 * in the URL, POST carries it as a form body.
 */
export function toSignedRequest(context: RequestContext): SignedRequest {
  if (context.verb === 'GET') {
    return {
      method: 'GET',
      url: requestUri(context),
      headers: {},
    };
  }

  return {
    method: 'POST',
    url: endpointUrl(context),
    headers: { 'content-type': FORM_CONTENT_TYPE },
    body: buildQuery(context, sign(context)),
  };
}

/**
 * One MWS request: validated inputs plus every value derived from them.
 *
 * @example
 * ```typescript
 * const query = new MwsQuery({
 *   host: 'mws-eu.amazonservices.com',
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 *   action: 'ListOrders',
 *   sellerId: 'A2SELLER',
 *   version: '2013-09-01',
 *   uriPath: '/Orders/2013-09-01',
 *   params: { created_after: new Date('2024-01-01T00:00:00Z') },
 *   structuredLists: { marketplaces: { label: 'MarketplaceId.Id', values: ['A1PA6795UKMFR9'] } },
 * });
 *
 * await fetch(query.requestUri());
 * ```
 */
export class MwsQuery {
  readonly context: RequestContext;

  /**
   * @throws {MwsError} naming the first missing or invalid option
   */
  constructor(options: RequestContextOptions) {
    this.context = createRequestContext(options);
  }

  get verb(): HttpVerb {
    return this.context.verb;
  }

  get uriPath(): string {
    return this.context.uriPath;
  }

  get host(): string {
    return this.context.host;
  }

  get timestamp(): Timestamp {
    return this.context.timestamp;
  }

  get mwsAuthToken(): string | undefined {
    return this.context.mwsAuthToken;
  }

  get signatureMethod(): RequestContext['signatureMethod'] {
    return this.context.signatureMethod;
  }

  get signatureVersion(): RequestContext['signatureVersion'] {
    return this.context.signatureVersion;
  }

  normalize(): NormalizedParams {
    return normalize(this.context);
  }

  buildQuery(signature?: string): string {
    return buildQuery(this.context, signature);
  }

  canonical(): string {
    return canonical(this.context);
  }

  signature(): string {
    return sign(this.context);
  }

  requestUri(): string {
    return requestUri(this.context);
  }

  toSignedRequest(): SignedRequest {
    return toSignedRequest(this.context);
  }
}
