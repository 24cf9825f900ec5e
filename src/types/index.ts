/**
 * MWS Signing Types
 *
 * Type definitions for MWS Signature Version 2 request signing.
 */

import type { MwsCredentials, SecretString } from '../credentials';
import type { Timestamp } from '../signing/timestamp';

/**
 * HTTP methods MWS accepts for query requests.
 */
export type HttpVerb = 'GET' | 'POST';

/**
 * A point in time; `Date` renders in UTC, `Timestamp` keeps its offset.
 */
export type TimeValue = Date | Timestamp;

/**
 * A single parameter value.
 */
export type ParamPrimitive = string | number | boolean | TimeValue;

/**
 * One level of nested parameters, flattened as `Parent.Child`.
 */
export interface NestedParams {
  readonly [key: string]: ParamPrimitive;
}

/**
 * Value of an extra request parameter.
 */
export type ParamValue = ParamPrimitive | NestedParams;

/**
 * Extra request parameters keyed by snake_case or CamelCase identifier.
 */
export type ExtraParams = Readonly<Record<string, ParamValue>>;

/**
 * An MWS structured list: `values` expand to `{label}.1`, `{label}.2`, ...
 *
 * @example
 * ```typescript
 * const ids: StructuredList = { label: 'MarketplaceId.Id', values: ['A1F83G8C2ARO7P'] };
 * ```
 */
export interface StructuredList {
  /** Dotted prefix, used verbatim */
  readonly label: string;
  readonly values: readonly ParamPrimitive[];
}

export type StructuredLists = Readonly<Record<string, StructuredList>>;

/**
 * Flat parameter map with upper-CamelCase keys and string values.
 */
export type NormalizedParams = Readonly<Record<string, string>>;

/**
 * Inputs accepted when creating a request context.
 */
export interface RequestContextOptions {
  /** HTTP method (default 'GET') */
  verb?: HttpVerb;
  /** Absolute request path (default '/') */
  uriPath?: string;
  /** Endpoint host name (e.g. "mws-eu.amazonservices.com") */
  host: string;
  accessKeyId: string;
  secretAccessKey: string | SecretString;
  /** MWS operation name (e.g. "ListOrders") */
  action: string;
  sellerId: string;
  /** API version (e.g. "2013-09-01") */
  version: string;
  /** ISO-8601 string with offset, Date or Timestamp (default: now) */
  timestamp?: string | TimeValue;
  /** Delegation token; empty is the same as absent */
  mwsAuthToken?: string;
  params?: ExtraParams;
  structuredLists?: StructuredLists;
}

/**
 * Validated, immutable request inputs.
 */
export interface RequestContext {
  readonly verb: HttpVerb;
  readonly uriPath: string;
  /** Lower-cased host name */
  readonly host: string;
  readonly credentials: MwsCredentials;
  readonly action: string;
  readonly sellerId: string;
  readonly version: string;
  readonly timestamp: Timestamp;
  readonly mwsAuthToken: string | undefined;
  readonly signatureMethod: 'HmacSHA256';
  readonly signatureVersion: 2;
  readonly extraParams: ExtraParams;
  readonly structuredLists: StructuredLists;
}

/**
 * A signed request ready to hand to an HTTP client.
 */
export interface SignedRequest {
  method: HttpVerb;
  /** Full request URL; carries the signed query for GET */
  url: string;
  headers: Record<string, string>;
  /** Form-encoded signed query for POST */
  body?: string | undefined;
}
