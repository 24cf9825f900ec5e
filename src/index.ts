/**
 * MWS Query Signer
 *
 * Builds and signs Amazon Marketplace Web Services requests with AWS
 * Signature Version 2 (HmacSHA256).
 *
 * ## Quick Start
 *
 * ```typescript
 * import { MwsQuery } from 'mws-query-signer';
 *
 * const query = new MwsQuery({
 *   host: 'mws-eu.amazonservices.com',
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 *   action: 'ListOrders',
 *   sellerId: 'A2SELLER',
 *   version: '2013-09-01',
 *   uriPath: '/Orders/2013-09-01',
 *   params: { created_after: '2024-01-01T00:00:00+00:00' },
 *   structuredLists: {
 *     marketplaces: { label: 'MarketplaceId.Id', values: ['A1PA6795UKMFR9'] },
 *   },
 * });
 *
 * query.requestUri();
 * ```
 *
 * @module mws-query-signer
 */

// ============================================================================
// Signer
// ============================================================================

export { MwsSigner } from './signer';
export type { MwsRequest } from './signer';

// ============================================================================
// Query assembly
// ============================================================================

export {
  MwsQuery,
  createRequestContext,
  buildQuery,
  requestUri,
  toSignedRequest,
  FORM_CONTENT_TYPE,
} from './query';

// ============================================================================
// Signing
// ============================================================================

export {
  sign,
  calculateSignature,
  percentEncode,
  compareKeys,
  canonicalQueryString,
  queryString,
  canonical,
  normalize,
  camelize,
  camelizeKeys,
  escapeDateTimeParams,
  makeStructuredLists,
  renderPrimitive,
  toDecimalString,
  Timestamp,
} from './signing';
export type { EscapedParams, PlainPrimitive } from './signing';

// ============================================================================
// Configuration
// ============================================================================

export {
  MwsConfigBuilder,
  configBuilder,
  parseRequestOptions,
  requestContextSchema,
  resolveEndpoint,
  isMwsRegion,
  MWS_ENDPOINTS,
  DEFAULT_VERB,
  DEFAULT_URI_PATH,
  SIGNATURE_METHOD,
  SIGNATURE_VERSION,
} from './config';
export type { MwsConfig, MwsRegion, ResolvedRequestOptions } from './config';

// ============================================================================
// Credentials
// ============================================================================

export { SecretString, toSecretString, REDACTED } from './credentials';
export type { MwsCredentials } from './credentials';

// ============================================================================
// Errors
// ============================================================================

export { MwsError, isMwsError, fromZodIssue } from './error';
export type { MwsErrorCode } from './error';

// ============================================================================
// Observability
// ============================================================================

export { ConsoleLogger, NoopLogger, LogLevel, redactSensitive } from './observability';
export type { Logger, ConsoleLoggerOptions } from './observability';

// ============================================================================
// Types
// ============================================================================

export type {
  HttpVerb,
  TimeValue,
  ParamPrimitive,
  NestedParams,
  ParamValue,
  ExtraParams,
  StructuredList,
  StructuredLists,
  NormalizedParams,
  RequestContextOptions,
  RequestContext,
  SignedRequest,
} from './types';
