/**
 * MWS Signature Version 2 Signing Module
 *
 * @example Basic usage
 * ```typescript
 * import { createRequestContext, canonical, sign } from 'mws-query-signer';
 *
 * const context = createRequestContext({ ... });
 * canonical(context); // string to sign
 * sign(context);      // base64 HMAC-SHA256
 * ```
 *
 * @module signing
 */

// Core signing functionality
export { sign, calculateSignature } from './v2';

// Canonical string utilities
export {
  percentEncode,
  compareKeys,
  canonicalQueryString,
  queryString,
  canonical,
} from './canonical';

// Parameter normalization
export {
  normalize,
  camelize,
  camelizeKeys,
  escapeDateTimeParams,
  makeStructuredLists,
  renderPrimitive,
  toDecimalString,
  isNestedParams,
} from './normalize';
export type { EscapedParams, PlainPrimitive } from './normalize';

export { Timestamp } from './timestamp';
