/**
 * MWS endpoint hosts by marketplace region.
 */

import { MwsError } from '../error';

export const MWS_ENDPOINTS = {
  NA: 'mws.amazonservices.com',
  BR: 'mws.amazonservices.com',
  CA: 'mws.amazonservices.ca',
  MX: 'mws.amazonservices.com.mx',
  EU: 'mws-eu.amazonservices.com',
  IN: 'mws.amazonservices.in',
  JP: 'mws.amazonservices.jp',
  AU: 'mws.amazonservices.com.au',
  FE: 'mws-fe.amazonservices.com',
  SG: 'mws-fe.amazonservices.com',
  AE: 'mws.amazonservices.ae',
  CN: 'mws.amazonservices.com.cn',
} as const;

export type MwsRegion = keyof typeof MWS_ENDPOINTS;

export function isMwsRegion(value: string): value is MwsRegion {
  return Object.prototype.hasOwnProperty.call(MWS_ENDPOINTS, value);
}

/**
 * Look up the endpoint host for a region code (case-insensitive).
 *
 * @throws {MwsError} INVALID_PARAMETER for an unknown region
 *
 * @example
 * ```typescript
 * resolveEndpoint('eu'); // 'mws-eu.amazonservices.com'
 * ```
 */
export function resolveEndpoint(region: string): string {
  const code = region.trim().toUpperCase();
  if (!isMwsRegion(code)) {
    throw new MwsError(`region: unknown MWS region "${region}"`, 'INVALID_PARAMETER', 'region');
  }
  return MWS_ENDPOINTS[code];
}
