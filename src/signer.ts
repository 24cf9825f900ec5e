/**
 * MWS signer: shared account settings plus per-request signing.
 */

import type { MwsConfig } from './config';
import { isMwsError } from './error';
import type { Logger } from './observability';
import { MwsQuery } from './query/query';
import type {
  ExtraParams,
  HttpVerb,
  SignedRequest,
  StructuredLists,
  TimeValue,
} from './types';

/**
 * Per-request inputs; endpoint, credentials and seller come from the config.
 */
export interface MwsRequest {
  action: string;
  version: string;
  verb?: HttpVerb;
  uriPath?: string;
  timestamp?: string | TimeValue;
  params?: ExtraParams;
  structuredLists?: StructuredLists;
  /** Overrides the configured token; an empty string sends none */
  mwsAuthToken?: string;
}

/**
 * Signs MWS requests for one seller account.
 *
 * @example
 * ```typescript
 * const signer = new MwsSigner(
 *   configBuilder()
 *     .region('EU')
 *     .credentials('test-access-key', 'test-secret')
 *     .sellerId('A2SELLER')
 *     .logger(new ConsoleLogger({ level: LogLevel.Debug }))
 *     .build()
 * );
 *
 * const uri = signer.requestUri({
 *   action: 'ListOrders',
 *   version: '2013-09-01',
 *   uriPath: '/Orders/2013-09-01',
 * });
 * ```
 */
export class MwsSigner {
  private readonly config: MwsConfig;
  private readonly logger: Logger;

  constructor(config: MwsConfig) {
    this.config = config;
    this.logger = config.logger.child({ component: 'mws-signer', host: config.host });
  }

  /**
   * Build the query object for a request without signing it yet.
   *
   * @throws {MwsError} naming the first missing or invalid field
   */
  query(request: MwsRequest): MwsQuery {
    return this.run(request, (query) => query);
  }

  /**
   * @throws {MwsError} naming the first missing or invalid field
   */
  requestUri(request: MwsRequest): string {
    return this.run(request, (query) => {
      const uri = query.requestUri();
      this.logSigned(query);
      return uri;
    });
  }

  /**
   * @throws {MwsError} naming the first missing or invalid field
   */
  signedRequest(request: MwsRequest): SignedRequest {
    return this.run(request, (query) => {
      const signed = query.toSignedRequest();
      this.logSigned(query);
      return signed;
    });
  }

  private run<T>(request: MwsRequest, fn: (query: MwsQuery) => T): T {
    try {
      const query = new MwsQuery({
        host: this.config.host,
        accessKeyId: this.config.accessKeyId,
        secretAccessKey: this.config.secretAccessKey,
        sellerId: this.config.sellerId,
        mwsAuthToken: request.mwsAuthToken ?? this.config.mwsAuthToken,
        action: request.action,
        version: request.version,
        verb: request.verb,
        uriPath: request.uriPath,
        timestamp: request.timestamp,
        params: request.params,
        structuredLists: request.structuredLists,
      });
      return fn(query);
    } catch (error) {
      if (isMwsError(error)) {
        this.logger.warn('MWS request rejected', {
          action: request.action,
          code: error.code,
          field: error.field,
        });
      }
      throw error;
    }
  }

  private logSigned(query: MwsQuery): void {
    this.logger.debug('MWS request signed', {
      action: query.context.action,
      verb: query.verb,
      uriPath: query.uriPath,
      requestTimestamp: query.timestamp.toISOString(),
      parameterCount: Object.keys(query.normalize()).length,
    });
  }
}
