/**
 * Tests for parameter normalization
 */

import { describe, it, expect } from 'vitest';
import {
  camelize,
  camelizeKeys,
  escapeDateTimeParams,
  makeStructuredLists,
  normalize,
  renderPrimitive,
} from './normalize';
import { Timestamp } from './timestamp';
import { createRequestContext } from '../query/context';
import { MwsError } from '../error';
import type { RequestContextOptions } from '../types';

const baseOptions: RequestContextOptions = {
  verb: 'GET',
  uriPath: '/',
  host: 'mws-eu.amazonservices.com',
  accessKeyId: 'key',
  secretAccessKey: 'secret',
  action: 'ListOrders',
  sellerId: 'Seller ID',
  version: '2010-01-01',
  timestamp: '2013-01-01T00:00:00-02:00',
};

const requiredParams = {
  AWSAccessKeyId: 'key',
  Action: 'ListOrders',
  SellerId: 'Seller ID',
  SignatureMethod: 'HmacSHA256',
  SignatureVersion: '2',
  Timestamp: '2013-01-01T00:00:00-02:00',
  Version: '2010-01-01',
};

describe('camelize', () => {
  it('should convert snake_case to UpperCamelCase', () => {
    expect(camelize('custom_param')).toBe('CustomParam');
    expect(camelize('new_key')).toBe('NewKey');
    expect(camelize('created_after')).toBe('CreatedAfter');
  });

  it('should preserve upper-case segments and digits', () => {
    expect(camelize('ASIN_list')).toBe('ASINList');
    expect(camelize('MarketplaceId')).toBe('MarketplaceId');
    expect(camelize('address_line_2')).toBe('AddressLine2');
  });

  it('should skip empty segments', () => {
    expect(camelize('_leading__double_')).toBe('LeadingDouble');
    expect(camelize('___')).toBe('');
  });
});

describe('camelizeKeys', () => {
  it('should camelize a simple mapping', () => {
    expect(camelizeKeys({ new_key: 'value' })).toEqual({ NewKey: 'value' });
  });

  it('should camelize a nested mapping', () => {
    expect(camelizeKeys({ key: { key: 'value' } })).toEqual({ Key: { Key: 'value' } });
  });
});

describe('escapeDateTimeParams', () => {
  const time = Timestamp.parse('2013-01-01T00:00:00+01:00');

  it('should escape a simple mapping', () => {
    expect(escapeDateTimeParams({ time })).toEqual({ time: '2013-01-01T00:00:00+01:00' });
  });

  it('should escape a nested mapping', () => {
    expect(escapeDateTimeParams({ time: { time } })).toEqual({
      time: { time: '2013-01-01T00:00:00+01:00' },
    });
  });

  it('should leave other values untouched', () => {
    expect(
      escapeDateTimeParams({ count: 3, flag: false, date: new Date(Date.UTC(2013, 0, 1)) })
    ).toEqual({ count: 3, flag: false, date: '2013-01-01T00:00:00+00:00' });
  });
});

describe('makeStructuredLists', () => {
  it('should return a new structured list', () => {
    expect(makeStructuredLists({ ids_list: { label: 'Id.id', values: [1, 2] } })).toEqual({
      'Id.id.1': 1,
      'Id.id.2': 2,
    });
  });

  it('should merge several lists', () => {
    expect(
      makeStructuredLists({
        ids: { label: 'Id.id', values: ['a'] },
        statuses: { label: 'OrderStatus.Status', values: ['Pending', 'Shipped'] },
      })
    ).toEqual({
      'Id.id.1': 'a',
      'OrderStatus.Status.1': 'Pending',
      'OrderStatus.Status.2': 'Shipped',
    });
  });
});

describe('renderPrimitive', () => {
  it('should render each primitive kind', () => {
    expect(renderPrimitive('text')).toBe('text');
    expect(renderPrimitive(42)).toBe('42');
    expect(renderPrimitive(1.5)).toBe('1.5');
    expect(renderPrimitive(true)).toBe('true');
    expect(renderPrimitive(false)).toBe('false');
    expect(renderPrimitive(new Date(Date.UTC(2013, 0, 1)))).toBe('2013-01-01T00:00:00+00:00');
  });

  it('should render numbers without exponents', () => {
    expect(renderPrimitive(1e21)).toBe('1000000000000000000000');
    expect(renderPrimitive(-2.5e22)).toBe('-25000000000000000000000');
    expect(renderPrimitive(1e-7)).toBe('0.0000001');
    expect(renderPrimitive(1.5e-7)).toBe('0.00000015');
    expect(renderPrimitive(0.000001)).toBe('0.000001');
    expect(renderPrimitive(123456789012345680000)).toBe('123456789012345680000');
  });

  it('should reject non-finite numbers', () => {
    expect(() => renderPrimitive(Number.NaN, 'params.count')).toThrow(MwsError);
  });
});

describe('normalize', () => {
  it('should produce the required entries', () => {
    expect(normalize(createRequestContext(baseOptions))).toEqual(requiredParams);
  });

  it('should add MWSAuthToken when present', () => {
    const params = normalize(createRequestContext({ ...baseOptions, mwsAuthToken: 'auth_token' }));

    expect(params).toEqual({ ...requiredParams, MWSAuthToken: 'auth_token' });
  });

  it('should omit an empty MWSAuthToken', () => {
    const params = normalize(createRequestContext({ ...baseOptions, mwsAuthToken: '' }));

    expect(params).toEqual(requiredParams);
  });

  it('should camelize and render extra params', () => {
    const params = normalize(
      createRequestContext({
        ...baseOptions,
        params: {
          custom_param: 'custom',
          max_results_per_page: 50,
          flag: true,
          created_after: new Date(Date.UTC(2013, 0, 1)),
          empty_value: '',
        },
      })
    );

    expect(params).toEqual({
      ...requiredParams,
      CustomParam: 'custom',
      MaxResultsPerPage: '50',
      Flag: 'true',
      CreatedAfter: '2013-01-01T00:00:00+00:00',
    });
  });

  it('should write large and small numbers in decimal form', () => {
    const params = normalize(
      createRequestContext({ ...baseOptions, params: { big: 1e21, tiny: 1e-7 } })
    );

    expect(params['Big']).toBe('1000000000000000000000');
    expect(params['Tiny']).toBe('0.0000001');
  });

  it('should flatten nested params with dotted keys', () => {
    const params = normalize(
      createRequestContext({
        ...baseOptions,
        params: {
          destination_address: {
            address_line_1: '1 Main St',
            last_updated: Timestamp.parse('2013-01-01T00:00:00-02:00'),
          },
        },
      })
    );

    expect(params['DestinationAddress.AddressLine1']).toBe('1 Main St');
    expect(params['DestinationAddress.LastUpdated']).toBe('2013-01-01T00:00:00-02:00');
    expect(params['DestinationAddress']).toBeUndefined();
  });

  it('should expand structured lists', () => {
    const params = normalize(
      createRequestContext({
        ...baseOptions,
        structuredLists: { ids_list: { label: 'Id.id', values: [1, 2] } },
      })
    );

    const listEntries = Object.fromEntries(
      Object.entries(params).filter(([key]) => key.startsWith('Id.id'))
    );
    expect(listEntries).toEqual({ 'Id.id.1': '1', 'Id.id.2': '2' });
  });

  it('should keep input positions when dropping empty list values', () => {
    const params = normalize(
      createRequestContext({
        ...baseOptions,
        structuredLists: { skus: { label: 'SellerSKUList.Id', values: ['A', '', 'B'] } },
      })
    );

    expect(params['SellerSKUList.Id.1']).toBe('A');
    expect(params['SellerSKUList.Id.2']).toBeUndefined();
    expect(params['SellerSKUList.Id.3']).toBe('B');
  });

  it('should reject a param that collides with a required entry', () => {
    const context = createRequestContext({ ...baseOptions, params: { action: 'GetOrder' } });

    try {
      normalize(context);
      expect.fail('expected normalize to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MwsError);
      if (error instanceof MwsError) {
        expect(error.code).toBe('INVALID_PARAMETER');
        expect(error.field).toBe('params.action');
      }
    }
  });

  it('should reject a param whose name camelizes to nothing', () => {
    const context = createRequestContext({ ...baseOptions, params: { __: 'x' } });

    expect(() => normalize(context)).toThrow(MwsError);
  });

  it('should not depend on the order of extra params', () => {
    const forward = createRequestContext({
      ...baseOptions,
      params: { first_param: 'a', second_param: 'b' },
    });
    const reverse = createRequestContext({
      ...baseOptions,
      params: { second_param: 'b', first_param: 'a' },
    });

    expect(normalize(forward)).toEqual(normalize(reverse));
  });
});
