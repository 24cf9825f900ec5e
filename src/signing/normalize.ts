/**
 * Parameter normalization.
 *
 * Flattens a request context into the string-to-string map that gets
 * sorted, encoded and signed.
 */

import { MwsError } from '../error';
import type {
  ExtraParams,
  NestedParams,
  NormalizedParams,
  ParamPrimitive,
  ParamValue,
  RequestContext,
  StructuredLists,
  TimeValue,
} from '../types';
import { Timestamp } from './timestamp';

/**
 * A primitive with times already rendered.
 */
export type PlainPrimitive = Exclude<ParamPrimitive, TimeValue>;

export type EscapedParams = Record<string, PlainPrimitive | Record<string, PlainPrimitive>>;

function isTimeValue(value: ParamPrimitive): value is TimeValue {
  return value instanceof Date || value instanceof Timestamp;
}

export function isNestedParams(value: ParamValue): value is NestedParams {
  return typeof value === 'object' && !(value instanceof Date) && !(value instanceof Timestamp);
}

function renderTime(value: TimeValue, field: string): string {
  const timestamp = value instanceof Timestamp ? value : Timestamp.fromDate(value, 0, field);
  return timestamp.toISOString();
}

/**
 * Convert a snake_case identifier to UpperCamelCase.
 *
 * Upper-case letters and digits inside a segment are kept as they are.
 *
 * @example
 * ```typescript
 * camelize('custom_param'); // 'CustomParam'
 * camelize('ASIN_list');    // 'ASINList'
 * camelize('MarketplaceId'); // 'MarketplaceId'
 * ```
 */
export function camelize(identifier: string): string {
  return identifier
    .split('_')
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('');
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Write a finite number without an exponent.
 *
 * @example
 * ```typescript
 * toDecimalString(1e21);   // '1000000000000000000000'
 * toDecimalString(1.5e-7); // '0.00000015'
 * ```
 */
export function toDecimalString(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction, exponentText] = match.map((part) => part ?? '');
  const digits = lead + fraction;
  const exponent = Number(exponentText);

  if (exponent >= 0) {
    return `${sign}${digits}${'0'.repeat(exponent - fraction.length)}`;
  }
  return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
}

/**
 * Render one primitive as it appears in the query.
 *
 * @throws {MwsError} INVALID_PARAMETER for non-finite numbers and invalid dates
 */
export function renderPrimitive(value: ParamPrimitive, field: string = 'value'): string {
  if (isTimeValue(value)) {
    return renderTime(value, field);
  }

  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new MwsError(`${field}: number must be finite, got ${value}`, 'INVALID_PARAMETER', field);
  }

  return typeof value === 'number' ? toDecimalString(value) : String(value);
}

/**
 * Camelize top-level keys and the keys of nested mappings. Values are
 * left untouched.
 */
export function camelizeKeys(params: ExtraParams): Record<string, ParamValue> {
  const result: Record<string, ParamValue> = {};

  for (const [key, value] of Object.entries(params)) {
    if (isNestedParams(value)) {
      const nested: Record<string, ParamPrimitive> = {};
      for (const [childKey, child] of Object.entries(value)) {
        nested[camelize(childKey)] = child;
      }
      result[camelize(key)] = nested;
    } else {
      result[camelize(key)] = value;
    }
  }

  return result;
}

/**
 * Replace every Date or Timestamp, at the top level or one level down,
 * with its ISO-8601 rendering.
 */
export function escapeDateTimeParams(params: ExtraParams): EscapedParams {
  const escape = (value: ParamPrimitive, field: string): PlainPrimitive =>
    isTimeValue(value) ? renderTime(value, field) : value;

  const result: EscapedParams = {};

  for (const [key, value] of Object.entries(params)) {
    if (isNestedParams(value)) {
      const nested: Record<string, PlainPrimitive> = {};
      for (const [childKey, child] of Object.entries(value)) {
        nested[childKey] = escape(child, `params.${key}.${childKey}`);
      }
      result[key] = nested;
    } else {
      result[key] = escape(value, `params.${key}`);
    }
  }

  return result;
}

/**
 * Expand structured lists into `{label}.{n}` entries, `n` counting from 1.
 *
 * @example
 * ```typescript
 * makeStructuredLists({ ids_list: { label: 'Id.id', values: [1, 2] } });
 * // { 'Id.id.1': 1, 'Id.id.2': 2 }
 * ```
 */
export function makeStructuredLists(lists: StructuredLists): Record<string, ParamPrimitive> {
  const result: Record<string, ParamPrimitive> = {};

  for (const list of Object.values(lists)) {
    list.values.forEach((value, index) => {
      result[`${list.label}.${index + 1}`] = value;
    });
  }

  return result;
}

/**
 * Build the normalized parameter map for a request context.
 *
 * @throws {MwsError} INVALID_PARAMETER when two inputs produce the same key
 */
export function normalize(context: RequestContext): NormalizedParams {
  const result: Record<string, string> = {};

  const put = (key: string, value: string, field: string): void => {
    if (value === '') {
      return;
    }
    if (Object.prototype.hasOwnProperty.call(result, key)) {
      throw new MwsError(
        `${field}: parameter "${key}" is already set`,
        'INVALID_PARAMETER',
        field
      );
    }
    result[key] = value;
  };

  put('AWSAccessKeyId', context.credentials.accessKeyId, 'accessKeyId');
  put('Action', context.action, 'action');
  put('SellerId', context.sellerId, 'sellerId');
  put('SignatureMethod', context.signatureMethod, 'signatureMethod');
  put('SignatureVersion', String(context.signatureVersion), 'signatureVersion');
  put('Timestamp', context.timestamp.toISOString(), 'timestamp');
  put('Version', context.version, 'version');

  if (context.mwsAuthToken) {
    put('MWSAuthToken', context.mwsAuthToken, 'mwsAuthToken');
  }

  for (const [key, value] of Object.entries(context.extraParams)) {
    const field = `params.${key}`;
    const name = camelize(key);
    if (name === '') {
      throw new MwsError(`${field}: parameter name is empty`, 'INVALID_PARAMETER', field);
    }

    if (isNestedParams(value)) {
      for (const [childKey, child] of Object.entries(value)) {
        const childField = `${field}.${childKey}`;
        const childName = camelize(childKey);
        if (childName === '') {
          throw new MwsError(`${childField}: parameter name is empty`, 'INVALID_PARAMETER', childField);
        }
        put(`${name}.${childName}`, renderPrimitive(child, childField), childField);
      }
    } else {
      put(name, renderPrimitive(value, field), field);
    }
  }

  for (const [key, list] of Object.entries(context.structuredLists)) {
    list.values.forEach((value, index) => {
      const field = `structuredLists.${key}.values.${index}`;
      put(`${list.label}.${index + 1}`, renderPrimitive(value, field), field);
    });
  }

  return result;
}
