/**
 * Tests for error types
 */

import { describe, it, expect } from 'vitest';
import { z, type ZodIssue } from 'zod';
import { MwsError, fromZodIssue, isMwsError, isMwsErrorCode } from './index';

describe('MwsError', () => {
  const error = new MwsError('uriPath: must begin with "/"', 'INVALID_URI_PATH', 'uriPath');

  it('should carry code and field', () => {
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(MwsError);
    expect(error.name).toBe('MwsError');
    expect(error.code).toBe('INVALID_URI_PATH');
    expect(error.field).toBe('uriPath');
  });

  it('should format as a string', () => {
    expect(error.toString()).toBe('MwsError [INVALID_URI_PATH]: uriPath: must begin with "/"');
  });

  it('should serialize to JSON', () => {
    expect(error.toJSON()).toEqual({
      name: 'MwsError',
      message: 'uriPath: must begin with "/"',
      code: 'INVALID_URI_PATH',
      field: 'uriPath',
    });
  });
});

describe('isMwsError', () => {
  it('should distinguish MwsError from other errors', () => {
    expect(isMwsError(new MwsError('x', 'INVALID_PARAMETER', 'x'))).toBe(true);
    expect(isMwsError(new Error('x'))).toBe(false);
    expect(isMwsError('x')).toBe(false);
  });
});

describe('isMwsErrorCode', () => {
  it('should accept only known codes', () => {
    expect(isMwsErrorCode('MISSING_CREDENTIAL')).toBe(true);
    expect(isMwsErrorCode('SERVICE_UNAVAILABLE')).toBe(false);
    expect(isMwsErrorCode(42)).toBe(false);
  });
});

describe('fromZodIssue', () => {
  it('should use the code carried by a custom issue', () => {
    const issue: ZodIssue = {
      code: 'custom',
      path: ['uriPath'],
      message: 'must begin with "/"',
      params: { code: 'INVALID_URI_PATH' },
    };

    const error = fromZodIssue(issue);

    expect(error.code).toBe('INVALID_URI_PATH');
    expect(error.field).toBe('uriPath');
    expect(error.message).toBe('uriPath: must begin with "/"');
  });

  it('should not prefix a message that already names the field', () => {
    const issue: ZodIssue = {
      code: 'custom',
      path: ['timestamp'],
      message: 'timestamp: invalid date',
      params: { code: 'INVALID_PARAMETER' },
    };

    expect(fromZodIssue(issue).message).toBe('timestamp: invalid date');
  });

  it('should map an absent credential to MISSING_CREDENTIAL', () => {
    const result = z.object({ accessKeyId: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      const error = fromZodIssue(result.error.issues[0]);
      expect(error.code).toBe('MISSING_CREDENTIAL');
      expect(error.field).toBe('accessKeyId');
    }
  });

  it('should join nested paths with dots', () => {
    const result = z.object({ params: z.record(z.string()) }).safeParse({ params: { count: 1 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      const error = fromZodIssue(result.error.issues[0]);
      expect(error.code).toBe('INVALID_PARAMETER');
      expect(error.field).toBe('params.count');
    }
  });

  it('should name the whole input when the path is empty', () => {
    const result = z.object({}).safeParse(null);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(fromZodIssue(result.error.issues[0]).field).toBe('options');
    }
  });
});
