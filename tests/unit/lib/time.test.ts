/**
 * Approach Time Utility Tests
 */

import { describe, it, expect } from 'vitest';
import {
  parseApproachTime,
  formatDateTime,
  formatDate,
  parseCalendarDate,
} from '../../../src/lib/time.js';
import { DataLoadError, ErrorCode, McpError } from '../../../src/shared/errors/index.js';
import { catchError } from '../../fixtures/neo-test-utils.js';

describe('parseApproachTime', () => {
  it('should parse the compact form as UTC', () => {
    expect(parseApproachTime('1900-Jan-01 00:00').toISOString()).toBe('1900-01-01T00:00:00.000Z');
  });

  it('should round-trip to the display form without seconds', () => {
    expect(formatDateTime(parseApproachTime('1900-Jan-01 00:00'))).toBe('1900-01-01 00:00');
    expect(formatDateTime(parseApproachTime('2029-Apr-13 21:46'))).toBe('2029-04-13 21:46');
  });

  it('should accept month names in any case', () => {
    expect(formatDateTime(parseApproachTime('2020-DEC-30 04:55'))).toBe('2020-12-30 04:55');
    expect(formatDateTime(parseApproachTime('2020-dec-30 04:55'))).toBe('2020-12-30 04:55');
  });

  it('should keep years below 100 as written', () => {
    expect(formatDateTime(parseApproachTime('0099-Mar-05 01:02'))).toBe('0099-03-05 01:02');
  });

  it.each([
    '1900-Foo-01 00:00',
    '1900-Feb-30 00:00',
    '1900-Jan-00 00:00',
    '1900-Jan-01 24:00',
    '1900-Jan-01 10:60',
    '1900-01-01 00:00',
    '',
  ])('should reject %j', (text) => {
    expect(() => parseApproachTime(text)).toThrow(DataLoadError);
  });

  it('should report INVALID_TIMESTAMP with the offending value', () => {
    const error = catchError(() => parseApproachTime('1900-Feb-30 00:00'));

    expect(error).toBeInstanceOf(DataLoadError);
    expect(error).toMatchObject({
      code: ErrorCode.INVALID_TIMESTAMP,
      details: { value: '1900-Feb-30 00:00' },
    });
  });
});

describe('formatDate', () => {
  it('should use the UTC calendar date', () => {
    expect(formatDate(new Date(Date.UTC(2020, 11, 30, 23, 59)))).toBe('2020-12-30');
  });
});

describe('parseCalendarDate', () => {
  it('should accept a valid date', () => {
    expect(parseCalendarDate('2020-02-29')).toBe('2020-02-29');
  });

  it.each(['2021-02-29', '2020-13-01', '2020-2-1', '20200101', 'yesterday'])(
    'should reject %j',
    (text) => {
      expect(() => parseCalendarDate(text)).toThrow(McpError);
      expect(() => parseCalendarDate(text)).toThrow(`Invalid date "${text}", expected YYYY-MM-DD`);
    },
  );

  it('should use the INVALID_ARGUMENT code', () => {
    expect(catchError(() => parseCalendarDate('2021-02-29'))).toMatchObject({
      code: ErrorCode.INVALID_ARGUMENT,
    });
  });
});
