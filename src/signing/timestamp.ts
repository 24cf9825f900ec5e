/**
 * Offset-preserving timestamps.
 *
 * The signature covers the exact rendered `Timestamp` parameter, so a time
 * supplied as `2013-01-01T00:00:00-02:00` must render back with the same
 * offset. JavaScript `Date` values carry no offset, hence this wrapper.
 */

import { MwsError } from '../error';

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})$/;

/** Largest UTC offset in use anywhere (UTC+14:00). */
const MAX_OFFSET_MINUTES = 14 * 60;

const MS_PER_MINUTE = 60_000;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function parseOffset(designator: string): number {
  if (designator === 'Z') {
    return 0;
  }

  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));

  if (minutes > 59) {
    return Number.NaN;
  }

  return sign * (hours * 60 + minutes);
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

/**
 * An absolute point in time together with the UTC offset it is expressed in.
 *
 * @example
 * ```typescript
 * Timestamp.parse('2013-01-01T00:00:00-02:00').toISOString();
 * // '2013-01-01T00:00:00-02:00'
 *
 * Timestamp.fromDate(new Date(Date.UTC(2013, 0, 1, 2))).toISOString();
 * // '2013-01-01T02:00:00+00:00'
 * ```
 */
export class Timestamp {
  /** Milliseconds since the epoch, truncated to whole seconds. */
  readonly epochMillis: number;

  /** Offset from UTC in minutes, positive east of Greenwich. */
  readonly offsetMinutes: number;

  private constructor(epochMillis: number, offsetMinutes: number) {
    this.epochMillis = epochMillis;
    this.offsetMinutes = offsetMinutes;
    Object.freeze(this);
  }

  /**
   * Parse an ISO-8601 date-time with an explicit offset (`Z`, `±HH:MM` or
   * `±HHMM`). Fractional seconds are dropped.
   *
   * @throws {MwsError} INVALID_PARAMETER if the input is not such a string
   */
  static parse(input: string, field: string = 'timestamp'): Timestamp {
    const match = ISO_8601.exec(input.trim());
    if (!match) {
      throw new MwsError(
        `${field}: expected ISO-8601 date-time with offset, got "${input}"`,
        'INVALID_PARAMETER',
        field
      );
    }

    const [, year, month, day, hour, minute, second, designator] = match.map(
      (part) => part ?? ''
    );
    const offset = parseOffset(designator);
    // setUTCFullYear keeps years 0000-0099, which Date.UTC maps to 19xx
    const check = new Date(0);
    check.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
    check.setUTCHours(Number(hour), Number(minute), Number(second), 0);
    const local = check.getTime();

    // out-of-range fields roll over; a rollover means the input was invalid
    const valid =
      Number.isFinite(offset) &&
      Math.abs(offset) <= MAX_OFFSET_MINUTES &&
      check.getUTCFullYear() === Number(year) &&
      check.getUTCMonth() === Number(month) - 1 &&
      check.getUTCDate() === Number(day) &&
      check.getUTCHours() === Number(hour) &&
      check.getUTCMinutes() === Number(minute) &&
      check.getUTCSeconds() === Number(second);

    if (!valid) {
      throw new MwsError(
        `${field}: date-time out of range, got "${input}"`,
        'INVALID_PARAMETER',
        field
      );
    }

    return new Timestamp(local - offset * MS_PER_MINUTE, offset);
  }

  /**
   * Wrap a Date, rendering it at the given offset (UTC by default).
   *
   * @throws {MwsError} INVALID_PARAMETER for an invalid Date or offset
   */
  static fromDate(date: Date, offsetMinutes: number = 0, field: string = 'timestamp'): Timestamp {
    const millis = date.getTime();
    if (!Number.isFinite(millis)) {
      throw new MwsError(`${field}: invalid date`, 'INVALID_PARAMETER', field);
    }
    if (!Number.isInteger(offsetMinutes) || Math.abs(offsetMinutes) > MAX_OFFSET_MINUTES) {
      throw new MwsError(
        `${field}: offset must be whole minutes within ±14:00, got ${offsetMinutes}`,
        'INVALID_PARAMETER',
        field
      );
    }

    return new Timestamp(Math.floor(millis / 1000) * 1000, offsetMinutes);
  }

  /**
   * The current wall-clock time, in UTC.
   */
  static now(): Timestamp {
    return Timestamp.fromDate(new Date());
  }

  toDate(): Date {
    return new Date(this.epochMillis);
  }

  /**
   * Render as `YYYY-MM-DDTHH:MM:SS±HH:MM`.
   */
  toISOString(): string {
    const local = new Date(this.epochMillis + this.offsetMinutes * MS_PER_MINUTE);
    const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
    const time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
    return `${date}T${time}${formatOffset(this.offsetMinutes)}`;
  }

  toString(): string {
    return this.toISOString();
  }

  toJSON(): string {
    return this.toISOString();
  }
}
