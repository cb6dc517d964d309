import type { ExpiryReport } from '../interfaces';
import { MissingParameterError, ParseError } from './errors';

export const AMZ_DATE_PARAM = 'X-Amz-Date';
export const AMZ_EXPIRES_PARAM = 'X-Amz-Expires';

// YYYYMMDD'T'HHMMSS'Z', e.g. 20240115T120000Z
const AMZ_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
// Digits may be grouped with single underscores: 1_000
const EXPIRES_PATTERN = /^\s*[+-]?\d+(?:_\d+)*\s*$/;

// Representable range of a report timestamp: years 1 through 9999
const MIN_INSTANT = Date.parse('0001-01-01T00:00:00.000Z');
const MAX_INSTANT = Date.parse('9999-12-31T23:59:59.999Z');

/**
 * Result of evaluating one presigned URL against one clock reading
 */
export interface ExpiryCheck {
    issuedAt: Date;
    expiresIn: number;
    expiresAt: Date;
    checkedAt: Date;
    expired: boolean;
}

/**
 * Collect the query string of a URL into a name -> value map.
 *
 * Only the first non-blank value of a repeated name is kept. The fragment is
 * dropped and everything after the first `?` is taken as the query, so a
 * string that is not a well-formed URL simply yields fewer (or no) entries.
 */
export function extractQueryParameters(url: string): Map<string, string> {
    const withoutFragment = url.split('#', 1)[0];
    const queryStart = withoutFragment.indexOf('?');
    const query = queryStart === -1 ? '' : withoutFragment.slice(queryStart + 1);

    const parameters = new Map<string, string>();
    for (const [name, value] of new URLSearchParams(query)) {
        if (value !== '' && !parameters.has(name)) {
            parameters.set(name, value);
        }
    }
    return parameters;
}

/**
 * Parse an X-Amz-Date value into a UTC instant
 * @throws ParseError if the value does not match the format or names no real instant
 */
export function parseAmzDate(value: string): Date {
    const match = AMZ_DATE_PATTERN.exec(value);
    if (!match) {
        throw new ParseError(`${AMZ_DATE_PARAM} "${value}" does not match format YYYYMMDD'T'HHMMSS'Z'`);
    }

    const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
    const outOfRange = (field: string) =>
        new ParseError(`${AMZ_DATE_PARAM} "${value}" is out of range: invalid ${field}`);

    if (year < 1) throw outOfRange('year');
    if (month < 1 || month > 12) throw outOfRange('month');
    if (hour > 23) throw outOfRange('hour');
    if (minute > 59) throw outOfRange('minute');
    if (second > 59) throw outOfRange('second');

    // setUTCFullYear keeps years below 100 literal, Date.UTC would map them to 19xx
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);

    // Feb 30 and friends roll over into the next month
    if (day < 1 || date.getUTCDate() !== day) throw outOfRange('day for month');

    return date;
}

/**
 * Parse an X-Amz-Expires value as a whole number of seconds.
 * Negative values are accepted and yield an expiry before the issue time.
 * @throws ParseError if the value is not a base-10 integer
 */
export function parseExpiresSeconds(value: string): number {
    if (!EXPIRES_PATTERN.test(value)) {
        throw new ParseError(`${AMZ_EXPIRES_PARAM} "${value}" is not a base-10 integer`);
    }
    const seconds = Number(value.trim().replaceAll('_', ''));
    if (!Number.isSafeInteger(seconds)) {
        throw new ParseError(`${AMZ_EXPIRES_PARAM} "${value}" is out of range`);
    }
    // "-0"
    return seconds === 0 ? 0 : seconds;
}

/**
 * Add a duration to an instant
 * @throws ParseError if the result falls outside years 1 through 9999
 */
export function addSeconds(date: Date, seconds: number): Date {
    const result = new Date(date.getTime() + seconds * 1000);
    const time = result.getTime();
    if (!(time >= MIN_INSTANT && time <= MAX_INSTANT)) {
        throw new ParseError(`expiry date is out of range: ${formatUtcTimestamp(date)} + ${seconds}s`);
    }
    return result;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Format an instant as `YYYY-MM-DD HH:MM:SS`, appending a six-digit
 * microsecond fraction only when it is non-zero. The clock only has
 * millisecond resolution, so the last three digits are always zero.
 * No zone suffix is added.
 */
export function formatUtcTimestamp(date: Date): string {
    const stamp =
        `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
    const millis = date.getUTCMilliseconds();
    return millis === 0 ? stamp : `${stamp}.${pad(millis, 3)}000`;
}

/**
 * Evaluate a presigned URL against a single clock reading.
 *
 * The URL is still valid while `now` is strictly before
 * X-Amz-Date + X-Amz-Expires; at the expiry instant itself it has expired.
 *
 * @param url Presigned URL to inspect
 * @param now Clock reading to compare against; sampled by the caller exactly once
 * @throws MissingParameterError if either parameter is absent
 * @throws ParseError if either parameter is malformed
 */
export function checkPresignedUrlExpiry(url: string, now: Date): ExpiryCheck {
    const parameters = extractQueryParameters(url);
    const amzDate = parameters.get(AMZ_DATE_PARAM);
    const amzExpires = parameters.get(AMZ_EXPIRES_PARAM);
    if (amzDate === undefined || amzExpires === undefined) {
        throw new MissingParameterError();
    }

    const issuedAt = parseAmzDate(amzDate);
    const expiresIn = parseExpiresSeconds(amzExpires);
    const expiresAt = addSeconds(issuedAt, expiresIn);

    return {
        issuedAt,
        expiresIn,
        expiresAt,
        checkedAt: now,
        expired: !(now.getTime() < expiresAt.getTime()),
    };
}

/**
 * Project an {@link ExpiryCheck} onto its JSON wire form
 */
export function toExpiryReport(check: ExpiryCheck): ExpiryReport {
    return {
        generatedAt: check.issuedAt.toISOString(),
        expiresAt: check.expiresAt.toISOString(),
        checkedAt: check.checkedAt.toISOString(),
        expiresIn: check.expiresIn,
        expired: check.expired,
        secondsRemaining: Math.floor((check.expiresAt.getTime() - check.checkedAt.getTime()) / 1000),
    };
}
