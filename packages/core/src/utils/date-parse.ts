/**
 * Date parsing and OFX date formatting.
 * All dates are handled in UTC (00:00:00Z).
 */

import { OFX_TIME_SUFFIX } from '../types/index.js';

/**
 * Parse a brokerage date: MM/DD/YYYY first, then YYYY-MM-DD.
 * Returns null when neither matches.
 */
export function parseBrokerageDate(value: string): Date | null {
    const s = value.trim();
    return parseMdyDate(s) ?? parseIsoDate(s);
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[3]), parseInt(match[1]), parseInt(match[2]));
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1]), parseInt(match[2]), parseInt(match[3]));
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Rejects rollover such as 02/30 → 03/02
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Format Date as YYYYMMDD (UTC).
 */
export function formatOfxDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}${month}${day}`;
}

/**
 * Document-level timestamp: YYYYMMDD at local noon with a fixed EST offset,
 * whatever the time component of `date`. Null uses `now`.
 *
 * The calendar day is taken in UTC, also for `now`; shortly before local
 * midnight west of UTC that is already the next day.
 */
export function formatDocumentTimestamp(date: Date | null, now: Date = new Date()): string {
    return formatOfxDate(date ?? now) + OFX_TIME_SUFFIX;
}

/**
 * Append the document time suffix to an already formatted YYYYMMDD string.
 */
export function withTimeSuffix(dateStr: string): string {
    return dateStr + OFX_TIME_SUFFIX;
}

/**
 * Format Date as YYYYMMDDHHMMSS (UTC), used for DTSERVER.
 */
export function formatServerTimestamp(date: Date): string {
    const hours = String(date.getUTCHours()).padStart(2, '0');
    const minutes = String(date.getUTCMinutes()).padStart(2, '0');
    const seconds = String(date.getUTCSeconds()).padStart(2, '0');
    return `${formatOfxDate(date)}${hours}${minutes}${seconds}`;
}

/**
 * Add whole calendar days (UTC).
 */
export function addDays(date: Date, days: number): Date {
    const result = new Date(date.getTime());
    result.setUTCDate(result.getUTCDate() + days);
    return result;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
