/**
 * Transaction id and date helpers shared by the generators.
 */

import { FITID, SETTLEMENT_DAYS, UNKNOWN_DATE } from '../types/index.js';
import { addDays, formatOfxDate } from '../utils/date-parse.js';

/**
 * YYYYMMDD of the trade date, or the zero placeholder.
 */
export function tradeDateString(tradeDate: Date | null): string {
    return tradeDate ? formatOfxDate(tradeDate) : UNKNOWN_DATE;
}

/**
 * Build a FITID: prefix + trade date + zero-padded counter.
 *
 * @example buildFitId('20240105', 7) → 'TXN202401050007'
 */
export function buildFitId(dateStr: string, counter: number): string {
    return `${FITID.PREFIX}${dateStr}${String(counter).padStart(FITID.COUNTER_WIDTH, '0')}`;
}

/**
 * Settlement date (trade + 2 days), or the unadjusted string when the
 * trade date did not parse.
 */
export function settlementDateString(tradeDate: Date | null, dateStr: string): string {
    if (!tradeDate) {
        return dateStr;
    }
    return formatOfxDate(addDays(tradeDate, SETTLEMENT_DAYS));
}

/**
 * "<Activity>: <Description>" memo used by most record types.
 */
export function activityMemo(activity: string, description: string): string {
    return `${activity.trim()}: ${description.trim()}`;
}
