/**
 * Activity dispatch: routes each export row to its record generator.
 *
 * Rules are evaluated in order, first match wins. The funding override
 * runs before the "buy" rule because account funding events are exported
 * labeled as buys.
 */

import { Decimal } from 'decimal.js';
import {
    ACTIVITY_GROUPS,
    REINVEST_DIST_DEFAULT_AMOUNT,
    UnknownActivityError,
} from '../types/index.js';
import type { BrokerageRow } from '../types/index.js';
import { isNumeric, normalizeCurrency, normalizeQuantity } from '../utils/normalize.js';
import { parseBrokerageDate } from '../utils/date-parse.js';
import type { SecurityResolver } from '../securities/resolver.js';
import type { GeneratedTransaction, TransactionContext, TransactionKind } from './types.js';
import { buildFitId, tradeDateString } from './fitid.js';
import { generateBuySell } from './buy-sell.js';
import { generateFee, generateInterest } from './bank.js';
import { generateIncome } from './income.js';
import { generateTransfer } from './transfer.js';

const ACTIVITY_KINDS: ReadonlyArray<{ labels: readonly string[]; kind: TransactionKind }> = [
    { labels: ACTIVITY_GROUPS.BUY, kind: 'buy' },
    { labels: ACTIVITY_GROUPS.SELL, kind: 'sell' },
    { labels: ACTIVITY_GROUPS.TRANSFER, kind: 'transfer' },
    { labels: ACTIVITY_GROUPS.DIVIDEND, kind: 'dividend' },
    { labels: ACTIVITY_GROUPS.INTEREST, kind: 'interest' },
    { labels: ACTIVITY_GROUPS.LONG_TERM_GAIN, kind: 'long-term-gain' },
    { labels: ACTIVITY_GROUPS.SHORT_TERM_GAIN, kind: 'short-term-gain' },
    { labels: ACTIVITY_GROUPS.FEE, kind: 'fee' },
    { labels: ACTIVITY_GROUPS.REINVEST_DIST, kind: 'reinvest-dist' },
];

/**
 * Detect an account funding event exported as a "buy": description ends
 * with "initial", no CUSIP or symbol, and amount equals -quantity.
 * The matching reversal (the real fund purchase) follows as a regular buy.
 */
export function isFundingActivity(row: BrokerageRow): boolean {
    if (row.activity.trim().toLowerCase() !== 'buy') return false;
    if (!row.description.trim().toLowerCase().endsWith('initial')) return false;
    if (row.cusip.trim() || row.symbol.trim()) return false;

    const amount = normalizeCurrency(row.amount);
    const quantity = normalizeQuantity(row.quantity);
    if (amount === null || !isNumeric(quantity)) return false;

    return new Decimal(amount).equals(new Decimal(quantity).negated());
}

/**
 * Classify a row into the generator that will render it.
 *
 * @throws UnknownActivityError for unrecognized activity labels
 */
export function classifyActivity(row: BrokerageRow): TransactionKind {
    if (isFundingActivity(row)) {
        return 'transfer';
    }

    const activity = row.activity.trim().toLowerCase();
    const match = ACTIVITY_KINDS.find(({ labels }) => labels.includes(activity));
    if (!match) {
        throw new UnknownActivityError(row.activity);
    }
    return match.kind;
}

/**
 * Dependencies and per-run state for transaction generation.
 */
export interface GenerateOptions {
    resolver: SecurityResolver;
    warnings: string[];
}

/**
 * Generate the record for one row.
 *
 * @param row - Validated export row
 * @param counter - Per-run sequence number, starting at 1
 */
export function generateTransaction(
    row: BrokerageRow,
    counter: number,
    options: GenerateOptions
): GeneratedTransaction {
    const tradeDate = parseBrokerageDate(row.date);
    const dateStr = tradeDateString(tradeDate);
    const ctx: TransactionContext = {
        fitid: buildFitId(dateStr, counter),
        dateStr,
        tradeDate,
        resolver: options.resolver,
        warnings: options.warnings,
    };

    const kind = classifyActivity(row);
    switch (kind) {
        case 'buy':
            return generateBuySell(row, ctx, { sell: false });
        case 'sell':
            return generateBuySell(row, ctx, { sell: true });
        case 'transfer':
            return generateTransfer(row, ctx);
        case 'dividend':
            return generateIncome(row, ctx, 'DIV');
        case 'interest':
            return generateInterest(row, ctx);
        case 'long-term-gain':
            return generateIncome(row, ctx, 'CGLONG');
        case 'short-term-gain':
            return generateIncome(row, ctx, 'CGSHORT');
        case 'fee':
            return generateFee(row, ctx);
        case 'reinvest-dist':
            return generateBuySell(row, ctx, { sell: false, defaultAmount: REINVEST_DIST_DEFAULT_AMOUNT });
    }
}
