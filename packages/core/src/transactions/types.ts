import type { OfxElement } from '../ofx/node.js';
import type { SecurityResolver } from '../securities/resolver.js';
import type { SecurityEntry } from '../securities/types.js';

/**
 * Per-row inputs shared by every generator.
 */
export interface TransactionContext {
    /** TXN + YYYYMMDD + counter */
    fitid: string;
    /** Trade date as YYYYMMDD, or 00000000 when unparseable */
    dateStr: string;
    tradeDate: Date | null;
    resolver: SecurityResolver;
    /** Non-fatal findings, forwarded to the caller */
    warnings: string[];
}

/**
 * One generated INVTRANLIST entry.
 */
export interface GeneratedTransaction {
    fragment: OfxElement;
    /** Bank-style cash movement; listed after all other transactions */
    cashType: boolean;
    security: SecurityEntry | null;
}

export type TransactionKind =
    | 'buy'
    | 'sell'
    | 'transfer'
    | 'dividend'
    | 'interest'
    | 'long-term-gain'
    | 'short-term-gain'
    | 'fee'
    | 'reinvest-dist';
