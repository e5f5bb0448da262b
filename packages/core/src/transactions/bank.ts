/**
 * INVBANKTRAN generation for fees and interest.
 * Cash movements with no security reference.
 */

import { CURRENCY, IncompleteTransactionError } from '../types/index.js';
import type { BrokerageRow } from '../types/index.js';
import { element, field } from '../ofx/node.js';
import { normalizeCurrency } from '../utils/normalize.js';
import type { GeneratedTransaction, TransactionContext } from './types.js';
import { activityMemo } from './fitid.js';

type BankTransactionType = 'FEE' | 'INT';

function generateBankTransaction(
    row: BrokerageRow,
    ctx: TransactionContext,
    trnType: BankTransactionType,
    invert: boolean
): GeneratedTransaction {
    const amount = normalizeCurrency(row.amount, invert, ctx.warnings);
    if (amount === null) {
        throw new IncompleteTransactionError(`${trnType} transaction has no amount`, ctx.fitid);
    }

    const fragment = element('INVBANKTRAN', [
        element('STMTTRN', [
            field('TRNTYPE', trnType),
            field('DTPOSTED', ctx.dateStr),
            field('TRNAMT', amount),
            field('FITID', ctx.fitid),
            field('MEMO', activityMemo(row.activity, row.description)),
            element('CURRENCY', [
                field('CURRATE', CURRENCY.RATE),
                field('CURSYM', CURRENCY.SYMBOL),
            ]),
        ]),
        field('SUBACCTFUND', 'CASH'),
    ]);

    return { fragment, cashType: true, security: null };
}

/**
 * Advisory fees and journal entries, amount as exported.
 */
export function generateFee(row: BrokerageRow, ctx: TransactionContext): GeneratedTransaction {
    return generateBankTransaction(row, ctx, 'FEE', false);
}

/**
 * Cash interest. The export reports interest with the opposite sign of
 * the statement convention, so the amount is inverted.
 */
export function generateInterest(row: BrokerageRow, ctx: TransactionContext): GeneratedTransaction {
    return generateBankTransaction(row, ctx, 'INT', true);
}
