/**
 * TRANSFER generation for cash movements and in-kind security transfers.
 */

import { IncompleteTransactionError } from '../types/index.js';
import type { BrokerageRow } from '../types/index.js';
import { element, field, type OfxElement } from '../ofx/node.js';
import { normalizeCurrency, normalizeQuantity } from '../utils/normalize.js';
import { withTimeSuffix } from '../utils/date-parse.js';
import {
    cashSecIdElement,
    cashSecurityEntry,
    secIdElement,
    securityEntry,
} from '../securities/resolver.js';
import type { GeneratedTransaction, TransactionContext } from './types.js';
import { activityMemo } from './fitid.js';

export type TransferAction = 'IN' | 'OUT';

/**
 * Direction from a signed value: leading "-" is OUT.
 */
export function transferDirection(value: string): TransferAction {
    return value.startsWith('-') ? 'OUT' : 'IN';
}

/**
 * Generate a transfer record.
 *
 * - No CUSIP: cash transfer against the synthetic CASH security,
 *   units = amount, direction from the amount sign.
 * - CUSIP: security transfer, units = quantity, direction always IN.
 */
export function generateTransfer(row: BrokerageRow, ctx: TransactionContext): GeneratedTransaction {
    const invtran = element('INVTRAN', [
        field('FITID', ctx.fitid),
        field('DTTRADE', withTimeSuffix(ctx.dateStr)),
        field('MEMO', activityMemo(row.activity, row.description)),
    ]);

    if (!row.cusip.trim()) {
        return generateCashTransfer(row, ctx, invtran);
    }

    const security = ctx.resolver.resolve(row);
    const quantity = normalizeQuantity(row.quantity);

    // TFERACTION is IN regardless of the quantity sign
    const fragment = element('TRANSFER', [
        invtran,
        secIdElement(security),
        field('SUBACCTSEC', 'CASH'),
        field('UNITS', quantity),
        field('TFERACTION', 'IN'),
        field('POSTYPE', 'LONG'),
    ]);

    return { fragment, cashType: false, security: securityEntry(security) };
}

function generateCashTransfer(
    row: BrokerageRow,
    ctx: TransactionContext,
    invtran: OfxElement
): GeneratedTransaction {
    const amount = normalizeCurrency(row.amount, false, ctx.warnings);
    if (amount === null) {
        throw new IncompleteTransactionError('Cash transfer has no amount', ctx.fitid);
    }

    const fragment = element('TRANSFER', [
        invtran,
        cashSecIdElement(),
        field('SUBACCTSEC', 'CASH'),
        field('UNITS', amount),
        field('TFERACTION', transferDirection(amount)),
        field('POSTYPE', 'LONG'),
    ]);

    return { fragment, cashType: false, security: cashSecurityEntry() };
}
