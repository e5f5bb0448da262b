/**
 * BUYSTOCK / BUYMF / SELLSTOCK / SELLMF generation.
 *
 * Unit price is always derived from amount and quantity when both exist;
 * a supplied price only serves as a cross-check.
 */

import { Decimal } from 'decimal.js';
import { IncompleteTransactionError, PRICE_TOLERANCE } from '../types/index.js';
import { element, field } from '../ofx/node.js';
import { computePrice, isNumeric, normalizeCurrency, normalizeQuantity } from '../utils/normalize.js';
import { secIdElement, securityEntry } from '../securities/resolver.js';
import type { BrokerageRow } from '../types/index.js';
import type { GeneratedTransaction, TransactionContext } from './types.js';
import { activityMemo, settlementDateString } from './fitid.js';

export interface BuySellOptions {
    sell: boolean;
    /** Used when the row carries no amount */
    defaultAmount?: string;
}

interface TradeValues {
    quantity: string;
    price: string;
    amount: string;
}

/**
 * Generate a buy or sell record plus its security-list entry.
 *
 * @throws IncompleteTransactionError when neither amount nor price is usable
 * @throws UnresolvedSecurityError when the security cannot be identified
 */
export function generateBuySell(
    row: BrokerageRow,
    ctx: TransactionContext,
    options: BuySellOptions
): GeneratedTransaction {
    const values = deriveTradeValues(row, ctx, options.defaultAmount);
    const security = ctx.resolver.resolve(row);

    const side = options.sell ? 'SELL' : 'BUY';
    const outer = `${side}${security.kind === 'fund' ? 'MF' : 'STOCK'}`;

    const fragment = element(outer, [
        element(`INV${side}`, [
            element('INVTRAN', [
                field('FITID', ctx.fitid),
                field('DTTRADE', ctx.dateStr),
                field('DTSETTLE', settlementDateString(ctx.tradeDate, ctx.dateStr)),
                field('MEMO', activityMemo(row.activity, row.description)),
            ]),
            secIdElement(security),
            field('UNITS', values.quantity),
            field('UNITPRICE', values.price),
            field('TOTAL', values.amount),
            field('SUBACCTSEC', 'CASH'),
            field('SUBACCTFUND', 'CASH'),
        ]),
        field(`${side}TYPE`, side),
    ]);

    return { fragment, cashType: false, security: securityEntry(security) };
}

/**
 * Resolve quantity, unit price and total from whatever the row supplies.
 *
 * - quantity + amount → price computed, supplied price cross-checked
 * - quantity + price, no amount → amount = -(quantity × price)
 */
export function deriveTradeValues(
    row: BrokerageRow,
    ctx: Pick<TransactionContext, 'fitid' | 'warnings'>,
    defaultAmount?: string
): TradeValues {
    const quantity = normalizeQuantity(row.quantity);
    const price = normalizeCurrency(row.price, false, ctx.warnings);
    const amount = normalizeCurrency(row.amount, false, ctx.warnings) ?? defaultAmount ?? null;

    if (quantity && amount !== null) {
        const computed = computePrice(quantity, amount);
        if (price !== null && new Decimal(computed).minus(price).abs().greaterThan(PRICE_TOLERANCE)) {
            ctx.warnings.push(
                `Given price ${price} differs from calculated price ${computed} ` +
                `for ${row.symbol.trim()} - ${row.description.trim()} (FITID: ${ctx.fitid})`
            );
        }
        return { quantity, price: computed, amount };
    }

    if (quantity && price !== null) {
        const total = isNumeric(quantity)
            ? new Decimal(quantity).times(price).negated().toFixed(2)
            : '0.00';
        return { quantity, price, amount: total };
    }

    throw new IncompleteTransactionError(
        'Transaction should have either amount or price but neither is supplied',
        ctx.fitid
    );
}
