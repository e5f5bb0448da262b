/**
 * INCOME generation: dividends and capital gain distributions.
 */

import { IncompleteTransactionError, MissingIdentifierError } from '../types/index.js';
import type { BrokerageRow } from '../types/index.js';
import { element, field } from '../ofx/node.js';
import { normalizeCurrency } from '../utils/normalize.js';
import { withTimeSuffix } from '../utils/date-parse.js';
import { secIdElement, securityEntry } from '../securities/resolver.js';
import type { GeneratedTransaction, TransactionContext } from './types.js';

export type IncomeType = 'DIV' | 'CGLONG' | 'CGSHORT';

/**
 * Generate an income record. Income rows must carry a CUSIP: unlike
 * trades there is no description fallback for them.
 *
 * @throws MissingIdentifierError when the row has no CUSIP
 */
export function generateIncome(
    row: BrokerageRow,
    ctx: TransactionContext,
    incomeType: IncomeType
): GeneratedTransaction {
    const description = row.description.trim();
    const cusip = row.cusip.trim();
    if (!cusip) {
        throw new MissingIdentifierError(description);
    }

    const amount = normalizeCurrency(row.amount, false, ctx.warnings);
    if (amount === null) {
        throw new IncompleteTransactionError(`${incomeType} income has no amount`, ctx.fitid);
    }

    const security = ctx.resolver.resolve(row);

    const fragment = element('INCOME', [
        element('INVTRAN', [
            field('FITID', ctx.fitid),
            field('DTTRADE', withTimeSuffix(ctx.dateStr)),
            field('MEMO', description),
        ]),
        secIdElement(security),
        field('INCOMETYPE', incomeType),
        field('TOTAL', amount),
        field('SUBACCTSEC', 'CASH'),
        field('SUBACCTFUND', 'CASH'),
    ]);

    return { fragment, cashType: false, security: securityEntry(security) };
}
