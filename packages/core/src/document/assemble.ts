/**
 * Statement assembly: runs every row through the generators and collects
 * the results in document order.
 *
 * PURE FUNCTION apart from the injected classifier. All errors are fatal;
 * no row is skipped.
 */

import {
    AccountNotMappedError,
    DEFAULT_INSTITUTION,
    EmptyStatementError,
} from '../types/index.js';
import type { AccountMapping, BrokerageRow, ConverterConfig, Institution } from '../types/index.js';
import type { OfxElement } from '../ofx/node.js';
import { SecurityResolver } from '../securities/resolver.js';
import type { SecurityClassifier, SecurityEntry } from '../securities/types.js';
import { generateTransaction } from '../transactions/classify.js';
import { parseBrokerageDate } from '../utils/date-parse.js';

export interface StatementOptions {
    config: ConverterConfig;
    classifier: SecurityClassifier;
    /** Clock for DTSERVER/DTASOF and empty date bounds */
    now?: Date;
}

export interface AssembledStatement {
    accountId: string;
    institution: Institution;
    /** Non-cash transactions first, then cash-type, input order within each */
    transactions: OfxElement[];
    /** Deduplicated by id, first occurrence wins */
    securities: SecurityEntry[];
    startDate: Date | null;
    endDate: Date | null;
    generatedAt: Date;
    warnings: string[];
}

/**
 * Look up an account id by display name (trimmed).
 *
 * @throws AccountNotMappedError
 */
export function resolveAccountId(accountName: string, mapping: AccountMapping): string {
    const name = accountName.trim();
    const accountId = new Map(Object.entries(mapping)).get(name);
    if (accountId === undefined) {
        throw new AccountNotMappedError(name);
    }
    return accountId;
}

/**
 * Assemble a statement from validated export rows.
 *
 * The first row's account names the statement account; later rows are
 * assumed to belong to the same account.
 */
export function assembleStatement(rows: readonly BrokerageRow[], options: StatementOptions): AssembledStatement {
    if (rows.length === 0) {
        throw new EmptyStatementError();
    }

    const { config } = options;
    const accountId = resolveAccountId(rows[0].account, config.account_id_mapping);
    const resolver = new SecurityResolver(config.missing_cusip_mapping, options.classifier);

    const warnings: string[] = [];
    const investmentTxns: OfxElement[] = [];
    const cashTxns: OfxElement[] = [];
    const securities = new Map<string, SecurityEntry>();
    let startDate: Date | null = null;
    let endDate: Date | null = null;

    for (const [index, row] of rows.entries()) {
        const date = parseBrokerageDate(row.date);
        if (date) {
            if (!startDate || date < startDate) startDate = date;
            if (!endDate || date > endDate) endDate = date;
        }

        const generated = generateTransaction(row, index + 1, { resolver, warnings });
        (generated.cashType ? cashTxns : investmentTxns).push(generated.fragment);

        if (generated.security && !securities.has(generated.security.id)) {
            securities.set(generated.security.id, generated.security);
        }
    }

    return {
        accountId,
        institution: { ...DEFAULT_INSTITUTION, ...config.institution },
        transactions: [...investmentTxns, ...cashTxns],
        securities: [...securities.values()],
        startDate,
        endDate,
        generatedAt: options.now ?? new Date(),
        warnings,
    };
}
