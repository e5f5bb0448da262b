import type { BrokerageRow } from '../types/index.js';
import { assembleStatement, type StatementOptions } from './assemble.js';
import { renderStatement } from './render.js';

export interface ConversionResult {
    content: string;
    accountId: string;
    transactionCount: number;
    securityCount: number;
    startDate: Date | null;
    endDate: Date | null;
    warnings: string[];
}

/**
 * Convert validated export rows into a QFX document.
 * Throws on the first fatal error; nothing is rendered in that case.
 */
export function convertStatement(rows: readonly BrokerageRow[], options: StatementOptions): ConversionResult {
    const statement = assembleStatement(rows, options);
    return {
        content: renderStatement(statement),
        accountId: statement.accountId,
        transactionCount: statement.transactions.length,
        securityCount: statement.securities.length,
        startDate: statement.startDate,
        endDate: statement.endDate,
        warnings: statement.warnings,
    };
}
