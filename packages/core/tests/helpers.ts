import type { BrokerageRow, ConverterConfig } from '@qfx-convert/shared';
import type { SecurityClassifier } from '../src/securities/types.js';
import { SecurityResolver } from '../src/securities/resolver.js';
import type { TransactionContext } from '../src/transactions/types.js';

/**
 * In-memory fund/equity lookup. Records every query.
 */
export class FakeClassifier implements SecurityClassifier {
    readonly queries: string[] = [];

    constructor(private readonly equities: readonly string[] = ['AAPL', 'VTI']) {}

    isMutualFund(symbol: string): boolean {
        this.queries.push(symbol);
        return !this.equities.includes(symbol);
    }
}

export const TEST_CONFIG: ConverterConfig = {
    account_id_mapping: {
        'Brokerage Individual': 'ACCT-0001',
    },
    missing_cusip_mapping: [
        { description_regex: 'CASH SWEEP', uniqueid: 'SWEEP0001', symbol: 'SWEEP', info_tag: 'MFINFO' },
        { description_regex: '^POOLED EQUITY', uniqueid: 'POOL0001', symbol: 'POOLEQ', info_tag: 'STOCKINFO' },
    ],
};

export function makeRow(overrides: Partial<BrokerageRow> = {}): BrokerageRow {
    return {
        date: '01/05/2024',
        account: 'Brokerage Individual',
        activity: 'Buy',
        description: 'APPLE INC',
        cusip: '037833100',
        symbol: 'AAPL',
        quantity: '10',
        price: '150.00',
        amount: '-1500.00',
        ...overrides,
    };
}

export function makeContext(
    overrides: Partial<TransactionContext> = {},
    classifier: SecurityClassifier = new FakeClassifier()
): TransactionContext {
    return {
        fitid: 'TXN202401050001',
        dateStr: '20240105',
        tradeDate: new Date(Date.UTC(2024, 0, 5)),
        resolver: new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, classifier),
        warnings: [],
        ...overrides,
    };
}

/**
 * Encode CSV lines as the ArrayBuffer the parsers receive.
 */
export function csvBuffer(lines: readonly string[]): ArrayBuffer {
    const bytes = new TextEncoder().encode(lines.join('\n'));
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return buffer;
}
