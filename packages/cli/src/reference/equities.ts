import { readFileSync, existsSync } from 'node:fs';
import { parseEquityTickers, type SecurityClassifier } from '@qfx-convert/core';
import { ConfigurationError } from '@qfx-convert/shared';
import { toArrayBuffer } from '../utils/buffer.js';

/**
 * Fund/equity lookup backed by a ticker list on disk.
 *
 * The dataset is loaded on the first query and kept for the life of the
 * instance; each query is a set lookup. A symbol missing from the list is
 * a mutual fund.
 */
export class EquityReferenceClassifier implements SecurityClassifier {
    private tickers: Set<string> | null = null;

    constructor(private readonly path: string) {}

    isMutualFund(symbol: string): boolean {
        return !this.load().has(symbol.trim());
    }

    private load(): Set<string> {
        if (this.tickers === null) {
            if (!existsSync(this.path)) {
                throw new ConfigurationError(`Equity reference file '${this.path}' not found`, { path: this.path });
            }
            this.tickers = parseEquityTickers(toArrayBuffer(readFileSync(this.path)));
        }
        return this.tickers;
    }
}
