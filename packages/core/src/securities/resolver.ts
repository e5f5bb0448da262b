/**
 * Security identity resolution.
 *
 * A row's CUSIP is authoritative. Rows without one (money market sweeps,
 * pooled funds) are matched by description against the ordered
 * `missing_cusip_mapping` rules.
 */

import type { BrokerageRow, MissingCusipRule } from '../types/index.js';
import { CASH_SECURITY, UnresolvedSecurityError } from '../types/index.js';
import { element, field, type OfxElement } from '../ofx/node.js';
import type { ResolvedSecurity, SecurityClassifier, SecurityEntry } from './types.js';

export class SecurityResolver {
    private readonly rules: ReadonlyArray<{ regex: RegExp; rule: MissingCusipRule }>;

    constructor(
        rules: readonly MissingCusipRule[],
        private readonly classifier: SecurityClassifier
    ) {
        this.rules = rules.map((rule) => ({ regex: new RegExp(rule.description_regex), rule }));
    }

    /**
     * Resolve the security a row refers to.
     *
     * @throws UnresolvedSecurityError when there is no CUSIP and no rule matches
     */
    resolve(row: BrokerageRow): ResolvedSecurity {
        const cusip = row.cusip.trim();
        if (cusip) {
            const symbol = row.symbol.trim() || cusip;
            const isFund = this.classifier.isMutualFund(symbol);
            return {
                uniqueId: cusip,
                uniqueIdType: 'CUSIP',
                symbol,
                kind: isFund ? 'fund' : 'stock',
                infoTag: isFund ? 'MFINFO' : 'STOCKINFO',
            };
        }

        const description = row.description.trim();
        const match = this.findRule(description);
        if (!match) {
            throw new UnresolvedSecurityError(description);
        }
        // info_tag only picks the security-list aggregate; the lookup decides fund vs. stock
        return {
            uniqueId: match.uniqueid,
            uniqueIdType: 'OTHER',
            symbol: match.symbol,
            kind: this.classifier.isMutualFund(match.symbol) ? 'fund' : 'stock',
            infoTag: match.info_tag,
        };
    }

    /**
     * First rule whose regex matches the description (case-sensitive search).
     */
    findRule(description: string): MissingCusipRule | undefined {
        return this.rules.find(({ regex }) => regex.test(description))?.rule;
    }
}

/**
 * SECID aggregate referencing a resolved security.
 */
export function secIdElement(security: Pick<ResolvedSecurity, 'uniqueId' | 'uniqueIdType'>): OfxElement {
    return element('SECID', [
        field('UNIQUEID', security.uniqueId),
        field('UNIQUEIDTYPE', security.uniqueIdType),
    ]);
}

/**
 * Security-list entry for a resolved security.
 */
export function securityEntry(security: ResolvedSecurity): SecurityEntry {
    return {
        id: security.uniqueId,
        info: element(security.infoTag, [
            element('SECINFO', [
                secIdElement(security),
                field('SECNAME', security.symbol),
                field('TICKER', security.symbol),
            ]),
        ]),
    };
}

/**
 * SECID of the synthetic cash position.
 */
export function cashSecIdElement(): OfxElement {
    return element('SECID', [
        field('UNIQUEID', CASH_SECURITY.ID),
        field('UNIQUEIDTYPE', CASH_SECURITY.ID_TYPE),
    ]);
}

/**
 * Security-list entry for the synthetic cash position. Identical for every
 * cash transfer, so it dedupes to one entry.
 */
export function cashSecurityEntry(): SecurityEntry {
    return {
        id: CASH_SECURITY.ID,
        info: element(CASH_SECURITY.INFO_TAG, [
            element('SECINFO', [
                cashSecIdElement(),
                field('SECNAME', CASH_SECURITY.NAME),
            ]),
        ]),
    };
}
