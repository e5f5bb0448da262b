import type { OfxElement } from '../ofx/node.js';

/**
 * Answers whether a ticker is a mutual fund (otherwise an equity).
 * Backed by an external reference dataset; injected into the resolver.
 */
export interface SecurityClassifier {
    isMutualFund(symbol: string): boolean;
}

export type SecurityKind = 'fund' | 'stock';

export type UniqueIdType = 'CUSIP' | 'OTHER';

/**
 * Identity of the security a row refers to.
 */
export interface ResolvedSecurity {
    uniqueId: string;
    uniqueIdType: UniqueIdType;
    symbol: string;
    kind: SecurityKind;
    /** SECLIST aggregate: MFINFO, STOCKINFO, or a rule-supplied tag */
    infoTag: string;
}

/**
 * One security-list record, keyed by unique id.
 */
export interface SecurityEntry {
    id: string;
    info: OfxElement;
}
