import { describe, it, expect } from 'vitest';
import { UnresolvedSecurityError } from '@qfx-convert/shared';
import {
    SecurityResolver,
    cashSecurityEntry,
    secIdElement,
    securityEntry,
} from '../../src/securities/resolver.js';
import { renderNode } from '../../src/ofx/node.js';
import { FakeClassifier, TEST_CONFIG, makeRow } from '../helpers.js';

describe('SecurityResolver', () => {
    it('uses the CUSIP and classifies an equity as a stock', () => {
        const classifier = new FakeClassifier();
        const resolver = new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, classifier);

        expect(resolver.resolve(makeRow())).toEqual({
            uniqueId: '037833100',
            uniqueIdType: 'CUSIP',
            symbol: 'AAPL',
            kind: 'stock',
            infoTag: 'STOCKINFO',
        });
        expect(classifier.queries).toEqual(['AAPL']);
    });

    it('classifies a ticker missing from the reference data as a fund', () => {
        const resolver = new SecurityResolver([], new FakeClassifier());
        const security = resolver.resolve(makeRow({ cusip: '922908363', symbol: 'VFIAX' }));

        expect(security.kind).toBe('fund');
        expect(security.infoTag).toBe('MFINFO');
    });

    it('falls back to the CUSIP as symbol when Symbol is empty', () => {
        const classifier = new FakeClassifier();
        const resolver = new SecurityResolver([], classifier);
        const security = resolver.resolve(makeRow({ cusip: ' 123456789 ', symbol: '' }));

        expect(security.uniqueId).toBe('123456789');
        expect(security.symbol).toBe('123456789');
        expect(classifier.queries).toEqual(['123456789']);
    });

    it('matches rules in order when there is no CUSIP', () => {
        const classifier = new FakeClassifier();
        const resolver = new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, classifier);

        expect(resolver.resolve(makeRow({ cusip: '', symbol: '', description: 'BANK CASH SWEEP FUND' }))).toEqual({
            uniqueId: 'SWEEP0001',
            uniqueIdType: 'OTHER',
            symbol: 'SWEEP',
            kind: 'fund',
            infoTag: 'MFINFO',
        });
        expect(classifier.queries).toEqual(['SWEEP']);
    });

    it('asks the lookup about the rule symbol and keeps the rule info tag', () => {
        const classifier = new FakeClassifier(['POOLEQ']);
        const resolver = new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, classifier);

        expect(resolver.resolve(makeRow({ cusip: '', description: 'POOLED EQUITY TRUST' })).kind).toBe('stock');
        expect(classifier.queries).toEqual(['POOLEQ']);
    });

    it('lets the lookup decide fund vs. stock even against a STOCKINFO rule', () => {
        const classifier = new FakeClassifier([]);
        const resolver = new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, classifier);
        const security = resolver.resolve(makeRow({ cusip: '', description: 'POOLED EQUITY TRUST' }));

        expect(security.kind).toBe('fund');
        expect(security.infoTag).toBe('STOCKINFO');
        expect(classifier.queries).toEqual(['POOLEQ']);
    });

    it('queries the lookup again for a repeated symbol', () => {
        const classifier = new FakeClassifier();
        const resolver = new SecurityResolver([], classifier);

        resolver.resolve(makeRow());
        resolver.resolve(makeRow({ date: '01/06/2024' }));

        expect(classifier.queries).toEqual(['AAPL', 'AAPL']);
    });

    it('returns the first matching rule', () => {
        const resolver = new SecurityResolver(
            [
                { description_regex: 'FUND', uniqueid: 'FIRST', symbol: 'F1', info_tag: 'MFINFO' },
                { description_regex: 'SWEEP FUND', uniqueid: 'SECOND', symbol: 'F2', info_tag: 'MFINFO' },
            ],
            new FakeClassifier()
        );
        expect(resolver.findRule('SWEEP FUND')?.uniqueid).toBe('FIRST');
    });

    it('searches case-sensitively', () => {
        const resolver = new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, new FakeClassifier());
        expect(resolver.findRule('cash sweep')).toBeUndefined();
    });

    it('throws UnresolvedSecurityError when nothing matches', () => {
        const resolver = new SecurityResolver(TEST_CONFIG.missing_cusip_mapping, new FakeClassifier());
        expect(() => resolver.resolve(makeRow({ cusip: '', description: 'PRIVATE PLACEMENT' }))).toThrow(
            UnresolvedSecurityError
        );
    });
});

describe('security list entries', () => {
    it('renders SECID with id and type', () => {
        expect(renderNode(secIdElement({ uniqueId: 'SWEEP0001', uniqueIdType: 'OTHER' }))).toEqual([
            '<SECID>',
            '  <UNIQUEID>SWEEP0001</UNIQUEID>',
            '  <UNIQUEIDTYPE>OTHER</UNIQUEIDTYPE>',
            '</SECID>',
        ]);
    });

    it('wraps SECINFO in the info tag with symbol as name and ticker', () => {
        const entry = securityEntry({
            uniqueId: '037833100',
            uniqueIdType: 'CUSIP',
            symbol: 'AAPL',
            kind: 'stock',
            infoTag: 'STOCKINFO',
        });

        expect(entry.id).toBe('037833100');
        expect(renderNode(entry.info)).toEqual([
            '<STOCKINFO>',
            '  <SECINFO>',
            '    <SECID>',
            '      <UNIQUEID>037833100</UNIQUEID>',
            '      <UNIQUEIDTYPE>CUSIP</UNIQUEIDTYPE>',
            '    </SECID>',
            '    <SECNAME>AAPL</SECNAME>',
            '    <TICKER>AAPL</TICKER>',
            '  </SECINFO>',
            '</STOCKINFO>',
        ]);
    });

    it('renders the synthetic cash security without a ticker', () => {
        const entry = cashSecurityEntry();

        expect(entry.id).toBe('CASH');
        expect(renderNode(entry.info)).toEqual([
            '<OTHERINFO>',
            '  <SECINFO>',
            '    <SECID>',
            '      <UNIQUEID>CASH</UNIQUEID>',
            '      <UNIQUEIDTYPE>CUSIP</UNIQUEIDTYPE>',
            '    </SECID>',
            '    <SECNAME>Cash Balance</SECNAME>',
            '  </SECINFO>',
            '</OTHERINFO>',
        ]);
    });
});
