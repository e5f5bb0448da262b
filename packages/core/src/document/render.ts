/**
 * OFX 1.02 serialization of an assembled statement.
 */

import { CURRENCY, OFX_HEADER } from '../types/index.js';
import { element, field, renderNode, type OfxElement } from '../ofx/node.js';
import {
    formatDocumentTimestamp,
    formatOfxDate,
    formatServerTimestamp,
} from '../utils/date-parse.js';
import type { AssembledStatement } from './assemble.js';

function statusElement(): OfxElement {
    return element('STATUS', [
        field('CODE', '0'),
        field('SEVERITY', 'INFO'),
    ]);
}

function signOnElement(statement: AssembledStatement): OfxElement {
    const { institution } = statement;
    return element('SIGNONMSGSRSV1', [
        element('SONRS', [
            statusElement(),
            field('DTSERVER', formatServerTimestamp(statement.generatedAt)),
            field('LANGUAGE', 'ENG'),
            element('FI', [field('ORG', institution.org)]),
            field('INTU.BID', institution.bid),
            field('INTU.USERID', institution.user_id),
        ]),
    ]);
}

function investmentStatementElement(statement: AssembledStatement): OfxElement {
    const { generatedAt } = statement;
    return element('INVSTMTMSGSRSV1', [
        element('INVSTMTTRNRS', [
            field('TRNUID', '0'),
            statusElement(),
            element('INVSTMTRS', [
                field('DTASOF', formatOfxDate(generatedAt)),
                field('CURDEF', CURRENCY.SYMBOL),
                element('INVACCTFROM', [
                    field('BROKERID', statement.institution.broker_id),
                    field('ACCTID', statement.accountId),
                ]),
                element('INVTRANLIST', [
                    field('DTSTART', formatDocumentTimestamp(statement.startDate, generatedAt)),
                    field('DTEND', formatDocumentTimestamp(statement.endDate, generatedAt)),
                    ...statement.transactions,
                ]),
                element('INVBAL', [
                    field('AVAILCASH', '0.00'),
                    field('MARGINBALANCE', '0.00'),
                    field('SHORTBALANCE', '0.00'),
                ]),
            ]),
        ]),
    ]);
}

function securityListElement(statement: AssembledStatement): OfxElement | null {
    if (statement.securities.length === 0) {
        return null;
    }
    return element('SECLISTMSGSRSV1', [
        element('SECLIST', statement.securities.map((entry) => entry.info)),
    ]);
}

/**
 * Render the full document: header block, blank line, `<OFX>` tree.
 * The security list is omitted when there are no securities.
 */
export function renderStatement(statement: AssembledStatement): string {
    const root = element('OFX', [
        signOnElement(statement),
        investmentStatementElement(statement),
        securityListElement(statement),
    ]);

    return [...OFX_HEADER, '', ...renderNode(root)].join('\n') + '\n';
}
