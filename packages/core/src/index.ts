// Types (re-exported from shared)
export type {
    BrokerageRow,
    ParseResult,
    MissingCusipRule,
    AccountMapping,
    Institution,
    ConverterConfig,
} from './types/index.js';

export {
    BrokerageRowSchema,
    ConverterConfigSchema,
    ConversionError,
} from './types/index.js';

// Utils
export {
    normalizeCurrency,
    normalizeQuantity,
    normalizeHeader,
    computePrice,
    parseBrokerageDate,
    formatDocumentTimestamp,
    escapeMarkup,
} from './utils/index.js';

// OFX tree
export { element, field, renderNode } from './ofx/node.js';
export type { OfxNode, OfxElement, OfxField } from './ofx/node.js';

// Parser
export { parseBrokerageExport, parseEquityTickers } from './parser/index.js';

// Securities
export { SecurityResolver } from './securities/index.js';
export type { SecurityClassifier, SecurityEntry, ResolvedSecurity } from './securities/index.js';

// Transactions
export { classifyActivity, generateTransaction } from './transactions/index.js';
export type { GeneratedTransaction, TransactionKind } from './transactions/index.js';

// Document
export { assembleStatement, renderStatement, convertStatement } from './document/index.js';
export type { AssembledStatement, StatementOptions, ConversionResult } from './document/index.js';
