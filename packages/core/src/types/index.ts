/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    BrokerageRow,
    ParseResult,
    MissingCusipRule,
    AccountMapping,
    Institution,
    ConverterConfig,
} from '@qfx-convert/shared';

export {
    BrokerageRowSchema,
    ParseResultSchema,
    MissingCusipRuleSchema,
    ConverterConfigSchema,
    OFX_HEADER,
    OFX_TIME_SUFFIX,
    UNKNOWN_DATE,
    CURRENCY,
    DEFAULT_INSTITUTION,
    FITID,
    SETTLEMENT_DAYS,
    PRICE_TOLERANCE,
    REINVEST_DIST_DEFAULT_AMOUNT,
    PRICE_DECIMALS,
    CASH_SECURITY,
    ACTIVITY_GROUPS,
    REQUIRED_COLUMNS,
    ConversionError,
    AccountNotMappedError,
    HeaderNotFoundError,
    MissingColumnError,
    EmptyStatementError,
    UnresolvedSecurityError,
    UnknownActivityError,
    IncompleteTransactionError,
    MissingIdentifierError,
} from '@qfx-convert/shared';
