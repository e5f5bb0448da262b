// Schemas
export {
    BrokerageRowSchema,
    ParseResultSchema,
    MissingCusipRuleSchema,
    AccountMappingSchema,
    InstitutionSchema,
    ConverterConfigSchema,
} from './schemas.js';

// Types
export type {
    BrokerageRow,
    ParseResult,
    MissingCusipRule,
    AccountMapping,
    Institution,
    ConverterConfig,
} from './schemas.js';

// Constants
export {
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
} from './constants.js';

// Errors
export {
    ConversionError,
    ConfigurationError,
    AccountNotMappedError,
    HeaderNotFoundError,
    MissingColumnError,
    EmptyStatementError,
    UnresolvedSecurityError,
    UnknownActivityError,
    IncompleteTransactionError,
    MissingIdentifierError,
} from './errors.js';
