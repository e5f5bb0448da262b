/**
 * Constants for the QFX converter.
 */

/**
 * Static OFX 1.02 SGML header lines, emitted before the `<OFX>` root.
 */
export const OFX_HEADER = [
    'OFXHEADER:100',
    'DATA:OFXSGML',
    'VERSION:102',
    'SECURITY:NONE',
    'ENCODING:USASCII',
    'CHARSET:1252',
    'COMPRESSION:NONE',
    'OLDFILEUID:NONE',
    'NEWFILEUID:NONE',
] as const;

/**
 * Time-of-day and zone suffix appended to every document-level date.
 * The target importers expect local noon with a fixed EST offset.
 */
export const OFX_TIME_SUFFIX = '120000.000[-5:EST]';

/**
 * Placeholder used when a row's trade date cannot be parsed.
 */
export const UNKNOWN_DATE = '00000000';

/**
 * Single supported currency.
 */
export const CURRENCY = {
    SYMBOL: 'USD',
    RATE: '1.0',
} as const;

/**
 * Sign-on and account identifiers. Finance software looks the institution
 * up by BID, so these default to a broker it already knows.
 * Overridable through the `institution` configuration section.
 */
export const DEFAULT_INSTITUTION = {
    org: '4705',
    bid: '4705',
    user_id: 'ANONYMOUS',
    broker_id: 'WellsFargo',
} as const;

/**
 * Transaction id (FITID) layout: prefix + YYYYMMDD + zero-padded counter.
 */
export const FITID = {
    PREFIX: 'TXN',
    COUNTER_WIDTH: 4,
} as const;

/**
 * Trade settlement offset in calendar days.
 */
export const SETTLEMENT_DAYS = 2;

/**
 * Supplied vs. computed unit price tolerance (absolute).
 */
export const PRICE_TOLERANCE = '0.01';

/**
 * Amount used for `reinvest dist` rows that carry no amount.
 */
export const REINVEST_DIST_DEFAULT_AMOUNT = '0.00';

/**
 * Fraction digits for computed unit prices.
 */
export const PRICE_DECIMALS = 9;

/**
 * Synthetic security used by cash transfers.
 */
export const CASH_SECURITY = {
    ID: 'CASH',
    ID_TYPE: 'CUSIP',
    NAME: 'Cash Balance',
    INFO_TAG: 'OTHERINFO',
} as const;

/**
 * Activity labels (trimmed, lower-cased) grouped by generator.
 */
export const ACTIVITY_GROUPS = {
    BUY: ['buy', 'reinvest dividend', 'rein stc gain', 'rein cap gain'],
    SELL: ['sell'],
    TRANSFER: ['asset trf', 'ach activity'],
    DIVIDEND: ['dividend'],
    INTEREST: ['interest'],
    LONG_TERM_GAIN: ['lt cap gain'],
    SHORT_TERM_GAIN: ['shrt trm gain'],
    FEE: ['advisory fee', 'journal'],
    REINVEST_DIST: ['reinvest dist'],
} as const;

/**
 * Columns every export must carry, keyed by the row field they populate.
 */
export const REQUIRED_COLUMNS = {
    date: 'Date',
    account: 'Account',
    activity: 'Activity',
    description: 'Description',
    cusip: 'CUSIP',
    symbol: 'Symbol',
    quantity: 'Quantity',
    price: 'Price',
    amount: 'Amount',
} as const;
