/**
 * Fatal conversion errors.
 *
 * Every failure aborts the whole run: a financial statement is either
 * complete or not written at all.
 */

/**
 * Base class for all converter errors.
 */
export abstract class ConversionError extends Error {
    public readonly code: string;
    public readonly details: Record<string, unknown> | undefined;

    constructor(message: string, code: string, details?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.details = details;
    }
}

/**
 * Configuration file missing, unreadable, or failing validation.
 */
export class ConfigurationError extends ConversionError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION', details);
    }
}

/**
 * Statement account name has no entry in `account_id_mapping`.
 */
export class AccountNotMappedError extends ConversionError {
    constructor(accountName: string) {
        super(`Account name '${accountName}' not found in account mapping`, 'ACCOUNT_NOT_MAPPED', { accountName });
    }
}

/**
 * Export has no row starting with "Date", "Account".
 */
export class HeaderNotFoundError extends ConversionError {
    constructor() {
        super("Could not find header row starting with 'Date', 'Account'", 'HEADER_NOT_FOUND');
    }
}

/**
 * Header row lacks one or more required columns.
 */
export class MissingColumnError extends ConversionError {
    constructor(missing: string[], found: string[]) {
        super(
            `Missing required columns: ${missing.join(', ')}. Found: ${found.join(', ')}`,
            'MISSING_COLUMN',
            { missing, found }
        );
    }
}

/**
 * Export contains a header but no data rows.
 */
export class EmptyStatementError extends ConversionError {
    constructor() {
        super('No account information found in export: no data rows after header', 'EMPTY_STATEMENT');
    }
}

/**
 * Row has no CUSIP and no fallback rule matches its description.
 */
export class UnresolvedSecurityError extends ConversionError {
    constructor(description: string) {
        super(
            `No CUSIP provided and no matching pattern found for description: ${description}`,
            'UNRESOLVED_SECURITY',
            { description }
        );
    }
}

/**
 * Activity value matches no known category.
 */
export class UnknownActivityError extends ConversionError {
    constructor(activity: string) {
        super(`Unknown activity: ${activity}`, 'UNKNOWN_ACTIVITY', { activity });
    }
}

/**
 * Row lacks the values needed to produce a monetary total.
 */
export class IncompleteTransactionError extends ConversionError {
    constructor(reason: string, fitid: string) {
        super(`${reason} (FITID: ${fitid})`, 'INCOMPLETE_TRANSACTION', { fitid });
    }
}

/**
 * Income row without a CUSIP.
 */
export class MissingIdentifierError extends ConversionError {
    constructor(description: string) {
        super(`No CUSIP provided for income transaction: ${description}`, 'MISSING_IDENTIFIER', { description });
    }
}
