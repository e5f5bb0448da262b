/**
 * QFX Convert CLI - Core Types
 */

export interface ConvertOptions {
    /** Brokerage export (CSV) */
    input: string;
    /** Defaults to the input path with a .qfx extension */
    output?: string;
    /** Defaults to account_mapping.json shipped with the CLI */
    accountMapping?: string;
    /** Defaults to equities.csv beside the account mapping file */
    equities?: string;
    /** Clock override for DTSERVER/DTASOF */
    now?: Date;
}

export interface ConvertSummary {
    outputPath: string;
    accountId: string;
    transactionCount: number;
    securityCount: number;
    preambleRows: number;
    warnings: string[];
}
