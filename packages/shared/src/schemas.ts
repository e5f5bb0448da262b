/**
 * Zod schemas for converter data structures.
 *
 * IMPORTANT: Amounts, quantities and prices stay strings end to end.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Regex source that must compile with `new RegExp`.
 */
const regexSource = z.string().min(1).refine(
    (source) => {
        try {
            new RegExp(source);
            return true;
        } catch {
            return false;
        }
    },
    { message: 'Must be a valid regular expression' }
);

/**
 * OFX element name (e.g. MFINFO, STOCKINFO, OTHERINFO).
 */
const ofxTag = z.string().regex(/^[A-Z][A-Z0-9.]*$/, 'Must be an upper-case OFX tag');

// ============================================================================
// Row Schema
// ============================================================================

/**
 * One data row of a brokerage export, all fields raw text.
 * Built once per row after header normalization.
 */
export const BrokerageRowSchema = z.object({
    date: z.string(),
    account: z.string(),
    activity: z.string(),
    description: z.string(),
    cusip: z.string(),
    symbol: z.string(),
    quantity: z.string(),
    price: z.string(),
    amount: z.string(),
}).readonly();

export type BrokerageRow = z.infer<typeof BrokerageRowSchema>;

/**
 * Result of reading an export table.
 */
export const ParseResultSchema = z.object({
    rows: z.array(BrokerageRowSchema),
    preambleRows: z.number().int().min(0),
    warnings: z.array(z.string()),
});

export type ParseResult = z.infer<typeof ParseResultSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

/**
 * Fallback identity for rows that carry no CUSIP.
 * Evaluated in array order against the trimmed description.
 */
export const MissingCusipRuleSchema = z.object({
    description_regex: regexSource,
    uniqueid: z.string().min(1),
    symbol: z.string().min(1),
    info_tag: ofxTag,
});

export type MissingCusipRule = z.infer<typeof MissingCusipRuleSchema>;

/**
 * Account display name → account id.
 */
export const AccountMappingSchema = z.record(z.string(), z.string().min(1));

export type AccountMapping = z.infer<typeof AccountMappingSchema>;

/**
 * Sign-on / account identifiers written into the document envelope.
 */
export const InstitutionSchema = z.object({
    org: z.string().min(1),
    bid: z.string().min(1),
    user_id: z.string().min(1),
    broker_id: z.string().min(1),
});

export type Institution = z.infer<typeof InstitutionSchema>;

/**
 * Converter configuration file.
 */
export const ConverterConfigSchema = z.object({
    account_id_mapping: AccountMappingSchema,
    missing_cusip_mapping: z.array(MissingCusipRuleSchema),
    institution: InstitutionSchema.partial().optional(),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
