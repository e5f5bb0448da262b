#!/usr/bin/env node
/**
 * QFX Convert CLI
 *
 * Converts a brokerage activity export (CSV) into a QFX investment
 * statement:
 * - CLI handles all file I/O (uses node:fs)
 * - Core receives ArrayBuffer, returns the rendered document
 * - Core has no file system access, no console.* calls
 */

import { parseArgs } from 'node:util';
import { ConversionError } from '@qfx-convert/shared';
import { convertFile } from './commands/convert.js';
import { log, success, warn, info, arrow, fail } from './utils/console.js';

function printUsage(): void {
    log('QFX Convert CLI v1.0.0');
    log('');
    log('Usage: qfx-convert <input.csv> [output.qfx] [--account_mapping <file>] [--equities <file>]');
    log('');
    log('Example:');
    log('  qfx-convert activity_2024.csv --account_mapping ./account_mapping.json');
}

async function main() {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            account_mapping: { type: 'string' },
            equities: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (values.help || positionals.length === 0) {
        printUsage();
        process.exit(positionals.length === 0 && !values.help ? 1 : 0);
    }

    const summary = await convertFile({
        input: positionals[0],
        output: positionals[1],
        accountMapping: values.account_mapping,
        equities: values.equities,
    });

    if (summary.preambleRows > 0) {
        info(`Skipped ${summary.preambleRows} preamble rows before the header`);
    }
    for (const warning of summary.warnings) {
        warn(warning);
    }

    arrow(`Account: ${summary.accountId}`);
    arrow(`Transactions: ${summary.transactionCount}`);
    arrow(`Securities: ${summary.securityCount}`);
    success(`QFX file has been generated and saved to ${summary.outputPath}`);
}

main().catch((err) => {
    if (err instanceof ConversionError) {
        fail(err.message);
    } else {
        fail(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
});
