import { readFile, writeFile } from 'node:fs/promises';
import { convertStatement, parseBrokerageExport } from '@qfx-convert/core';
import { loadConverterConfig } from '../config/load.js';
import { defaultConfigPath, defaultEquitiesPath, defaultOutputPath } from '../config/paths.js';
import { EquityReferenceClassifier } from '../reference/equities.js';
import { toArrayBuffer } from '../utils/buffer.js';
import type { ConvertOptions, ConvertSummary } from '../types.js';

/**
 * Convert one brokerage export to QFX.
 *
 * The CLI owns all file I/O; core receives an ArrayBuffer and returns the
 * rendered document. The output file is written only after the whole
 * document rendered, so a failed run leaves nothing behind.
 */
export async function convertFile(options: ConvertOptions): Promise<ConvertSummary> {
    const configPath = options.accountMapping ?? defaultConfigPath();
    const config = loadConverterConfig(configPath);
    const classifier = new EquityReferenceClassifier(options.equities ?? defaultEquitiesPath(configPath));

    const buffer = await readFile(options.input);
    const parsed = parseBrokerageExport(toArrayBuffer(buffer));

    const result = convertStatement(parsed.rows, { config, classifier, now: options.now });

    const outputPath = options.output ?? defaultOutputPath(options.input);
    await writeFile(outputPath, result.content, 'utf-8');

    return {
        outputPath,
        accountId: result.accountId,
        transactionCount: result.transactionCount,
        securityCount: result.securityCount,
        preambleRows: parsed.preambleRows,
        warnings: [...parsed.warnings, ...result.warnings],
    };
}
