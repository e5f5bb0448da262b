import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Account mapping shipped with the CLI package.
 */
export function defaultConfigPath(): string {
    // In dev: packages/cli/src/config/paths.ts -> __dirname = packages/cli/src/config
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'account_mapping.json');
}

/**
 * Equity reference dataset, looked up beside the configuration file.
 */
export function defaultEquitiesPath(configPath: string): string {
    return join(dirname(configPath), 'equities.csv');
}

/**
 * Same basename as the input, with a .qfx extension.
 */
export function defaultOutputPath(inputPath: string): string {
    if (inputPath.endsWith('.csv')) {
        return inputPath.slice(0, -4) + '.qfx';
    }
    return inputPath + '.qfx';
}
