import { readFileSync, existsSync } from 'node:fs';
import { extname } from 'node:path';
import { parse } from 'yaml';
import {
    ConverterConfigSchema,
    ConfigurationError,
    type ConverterConfig,
} from '@qfx-convert/shared';

/**
 * Loads the converter configuration (account mapping + missing CUSIP rules).
 * JSON by default; `.yaml`/`.yml` files are parsed as YAML.
 *
 * @throws ConfigurationError when the file is missing, unreadable, or invalid
 */
export function loadConverterConfig(path: string): ConverterConfig {
    if (!existsSync(path)) {
        throw new ConfigurationError(`Account mapping file '${path}' not found`, { path });
    }

    let data: unknown;
    try {
        const content = readFileSync(path, 'utf-8');
        data = isYamlPath(path) ? parse(content) : JSON.parse(content);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Could not read account mapping file '${path}': ${reason}`, { path });
    }

    const result = ConverterConfigSchema.safeParse(data);
    if (!result.success) {
        const problems = result.error.issues.map((issue) => {
            const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${where}: ${issue.message}`;
        });
        throw new ConfigurationError(
            `Invalid account mapping file '${path}': ${problems.join('; ')}`,
            { path, problems }
        );
    }
    return result.data;
}

function isYamlPath(path: string): boolean {
    const ext = extname(path).toLowerCase();
    return ext === '.yaml' || ext === '.yml';
}
