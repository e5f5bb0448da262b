import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { defaultConfigPath, defaultEquitiesPath, defaultOutputPath } from '../src/config/paths.js';

describe('defaultOutputPath', () => {
    it('swaps a .csv extension for .qfx', () => {
        expect(defaultOutputPath('/data/activity_2024.csv')).toBe('/data/activity_2024.qfx');
    });

    it('appends .qfx to any other name', () => {
        expect(defaultOutputPath('/data/activity.CSV')).toBe('/data/activity.CSV.qfx');
        expect(defaultOutputPath('export')).toBe('export.qfx');
    });
});

describe('defaultEquitiesPath', () => {
    it('looks beside the mapping file', () => {
        expect(defaultEquitiesPath(path.join('/cfg', 'mapping.yaml'))).toBe(path.join('/cfg', 'equities.csv'));
    });
});

describe('defaultConfigPath', () => {
    it('points at the mapping shipped with the CLI package', () => {
        expect(defaultConfigPath().endsWith(path.join('cli', 'account_mapping.json'))).toBe(true);
    });
});
