import { afterEach, describe, it, expect } from 'vitest';
import { getConfig, resetConfig, validateConfig } from '../settings.js';

const saved = { ...process.env };

describe('settings', () => {
    afterEach(() => {
        process.env = { ...saved };
        resetConfig();
    });

    it('reads dataset settings from the environment', () => {
        process.env.DATASET_CONCURRENCY = '3';
        process.env.OUTPUT_CSV = 'out/features.csv';
        resetConfig();

        const config = getConfig();

        expect(config.dataset.concurrency).toBe(3);
        expect(config.dataset.output).toBe('out/features.csv');
        expect(config.catalogs.path.endsWith('default.json')).toBe(true);
    });

    it('falls back to defaults', () => {
        delete process.env.DATASET_CONCURRENCY;
        delete process.env.BENIGN_MANIFEST;
        resetConfig();

        expect(getConfig().dataset.concurrency).toBe(8);
        expect(getConfig().dataset.benignManifest).toBe('randomwalk.json');
    });

    it('reports invalid values', () => {
        process.env.LOG_LEVEL = 'chatty';
        process.env.DATASET_CONCURRENCY = '0';
        resetConfig();

        const validation = validateConfig();

        expect(validation.valid).toBe(false);
        expect(validation.errors).toHaveLength(2);
        expect(validation.errors[0]).toMatch(/^logging\.level: /);
        expect(validation.errors[1]).toMatch(/^dataset\.concurrency: /);
    });
});
