import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { loadCatalogs, parseCatalogs } from '../catalogs.js';
import { ConfigError } from '../../core/errors.js';

const DEFAULT_CATALOGS = fileURLToPath(new URL('../../../catalogs/default.json', import.meta.url));

const VALID = {
    tags: ['script'],
    attrs: ['href'],
    eventHandlerAttrs: ['onclick'],
    domObjects: ['document'],
    properties: ['cookie', 'document'],
    methods: ['alert'],
};

describe('loadCatalogs', () => {
    it('loads the bundled catalogs', () => {
        const catalogs = loadCatalogs(DEFAULT_CATALOGS);

        expect(catalogs.tags).toEqual(['script', 'iframe', 'meta', 'div', 'applet', 'object', 'embed', 'link', 'svg']);
        expect(catalogs.attrs).toEqual(['href', 'http-equiv', 'lowsrc']);
        expect(catalogs.eventHandlerAttrs).toHaveLength(83);
        expect(catalogs.eventHandlerAttrs).toContain('onmouseover');
        expect(catalogs.domObjects).toEqual(['windows', 'location', 'document']);
        expect(catalogs.properties).toEqual(['cookie', 'document', 'referrer']);
        expect(catalogs.methods).toContain('fromCharCode');
    });

    it('throws a ConfigError for an unreadable file', () => {
        const missing = path.join(os.tmpdir(), 'no-such-dir-for-catalogs', 'catalogs.json');

        expect(() => loadCatalogs(missing)).toThrow(ConfigError);
    });

    it('throws a ConfigError for invalid JSON', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalogs-'));
        const file = path.join(dir, 'catalogs.json');
        fs.writeFileSync(file, '{ not json');

        try {
            expect(() => loadCatalogs(file)).toThrow(ConfigError);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});

describe('parseCatalogs', () => {
    it('accepts a name present in two catalogs', () => {
        expect(parseCatalogs(VALID)).toEqual(VALID);
    });

    it('rejects duplicate names within a catalog', () => {
        expect(() => parseCatalogs({ ...VALID, methods: ['alert', 'alert'] })).toThrow(
            'Invalid feature catalogs in catalogs: methods: names must be unique'
        );
    });

    it('rejects a missing catalog', () => {
        const { tags: _tags, ...withoutTags } = VALID;

        expect(() => parseCatalogs(withoutTags)).toThrow(ConfigError);
    });
});
