import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { FeaturizerError } from '../../core/errors.js';
import { toCsv, writeCsv } from '../csv.js';

describe('toCsv', () => {
    it('writes a header and one line per row', () => {
        const csv = toCsv([
            { class: 0, url_length: 5, js_file: true },
            { class: 1, url_length: 7, js_file: false },
        ]);

        expect(csv).toBe('class,url_length,js_file\r\n0,5,True\r\n1,7,False\r\n');
    });

    it('follows explicit columns and leaves missing values empty', () => {
        expect(toCsv([{ a: 1, b: 2 }], ['b', 'c', 'a'])).toBe('b,c,a\r\n2,,1\r\n');
    });

    it('quotes fields with separators or quotes', () => {
        expect(toCsv([{ 'a,b': 1, 'say "hi"': 2 }])).toBe('"a,b","say ""hi"""\r\n1,2\r\n');
    });

    it('refuses to write without rows', () => {
        expect(() => toCsv([])).toThrow(FeaturizerError);
    });
});

describe('writeCsv', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('creates the parent directory', async () => {
        const file = path.join(dir, 'out', 'data.csv');

        await writeCsv([{ class: 1, html_length: 12 }], file);

        expect(fs.readFileSync(file, 'utf-8')).toBe('class,html_length\r\n1,12\r\n');
    });
});
