import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ManifestError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { benignPages, listFiles, loadBenignPages, loadXssPages, xssPages } from '../manifest.js';

describe('benignPages', () => {
    it('rewrites legacy paths and keeps only available files', () => {
        const available = new Set([path.join('data/benign', 'abc'), path.join('data/benign', 'def')]);

        const pages = benignPages(
            [
                { file_path: 'html/randomsample/full/abc', url: 'http://a.example/' },
                { file_path: 'html/randomsample/def', url: 'http://d.example/' },
                { file_path: 'html/randomsample/full/gone', url: 'http://g.example/' },
            ],
            'data/benign',
            available
        );

        expect(pages).toEqual([
            { filePath: path.join('data/benign', 'abc'), url: 'http://a.example/', label: 0 },
            { filePath: path.join('data/benign', 'def'), url: 'http://d.example/', label: 0 },
        ]);
    });
});

describe('xssPages', () => {
    it('takes the first file of each report', () => {
        const available = new Set([path.join('data/xss', 'full/1111'), path.join('data/xss', 'full/2222')]);
        const info = vi.spyOn(logger, 'info').mockImplementation(() => {});
        const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});

        const pages = xssPages(
            [
                { url: 'http://one.example/?q=<script>', category: 'XSS', files: [{ path: 'full/1111' }] },
                { url: 'http://none.example/', category: 'XSS', files: [] },
                { url: 'http://two.example/', category: 'Redirect', files: [{ path: 'full/2222' }, { path: 'full/9999' }] },
                { url: 'http://three.example/', category: 'Script Insertion', files: [{ path: 'full/3333' }] },
            ],
            'data/xss',
            available
        );

        expect(pages).toEqual([
            { filePath: path.join('data/xss', 'full/1111'), url: 'http://one.example/?q=<script>', label: 1 },
            { filePath: path.join('data/xss', 'full/2222'), url: 'http://two.example/', label: 1 },
        ]);
        expect(info).toHaveBeenCalledWith('Skipping xss: http://none.example/');
        expect(warn).toHaveBeenCalledTimes(1);
    });
});

describe('manifest files', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'manifest-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('lists nothing for a missing directory', async () => {
        vi.spyOn(logger, 'warn').mockImplementation(() => {});

        expect((await listFiles(path.join(dir, 'missing'))).size).toBe(0);
    });

    it('loads benign pages present on disk', async () => {
        const benignDir = path.join(dir, 'benign');
        fs.mkdirSync(benignDir);
        fs.writeFileSync(path.join(benignDir, 'p1'), '<p>hi</p>');
        const manifest = path.join(dir, 'randomwalk.json');
        fs.writeFileSync(
            manifest,
            JSON.stringify([
                { file_path: `${benignDir}/p1`, url: 'http://p1.example/' },
                { file_path: `${benignDir}/p2`, url: 'http://p2.example/' },
            ])
        );

        expect(await loadBenignPages(manifest, benignDir)).toEqual([
            { filePath: path.join(benignDir, 'p1'), url: 'http://p1.example/', label: 0 },
        ]);
    });

    it('loads xss pages from the full/ directory', async () => {
        const xssDir = path.join(dir, 'xssed');
        fs.mkdirSync(path.join(xssDir, 'full'), { recursive: true });
        fs.writeFileSync(path.join(xssDir, 'full', 'abcd'), '<script>alert(1)</script>');
        const manifest = path.join(dir, 'xssed.json');
        fs.writeFileSync(
            manifest,
            JSON.stringify([{ url: 'http://v.example/?q=x', category: 'XSS', files: [{ path: 'full/abcd' }] }])
        );

        expect(await loadXssPages(manifest, xssDir)).toEqual([
            { filePath: path.join(xssDir, 'full', 'abcd'), url: 'http://v.example/?q=x', label: 1 },
        ]);
    });

    it('rejects a manifest that is not a list of entries', async () => {
        const manifest = path.join(dir, 'randomwalk.json');
        fs.writeFileSync(manifest, JSON.stringify({ file_path: 'x', url: 'y' }));

        await expect(loadBenignPages(manifest, dir)).rejects.toBeInstanceOf(ManifestError);
    });

    it('rejects a missing manifest', async () => {
        await expect(loadXssPages(path.join(dir, 'missing.json'), dir)).rejects.toBeInstanceOf(ManifestError);
    });
});
