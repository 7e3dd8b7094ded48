import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../core/logger.js';
import { ManifestError, formatZodIssues, isMissingFileError } from '../core/errors.js';
import type { LabeledPage } from '../features/types.js';

// Pages collected by the random-walk spider (benign)
const BenignEntrySchema = z.object({
    file_path: z.string().min(1),
    url: z.string(),
});

// Mirrored xssed.com reports (malicious)
const XssEntrySchema = z.object({
    url: z.string(),
    category: z.string().default(''),
    files: z.array(z.object({ path: z.string().min(1) })).default([]),
});

export type BenignEntry = z.infer<typeof BenignEntrySchema>;
export type XssEntry = z.infer<typeof XssEntrySchema>;

export const XSS_CATEGORIES = ['XSS', 'Script Insertion'] as const;

// Older spider runs stored pages under html/randomsample/ or html/randomsample/full/
const LEGACY_BENIGN_PREFIX = /html\/randomsample(\/full)?\//;

function readJson(file: string): unknown {
    try {
        return JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
        throw new ManifestError(file, [error instanceof Error ? error.message : String(error)], { cause: error });
    }
}

function parseManifest<T extends z.ZodTypeAny>(file: string, schema: T): z.infer<T>[] {
    const result = z.array(schema).safeParse(readJson(file));
    if (!result.success) {
        throw new ManifestError(file, formatZodIssues(result.error));
    }
    return result.data;
}

/** Paths of the files directly inside `dir`; empty when the directory is missing. */
export async function listFiles(dir: string): Promise<Set<string>> {
    try {
        const names = await fs.promises.readdir(dir);
        return new Set(names.map(name => path.join(dir, name)));
    } catch (error) {
        if (isMissingFileError(error)) {
            logger.warn(`Directory not found: ${dir}`);
            return new Set();
        }
        throw error;
    }
}

export function benignPages(entries: readonly BenignEntry[], benignDir: string, available: ReadonlySet<string>): LabeledPage[] {
    const pages: LabeledPage[] = [];
    const prefix = benignDir.endsWith('/') ? benignDir : `${benignDir}/`;

    for (const entry of entries) {
        const filePath = path.join(entry.file_path.replace(LEGACY_BENIGN_PREFIX, prefix));
        if (!available.has(filePath)) continue;
        pages.push({ filePath, url: entry.url, label: 0 });
    }

    return pages;
}

export function xssPages(entries: readonly XssEntry[], xssDir: string, available: ReadonlySet<string>): LabeledPage[] {
    const pages: LabeledPage[] = [];

    for (const entry of entries) {
        const [file] = entry.files;
        if (!file) {
            // Some mirrored pages were never downloaded
            logger.info(`Skipping xss: ${entry.url}`);
            continue;
        }

        const filePath = path.join(xssDir, file.path);
        if (!available.has(filePath)) continue;

        if (!XSS_CATEGORIES.some(category => category === entry.category)) {
            logger.warn(`Non-XSS vulnerability imported, check whether it should be removed: ${entry.url}`, {
                category: entry.category,
            });
        }
        pages.push({ filePath, url: entry.url, label: 1 });
    }

    return pages;
}

export async function loadBenignPages(manifest: string, benignDir: string): Promise<LabeledPage[]> {
    const entries = parseManifest(manifest, BenignEntrySchema);
    return benignPages(entries, benignDir, await listFiles(benignDir));
}

export async function loadXssPages(manifest: string, xssDir: string): Promise<LabeledPage[]> {
    const entries = parseManifest(manifest, XssEntrySchema);
    // Manifest paths look like full/<sha1>
    return xssPages(entries, xssDir, await listFiles(path.join(xssDir, 'full')));
}
