import { getConfig } from '../config/settings.js';
import { logger } from '../core/logger.js';
import { getPageFeatureExtractor, type PageFeatureExtractor } from '../features/page-features.js';
import type { LabeledPage, PageFeatureRecord } from '../features/types.js';
import { loadBenignPages, loadXssPages } from './manifest.js';

export interface BuildResult {
    rows: PageFeatureRecord[];
    processed: number;
    /** Pages whose document could not be found. */
    skipped: number;
    /** Pages whose document could not be read or analyzed. */
    failed: number;
}

const FAILED = Symbol('failed');

export interface BuildOptions {
    concurrency?: number;
    onProgress?: (done: number, total: number) => void;
}

export class DatasetBuilder {
    constructor(private readonly extractor: PageFeatureExtractor = getPageFeatureExtractor()) {}

    /**
     * Rows come back in the order of `pages`, missing documents left out. A page
     * that fails is logged and counted; the rest of the set is still built.
     */
    async build(pages: readonly LabeledPage[], options: BuildOptions = {}): Promise<BuildResult> {
        const concurrency = Math.max(1, options.concurrency ?? getConfig().dataset.concurrency);
        const rows: PageFeatureRecord[] = [];
        let skipped = 0;
        let failed = 0;
        let done = 0;

        for (let start = 0; start < pages.length; start += concurrency) {
            const batch = pages.slice(start, start + concurrency);
            const results = await Promise.all(batch.map(page => this.extractRow(page)));

            for (const result of results) {
                if (result === FAILED) {
                    failed++;
                } else if (result) {
                    rows.push(result);
                } else {
                    skipped++;
                }
            }

            done += batch.length;
            options.onProgress?.(done, pages.length);
        }

        return { rows, processed: pages.length, skipped, failed };
    }

    private async extractRow(page: LabeledPage): Promise<PageFeatureRecord | null | typeof FAILED> {
        try {
            return await this.extractor.extractRow(page);
        } catch (error) {
            logger.error(`Failed to extract features from ${page.filePath}`, {
                error: error instanceof Error ? error.message : String(error),
            });
            return FAILED;
        }
    }

    /** Benign pages first, then malicious ones, from the configured manifests. */
    async buildFromConfig(options: BuildOptions = {}): Promise<BuildResult> {
        const { dataset } = getConfig();

        const benign = await loadBenignPages(dataset.benignManifest, dataset.benignDir);
        const xss = await loadXssPages(dataset.xssManifest, dataset.xssDir);
        logger.info(`Loaded ${benign.length} benign and ${xss.length} malicious pages`);

        return this.build([...benign, ...xss], options);
    }
}
