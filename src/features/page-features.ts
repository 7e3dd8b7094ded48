import { getCatalogs } from '../config/catalogs.js';
import { logger } from '../core/logger.js';
import { aggregateFragments } from './aggregator.js';
import { HtmlVectorExtractor, type HtmlExtraction } from './html-extractor.js';
import { JsFragmentAnalyzer } from './js-analyzer.js';
import { analyzeUrl } from './url-analyzer.js';
import {
    featureKeys,
    HTML_LENGTH_KEY,
    type FeatureCatalogs,
    type FeatureRecord,
    type FragmentRecord,
    type LabeledPage,
    type PageFeatureRecord,
} from './types.js';

/**
 * Turns one page (document + URL) into its feature record. Holds nothing but
 * the read-only catalogs, so one instance can serve any number of pages
 * concurrently.
 */
export class PageFeatureExtractor {
    readonly html: HtmlVectorExtractor;
    readonly js: JsFragmentAnalyzer;

    constructor(readonly catalogs: FeatureCatalogs) {
        this.html = new HtmlVectorExtractor(catalogs);
        this.js = new JsFragmentAnalyzer(catalogs);
    }

    /** Column order of the rows this extractor produces. */
    columns(withLabel = true): string[] {
        return featureKeys(this.catalogs, withLabel);
    }

    /** Null when the document does not exist: skip the page, it has no features. */
    async extract(htmlPath: string, url: string): Promise<FeatureRecord | null> {
        const extraction = await this.html.extractFile(htmlPath);
        if (!extraction) return null;
        return this.combine(extraction, url, htmlPath);
    }

    extractFromHtml(rawHtml: string, url: string, origin = 'unknown'): FeatureRecord {
        return this.combine(this.html.extract(rawHtml, origin), url, origin);
    }

    async extractRow(page: LabeledPage): Promise<PageFeatureRecord | null> {
        const features = await this.extract(page.filePath, page.url);
        if (!features) return null;
        return { class: page.label, ...features };
    }

    private combine(extraction: HtmlExtraction, url: string, origin: string): FeatureRecord {
        logger.debug(`Found ${extraction.fragments.length} JavaScript fragments in ${origin}`);

        const records: FragmentRecord[] = [];
        for (const fragment of extraction.fragments) {
            const record = this.js.analyze(fragment.code, `${origin} (${fragment.vector})`);
            if (record) {
                records.push(record);
            }
        }

        return {
            ...analyzeUrl(url),
            ...extraction.features,
            ...aggregateFragments(records, this.js),
            [HTML_LENGTH_KEY]: extraction.length,
        };
    }
}

let defaultExtractor: PageFeatureExtractor | null = null;

/** Extractor over the configured catalogs. */
export function getPageFeatureExtractor(): PageFeatureExtractor {
    if (!defaultExtractor) {
        defaultExtractor = new PageFeatureExtractor(getCatalogs());
    }
    return defaultExtractor;
}
