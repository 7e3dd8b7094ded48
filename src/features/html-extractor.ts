import fs from 'fs';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { logger } from '../core/logger.js';
import { isMissingFileError } from '../core/errors.js';
import { charLength } from './text.js';
import { featureKey, type FeatureRecord, type HtmlCatalog } from './types.js';

export type JsVector = 'script' | 'a[href]' | 'form[action]' | 'iframe[src]' | 'frame[src]' | 'event-handler';

export interface JsFragment {
    code: string;
    vector: JsVector;
}

export interface HtmlExtraction {
    /** Tag, attribute and event-handler counts plus `js_file`. */
    features: FeatureRecord;
    /** Document length in code points, reported as `html_length`. */
    length: number;
    /** JavaScript found in the document, in extraction order. */
    fragments: JsFragment[];
}

// Attributes that execute their value when it uses the javascript: pseudo-protocol
const PSEUDO_PROTOCOL_VECTORS: ReadonlyArray<{ tag: string; attr: string; vector: JsVector }> = [
    { tag: 'a', attr: 'href', vector: 'a[href]' },
    { tag: 'form', attr: 'action', vector: 'form[action]' },
    { tag: 'iframe', attr: 'src', vector: 'iframe[src]' },
    { tag: 'frame', attr: 'src', vector: 'frame[src]' },
];

// Case-insensitive, leading whitespace allowed, code may span lines
const JAVASCRIPT_PROTOCOL = /^\s*javascript:([\s\S]*)/i;

/** The code of a `javascript:` URL, or null when `value` is not one (or has no code). */
export function javascriptProtocolCode(value: string): string | null {
    const match = JAVASCRIPT_PROTOCOL.exec(value);
    return match && match[1] ? match[1] : null;
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

export class HtmlVectorExtractor {
    constructor(readonly catalogs: HtmlCatalog) {}

    /**
     * Reads a document as UTF-8; undecodable bytes become U+FFFD instead of
     * failing. Line endings are normalised to `\n`. Returns null when the file
     * does not exist.
     */
    async readDocument(filePath: string): Promise<string | null> {
        try {
            const buffer = await fs.promises.readFile(filePath);
            return buffer.toString('utf-8').replace(/\r\n?/g, '\n');
        } catch (error) {
            if (isMissingFileError(error)) {
                logger.info(`File not found. Skipping file: ${filePath}`);
                return null;
            }
            throw error;
        }
    }

    async extractFile(filePath: string): Promise<HtmlExtraction | null> {
        const rawHtml = await this.readDocument(filePath);
        if (rawHtml === null) return null;
        return this.extract(rawHtml, filePath);
    }

    extract(rawHtml: string, origin = 'unknown'): HtmlExtraction {
        const $ = cheerio.load(rawHtml);
        const fragments: JsFragment[] = [];

        // 1. Inline <script>
        $('script').each((_, el) => {
            if (Object.hasOwn(el.attribs, 'src')) return;

            // Exactly one text child, like `<script>code</script>`; empty scripts have none
            const [child] = el.children;
            if (el.children.length !== 1 || !child || !('data' in child)) {
                logger.info(`Skipping an ill-formed <script> in file ${origin}`, {
                    children: el.children.length,
                });
                return;
            }
            fragments.push({ code: child.data, vector: 'script' });
        });

        // 2-5. javascript: links, forms, iframes and frames
        for (const { tag, attr, vector } of PSEUDO_PROTOCOL_VECTORS) {
            $(`${tag}[${attr}]`).each((_, el) => {
                const code = javascriptProtocolCode($(el).attr(attr) ?? '');
                if (code !== null) {
                    fragments.push({ code, vector });
                }
            });
        }

        const tagCounts = new Map<string, number>();
        const attrCounts = new Map<string, number>();
        const handlers = new Map<string, string[]>(this.catalogs.eventHandlerAttrs.map(name => [name, []]));
        let hasExternalScript = false;

        $<Element, string>('*').each((_, el) => {
            increment(tagCounts, el.name);
            if (el.name === 'script' && Object.hasOwn(el.attribs, 'src')) {
                hasExternalScript = true;
            }

            for (const [name, value] of Object.entries(el.attribs)) {
                increment(attrCounts, name);
                handlers.get(name)?.push(value);
            }
        });

        // 6. Event handlers: the value is code, whatever it looks like
        for (const values of handlers.values()) {
            for (const code of values) {
                fragments.push({ code, vector: 'event-handler' });
            }
        }

        const features: FeatureRecord = {};
        for (const tag of this.catalogs.tags) {
            features[featureKey.tag(tag)] = tagCounts.get(tag) ?? 0;
        }
        for (const attr of this.catalogs.attrs) {
            features[featureKey.attr(attr)] = attrCounts.get(attr) ?? 0;
        }
        for (const [event, values] of handlers) {
            features[featureKey.event(event)] = values.length;
        }
        features['js_file'] = hasExternalScript;

        return { features, fragments, length: charLength(rawHtml) };
    }
}
