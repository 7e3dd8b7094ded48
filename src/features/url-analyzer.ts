import { charLength } from './text.js';
import type { FeatureRecord } from './types.js';

const SCRIPT_TAG = /<\s*script.*>|<\s*\/\s*script\s*>/i;

// Sinks that move the browser elsewhere; `location` alone also covers location.href, .hash, ...
export const REDIRECTION_SINKS = [
    'window.location',
    'window.history',
    'window.navigate',
    'document.URL',
    'document.documentURI',
    'document.URLUnencoded',
    'document.baseURI',
    'location',
    'window.open',
    'self.location',
    'top.location',
] as const;

// Case-sensitive on purpose: `XSS` is matched in capitals only
export const URL_KEYWORDS = [
    'login',
    'signup',
    'contact',
    'search',
    'query',
    'redirect',
    'XSS',
    'banking',
    'root',
    'password',
    'crypt',
    'shell',
    'evil',
] as const;

const DOMAIN_NAME = /(?:(?!-)[A-Za-z0-9-]{1,63}(?!-)\.)+[A-Za-z]{2,6}/g;

const PERCENT_ESCAPES = /(?:%[0-9A-Fa-f]{2})+/g;

/**
 * Percent-decodes a URL without ever throwing: each run of `%XX` escapes is
 * decoded as UTF-8 with U+FFFD for invalid bytes, malformed escapes are kept
 * as they are and `+` is not a space.
 */
export function decodeUrl(url: string): string {
    return url.replace(PERCENT_ESCAPES, run => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf-8'));
}

export function analyzeUrl(rawUrl: string): FeatureRecord {
    const url = decodeUrl(rawUrl);

    return {
        url_length: charLength(url),
        url_duplicated_characters: url.includes('<<') || url.includes('>>'),
        url_special_characters: ['"', "'", '>'].some(c => url.includes(c)),
        url_script_tag: SCRIPT_TAG.test(url),
        url_cookie: url.includes('document.cookie'),
        url_redirection: REDIRECTION_SINKS.some(sink => url.includes(sink)),
        url_number_keywords: URL_KEYWORDS.filter(keyword => url.includes(keyword)).length,
        url_number_domain: url.match(DOMAIN_NAME)?.length ?? 0,
    };
}
