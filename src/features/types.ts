export type FeatureValue = number | boolean;

/** Flat feature name → value mapping; one column per key once serialized. */
export type FeatureRecord = Record<string, FeatureValue>;

export type Label = 0 | 1;

export interface FeatureCatalogs {
    /** HTML tag names counted as `html_tag_<name>`. */
    tags: readonly string[];
    /** HTML attribute names counted as `html_attr_<name>`. */
    attrs: readonly string[];
    /** Event-handler attributes: counted as `html_event_<name>`, and their values analyzed as JavaScript. */
    eventHandlerAttrs: readonly string[];
    domObjects: readonly string[];
    properties: readonly string[];
    methods: readonly string[];
}

export type IdentifierCatalog = Pick<FeatureCatalogs, 'domObjects' | 'properties' | 'methods'>;
export type HtmlCatalog = Pick<FeatureCatalogs, 'tags' | 'attrs' | 'eventHandlerAttrs'>;

/** Features of one JavaScript fragment, before page-level reduction. */
export interface FragmentRecord {
    length: number;
    domObjects: Record<string, number>;
    properties: Record<string, number>;
    methods: Record<string, number>;
    functionDeclarations: number;
    calls: number;
    maxStringLength: number;
}

export interface LabeledPage {
    filePath: string;
    url: string;
    label: Label;
}

export type PageFeatureRecord = { class: Label } & FeatureRecord;

export const LABEL_KEY = 'class';

export const featureKey = {
    tag: (name: string) => `html_tag_${name}`,
    attr: (name: string) => `html_attr_${name}`,
    event: (name: string) => `html_event_${name}`,
    dom: (name: string) => `js_dom_${name}`,
    prop: (name: string) => `js_prop_${name}`,
    method: (name: string) => `js_method_${name}`,
} as const;

export const URL_FEATURE_KEYS = [
    'url_length',
    'url_duplicated_characters',
    'url_special_characters',
    'url_script_tag',
    'url_cookie',
    'url_redirection',
    'url_number_keywords',
    'url_number_domain',
] as const;

export const JS_SUMMARY_KEYS = [
    'js_min_length',
    'js_min_define_function',
    'js_min_function_calls',
    'js_string_max_length',
] as const;

// Last column of every row, after the JavaScript block
export const HTML_LENGTH_KEY = 'html_length';

export function htmlFeatureKeys(catalogs: HtmlCatalog): string[] {
    return [
        ...catalogs.tags.map(featureKey.tag),
        ...catalogs.attrs.map(featureKey.attr),
        ...catalogs.eventHandlerAttrs.map(featureKey.event),
        'js_file',
    ];
}

export function jsFeatureKeys(catalogs: IdentifierCatalog): string[] {
    return [
        ...catalogs.domObjects.map(featureKey.dom),
        ...catalogs.properties.map(featureKey.prop),
        ...catalogs.methods.map(featureKey.method),
        ...JS_SUMMARY_KEYS,
    ];
}

/**
 * Column order of every page row produced for `catalogs`. Identical for all
 * pages, so rows can be written as CSV without a schema-discovery pass.
 */
export function featureKeys(catalogs: FeatureCatalogs, withLabel = true): string[] {
    return [
        ...(withLabel ? [LABEL_KEY] : []),
        ...URL_FEATURE_KEYS,
        ...htmlFeatureKeys(catalogs),
        ...jsFeatureKeys(catalogs),
        HTML_LENGTH_KEY,
    ];
}
