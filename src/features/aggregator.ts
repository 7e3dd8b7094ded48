import { FeaturizerError } from '../core/errors.js';
import type { JsFragmentAnalyzer } from './js-analyzer.js';
import { featureKey, type FeatureRecord, type FragmentRecord } from './types.js';

function maxOf(records: readonly FragmentRecord[], pick: (record: FragmentRecord) => number): number {
    return records.reduce((max, record) => Math.max(max, pick(record)), -Infinity);
}

function minOf(records: readonly FragmentRecord[], pick: (record: FragmentRecord) => number): number {
    return records.reduce((min, record) => Math.min(min, pick(record)), Infinity);
}

/**
 * Reduces the fragments of one page to page-level JavaScript features.
 *
 * DOM object, property and method counts take the maximum over fragments
 * (did any script touch it), while source length, function declarations and
 * calls take the minimum (how simple is the simplest script). A page without
 * any parsable fragment is reduced over the analysis of the empty string, so
 * the block is always complete.
 */
export function aggregateFragments(
    fragments: readonly FragmentRecord[],
    analyzer: JsFragmentAnalyzer
): FeatureRecord {
    let records = fragments;
    if (records.length === 0) {
        const placeholder = analyzer.analyze('', 'empty placeholder');
        if (!placeholder) {
            throw new FeaturizerError('The empty script could not be analyzed');
        }
        records = [placeholder];
    }

    const { domObjects, properties, methods } = analyzer.catalogs;
    const features: FeatureRecord = {};

    for (const name of domObjects) {
        features[featureKey.dom(name)] = maxOf(records, r => r.domObjects[name] ?? 0);
    }
    for (const name of properties) {
        features[featureKey.prop(name)] = maxOf(records, r => r.properties[name] ?? 0);
    }
    for (const name of methods) {
        features[featureKey.method(name)] = maxOf(records, r => r.methods[name] ?? 0);
    }

    features['js_min_length'] = minOf(records, r => r.length);
    features['js_min_define_function'] = minOf(records, r => r.functionDeclarations);
    features['js_min_function_calls'] = minOf(records, r => r.calls);
    features['js_string_max_length'] = maxOf(records, r => r.maxStringLength);

    return features;
}
