// Feature-extraction engine
export { walkTree, classify, isTreeMap, nodeType } from './tree-walker.js';
export type { TreeMap, TreeValue } from './tree-walker.js';
export { JsFragmentAnalyzer } from './js-analyzer.js';
export { HtmlVectorExtractor, javascriptProtocolCode } from './html-extractor.js';
export type { HtmlExtraction, JsFragment, JsVector } from './html-extractor.js';
export { aggregateFragments } from './aggregator.js';
export { analyzeUrl, decodeUrl, REDIRECTION_SINKS, URL_KEYWORDS } from './url-analyzer.js';
export { PageFeatureExtractor, getPageFeatureExtractor } from './page-features.js';
export { featureKeys, featureKey, LABEL_KEY } from './types.js';
export type {
    FeatureCatalogs,
    FeatureRecord,
    FeatureValue,
    FragmentRecord,
    Label,
    LabeledPage,
    PageFeatureRecord,
} from './types.js';
export { loadCatalogs, parseCatalogs, getCatalogs } from '../config/catalogs.js';
