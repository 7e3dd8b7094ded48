import type { FeatureCatalogs } from '../types.js';

export const TEST_CATALOGS: FeatureCatalogs = {
    tags: ['script', 'iframe', 'a', 'div', 'frame'],
    attrs: ['href', 'src'],
    eventHandlerAttrs: ['onclick', 'onload', 'onerror'],
    domObjects: ['windows', 'location', 'document'],
    properties: ['cookie', 'document', 'referrer'],
    methods: ['write', 'getElementsByTagName', 'alert', 'eval', 'fromCharCode', 'prompt', 'confirm'],
};
