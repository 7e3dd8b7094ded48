import fs from 'fs';
import { z } from 'zod';
import { getConfig } from './settings.js';
import { ConfigError, formatZodIssues } from '../core/errors.js';
import type { FeatureCatalogs } from '../features/types.js';

const NameListSchema = z
    .array(z.string().min(1))
    .refine(names => new Set(names).size === names.length, { message: 'names must be unique' });

const CatalogsSchema = z.object({
    tags: NameListSchema,
    attrs: NameListSchema,
    eventHandlerAttrs: NameListSchema,
    domObjects: NameListSchema,
    properties: NameListSchema,
    methods: NameListSchema,
});

export function parseCatalogs(raw: unknown, source = 'catalogs'): FeatureCatalogs {
    const result = CatalogsSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid feature catalogs in ${source}`, formatZodIssues(result.error));
    }
    return result.data;
}

export function loadCatalogs(file: string = getConfig().catalogs.path): FeatureCatalogs {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Cannot read feature catalogs from ${file}`, [String(error)], { cause: error });
    }
    return parseCatalogs(raw, file);
}

let defaultCatalogs: FeatureCatalogs | null = null;

/** Catalogs from the configured file, read once. */
export function getCatalogs(): FeatureCatalogs {
    if (!defaultCatalogs) {
        defaultCatalogs = loadCatalogs();
    }
    return defaultCatalogs;
}
