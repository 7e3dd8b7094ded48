import { config } from 'dotenv';
import { z } from 'zod';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables
config({ path: path.resolve(__dirname, '../../.env') });

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Configuration schema with validation
const ConfigSchema = z.object({
    // Logging
    logging: z.object({
        level: LogLevelSchema.default('info'),
        file: z.string().min(1).optional(),
    }),

    // Feature catalogs
    catalogs: z.object({
        path: z.string().min(1),
    }),

    // Dataset generation
    dataset: z.object({
        benignManifest: z.string().min(1).default('randomwalk.json'),
        benignDir: z.string().min(1).default('html/randomsample/subsample/'),
        xssManifest: z.string().min(1).default('xssed.json'),
        xssDir: z.string().min(1).default('html/xssed/'),
        output: z.string().min(1).default('../data.csv'),
        concurrency: z.number().int().min(1).max(64).default(8),
    }),

    // Paths
    paths: z.object({
        root: z.string(),
        catalogs: z.string(),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

// Build configuration from environment
function buildConfig(): Config {
    const rootDir = path.resolve(__dirname, '../..');
    const catalogsDir = path.resolve(rootDir, 'catalogs');

    const rawConfig = {
        logging: {
            level: process.env.LOG_LEVEL || 'info',
            file: process.env.LOG_FILE || undefined,
        },
        catalogs: {
            path: process.env.CATALOGS_PATH || path.resolve(catalogsDir, 'default.json'),
        },
        dataset: {
            benignManifest: process.env.BENIGN_MANIFEST || 'randomwalk.json',
            benignDir: process.env.BENIGN_HTML_DIR || 'html/randomsample/subsample/',
            xssManifest: process.env.XSS_MANIFEST || 'xssed.json',
            xssDir: process.env.XSS_HTML_DIR || 'html/xssed/',
            output: process.env.OUTPUT_CSV || '../data.csv',
            concurrency: parseInt(process.env.DATASET_CONCURRENCY || '8'),
        },
        paths: {
            root: rootDir,
            catalogs: catalogsDir,
        },
    };

    return ConfigSchema.parse(rawConfig);
}

// Singleton configuration instance
let configInstance: Config | null = null;

export function getConfig(): Config {
    if (!configInstance) {
        configInstance = buildConfig();
    }
    return configInstance;
}

// For testing - allows resetting config
export function resetConfig(): void {
    configInstance = null;
}

export function validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    try {
        getConfig();
    } catch (error) {
        if (error instanceof z.ZodError) {
            errors.push(...error.errors.map(e => `${e.path.join('.')}: ${e.message}`));
        } else {
            errors.push(String(error));
        }
    }

    return { valid: errors.length === 0, errors };
}
