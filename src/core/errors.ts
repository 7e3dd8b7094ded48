import type { ZodError } from 'zod';

export class FeaturizerError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FeaturizerError';
    }
}

/** Invalid catalog or environment configuration. */
export class ConfigError extends FeaturizerError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** A dataset manifest that is unreadable or does not match its schema. */
export class ManifestError extends FeaturizerError {
    readonly file: string;
    readonly issues: string[];

    constructor(file: string, issues: string[], options?: { cause?: unknown }) {
        super(`Invalid manifest ${file}: ${issues.join('; ')}`, options);
        this.name = 'ManifestError';
        this.file = file;
        this.issues = issues;
    }
}

export function formatZodIssues(error: ZodError): string[] {
    return error.errors.map(e => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`);
}

export function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
