import fs from 'fs';
import path from 'path';
import { FeaturizerError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import type { FeatureValue } from '../features/types.js';

type Row = Readonly<Record<string, FeatureValue>>;

// Booleans are written the way the training notebooks read them back
function formatValue(value: FeatureValue | undefined): string {
    if (value === undefined) return '';
    if (typeof value === 'boolean') return value ? 'True' : 'False';
    return String(value);
}

function quote(field: string): string {
    return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

/** CSV text with a header line; columns default to the first row's keys. */
export function toCsv(rows: readonly Row[], columns?: readonly string[]): string {
    const [first] = rows;
    if (!first) {
        throw new FeaturizerError('Cannot write a CSV without rows');
    }

    const header = columns ?? Object.keys(first);
    const lines = [header.map(quote).join(',')];
    for (const row of rows) {
        lines.push(header.map(column => quote(formatValue(row[column]))).join(','));
    }

    return lines.join('\r\n') + '\r\n';
}

export async function writeCsv(rows: readonly Row[], file: string, columns?: readonly string[]): Promise<void> {
    const content = toCsv(rows, columns);
    await fs.promises.mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await fs.promises.writeFile(file, content, 'utf-8');
    logger.info(`Wrote ${rows.length} rows to ${file}`);
}
