#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfig, validateConfig } from '../config/settings.js';
import { logger } from '../core/logger.js';
import { DatasetBuilder } from '../dataset/builder.js';
import { getPageFeatureExtractor } from '../features/page-features.js';
import { analyzeUrl } from '../features/url-analyzer.js';
import { writeCsv } from '../reporter/csv.js';

const program = new Command();

function exitOnInvalidConfig(): void {
    const validation = validateConfig();
    if (!validation.valid) {
        console.error(chalk.red('Configuration errors:'));
        validation.errors.forEach(e => console.error(chalk.red(`  - ${e}`)));
        process.exit(1);
    }
}

function parsePositiveInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

program
    .name('xss-featurizer')
    .description('🧪 Feature extraction for XSS page classification')
    .version('1.0.0')
    .option('-v, --verbose', 'Log debug output')
    .hook('preAction', (thisCommand) => {
        if (thisCommand.opts().verbose === true) {
            logger.setLevel('debug');
        }
    });

// Build command - the whole labeled dataset
program
    .command('build')
    .description('Extract features for every page of the benign and XSS manifests and write them as CSV')
    .option('-o, --output <file>', 'CSV file to write')
    .option('-c, --concurrency <number>', 'Pages processed at once', parsePositiveInt)
    .action(async (options: { output?: string; concurrency?: number }) => {
        logger.banner('XSS Featurizer');
        exitOnInvalidConfig();

        const config = getConfig();
        const output = options.output ?? config.dataset.output;
        const concurrency = options.concurrency ?? config.dataset.concurrency;

        console.error(chalk.gray(`   Benign manifest: ${config.dataset.benignManifest} (${config.dataset.benignDir})`));
        console.error(chalk.gray(`   XSS manifest: ${config.dataset.xssManifest} (${config.dataset.xssDir})`));
        console.error(chalk.gray(`   Output: ${output}`));
        console.error('');

        const extractor = getPageFeatureExtractor();
        const builder = new DatasetBuilder(extractor);
        const result = await builder.buildFromConfig({
            concurrency,
            onProgress: (done, total) => logger.progress(done, total, 'Progress'),
        });

        const spinner = ora('Writing CSV...').start();
        await writeCsv(result.rows, output, extractor.columns());
        spinner.succeed(`Wrote ${result.rows.length} rows to ${output}`);

        logger.success(`Processed ${result.processed} pages, ${result.skipped} skipped (document not found)`);
        if (result.failed > 0) {
            logger.warn(`${result.failed} pages failed, see the errors above`);
        }
    });

// Page command - features of a single document
program
    .command('page <htmlFile> <url>')
    .description('Print the feature record of one page as JSON')
    .action(async (htmlFile: string, url: string) => {
        exitOnInvalidConfig();

        const features = await getPageFeatureExtractor().extract(htmlFile, url);
        if (!features) {
            console.error(chalk.red(`File not found: ${htmlFile}`));
            process.exitCode = 1;
            return;
        }
        console.log(JSON.stringify(features, null, 2));
    });

// URL command
program
    .command('url <url>')
    .description('Print the lexical features of a URL as JSON')
    .action((url: string) => {
        console.log(JSON.stringify(analyzeUrl(url), null, 2));
    });

// Schema command
program
    .command('schema')
    .description('List the CSV columns produced with the configured catalogs')
    .action(() => {
        exitOnInvalidConfig();
        console.log(getPageFeatureExtractor().columns().join('\n'));
    });

try {
    await program.parseAsync();
} catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
} finally {
    logger.close();
}
