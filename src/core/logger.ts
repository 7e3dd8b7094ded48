import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { getConfig, type LogLevel } from '../config/settings.js';

export type { LogLevel };

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LOG_COLORS: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
};

const LOG_ICONS: Record<LogLevel, string> = {
    debug: '🔍',
    info: 'ℹ️ ',
    warn: '⚠️ ',
    error: '❌',
};

class Logger {
    private level: LogLevel = 'info';
    private logFile: string | null = null;
    private fileStream: fs.WriteStream | null = null;

    constructor() {
        try {
            const config = getConfig();
            this.level = config.logging.level;
            this.logFile = config.logging.file ?? null;
            this.initFileStream();
        } catch {
            // Invalid environment: keep defaults, validateConfig() reports the details
            this.level = 'info';
            this.logFile = null;
        }
    }

    private initFileStream(): void {
        if (this.logFile) {
            const logDir = path.dirname(this.logFile);
            if (!fs.existsSync(logDir)) {
                fs.mkdirSync(logDir, { recursive: true });
            }
            this.fileStream = fs.createWriteStream(this.logFile, { flags: 'a' });
        }
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
    }

    private formatMessage(level: LogLevel, message: string, meta?: object): string {
        const timestamp = new Date().toISOString();
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;
    }

    private writeToFile(message: string): void {
        if (this.fileStream) {
            this.fileStream.write(message + '\n');
        }
    }

    private log(level: LogLevel, message: string, meta?: object): void {
        if (!this.shouldLog(level)) return;

        const formattedMessage = this.formatMessage(level, message, meta);
        const colorFn = LOG_COLORS[level];
        const icon = LOG_ICONS[level];

        // Diagnostics go to stderr so JSON printed by the CLI stays parseable
        console.error(`${icon} ${colorFn(formattedMessage)}`);

        this.writeToFile(formattedMessage);
    }

    debug(message: string, meta?: object): void {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: object): void {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: object): void {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: object): void {
        this.log('error', message, meta);
    }

    success(message: string): void {
        console.error(`✅ ${chalk.green(message)}`);
        this.writeToFile(`[${new Date().toISOString()}] [SUCCESS] ${message}`);
    }

    banner(title: string): void {
        const line = '═'.repeat(50);
        console.error(chalk.cyan(`\n╔${line}╗`));
        console.error(chalk.cyan(`║${title.padStart(25 + title.length / 2).padEnd(50)}║`));
        console.error(chalk.cyan(`╚${line}╝\n`));
    }

    progress(current: number, total: number, label: string): void {
        if (total <= 0) return;

        const percentage = Math.round((current / total) * 100);
        const barLength = 30;
        const filled = Math.round((current / total) * barLength);
        const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled);

        process.stderr.write(`\r${chalk.cyan(label)} [${bar}] ${percentage}% (${current}/${total})`);

        if (current === total) {
            process.stderr.write('\n');
        }
    }

    close(): void {
        if (this.fileStream) {
            this.fileStream.end();
        }
    }
}

// Singleton logger instance
export const logger = new Logger();
