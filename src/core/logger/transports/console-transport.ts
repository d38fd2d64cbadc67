/**
 * Console Transport
 *
 * Logs to stdout/stderr with optional color support.
 * Uses chalk for color formatting.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** Prefix lines with time, level and component */
    timestamps?: boolean;
}

/**
 * Console transport for terminal output
 *
 * Without timestamps, info lines are printed as-is so provisioning progress reads like a report;
 * other levels keep a level label.
 */
export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;
    private timestamps: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.timestamps = config.timestamps ?? false;
    }

    format(entry: LogEntry): string {
        const levelLabel = `[${entry.level.toUpperCase()}]`;

        let message: string;
        if (this.timestamps) {
            const timestamp = new Date(entry.timestamp).toLocaleTimeString();
            message = `${timestamp} ${levelLabel} [${entry.component}] ${entry.message}`;
        } else if (entry.level === 'info') {
            message = entry.message;
        } else {
            message = `${levelLabel} ${entry.message}`;
        }

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        // Add structured context if present
        if (entry.context && Object.keys(entry.context).length > 0 && entry.level !== 'info') {
            message += '\n' + JSON.stringify(entry.context, null, 2);
        }

        return message;
    }

    write(entry: LogEntry): void {
        const message = this.format(entry);

        // Use stderr for errors and warnings, stdout for others
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(message);
        } else {
            console.log(message);
        }
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'debug':
            case 'silly':
                return chalk.gray;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
            default:
                return (s: string) => s;
        }
    }
}
