/**
 * Transport Factory
 *
 * Creates transport instances from configuration.
 */

import * as path from 'path';
import type { LoggerTransport } from './types.js';
import type { LoggerTransportConfig } from './schemas.js';
import { SilentTransport } from './transports/silent-transport.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LoggerError } from './errors.js';

/**
 * Create a transport instance from configuration
 * @param baseDir Directory that relative file transport paths resolve against
 */
export function createTransport(
    config: LoggerTransportConfig,
    baseDir: string = process.cwd()
): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();

        case 'console':
            return new ConsoleTransport({
                colorize: config.colorize,
                timestamps: config.timestamps,
            });

        case 'file':
            return new FileTransport({
                path: path.resolve(baseDir, config.path),
                maxSize: config.maxSize,
                maxFiles: config.maxFiles,
            });

        default: {
            const unknownType: never = config;
            throw LoggerError.unknownTransportType(String(unknownType));
        }
    }
}

/**
 * Create multiple transports from configuration array
 */
export function createTransports(
    configs: LoggerTransportConfig[],
    baseDir?: string
): LoggerTransport[] {
    return configs.map((config) => createTransport(config, baseDir));
}
