import type { LoggerConfig } from './schemas.js';
import { DockformLogger } from './dockform-logger.js';
import { createTransports } from './transport-factory.js';
import { DockformLogComponent, type Logger } from './types.js';

export interface CreateLoggerOptions {
    config: LoggerConfig;
    /** Defaults to CLI */
    component?: DockformLogComponent;
    /** Directory that relative log file paths resolve against */
    baseDir?: string;
}

/**
 * Build a logger from validated configuration
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    return new DockformLogger({
        level: options.config.level,
        component: options.component ?? DockformLogComponent.CLI,
        transports: createTransports(options.config.transports, options.baseDir),
    });
}
