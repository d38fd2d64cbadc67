import { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Project configuration error factory
 */
export class ConfigError {
    static fileReadError(configPath: string, reason: string): DockformRuntimeError {
        return new DockformRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read configuration file ${configPath}: ${reason}`,
            { configPath, reason }
        );
    }

    static parseError(configPath: string, reason: string): DockformRuntimeError {
        return new DockformRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file ${configPath}: ${reason}`,
            { configPath, reason }
        );
    }

    static baseDirNotFound(baseDir: string): DockformRuntimeError {
        return new DockformRuntimeError(
            ConfigErrorCode.BASE_DIR_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.NOT_FOUND,
            `Base directory ${baseDir} does not exist`,
            {
                baseDir,
                recovery: 'Run dockform from the repository root or pass --base-dir',
            }
        );
    }
}
