import { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 * Each method creates a properly typed error with LOGGER scope
 */
export class LoggerError {
    /**
     * Unknown transport type
     */
    static unknownTransportType(transportType: string): DockformRuntimeError {
        return new DockformRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    }

    /**
     * Transport initialization failed
     */
    static transportInitializationFailed(
        transportType: string,
        reason: string,
        details?: Record<string, unknown>
    ): DockformRuntimeError {
        return new DockformRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to initialize ${transportType} transport: ${reason}`,
            { transportType, reason, ...details }
        );
    }

    /**
     * Invalid log level
     */
    static invalidLogLevel(level: string, validLevels: readonly string[]): DockformRuntimeError {
        return new DockformRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels }
        );
    }
}
