/**
 * Silent Transport
 *
 * A no-op transport that discards all log entries.
 * Used by library consumers that want dockform's operations without output.
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {
        // Intentionally do nothing - discard all logs
    }

    destroy(): void {
        // Nothing to clean up
    }
}
