import { randomUUID } from 'crypto';

/**
 * Abstract base for every error raised by dockform.
 * Carries a trace id so a failure reported by the CLI can be matched with file logs.
 */
export abstract class DockformBaseError extends Error {
    public readonly traceId: string;

    constructor(message: string, traceId?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.traceId = traceId ?? randomUUID();
    }

    /**
     * Serializable view used by the file transport and `--log-level debug` output
     */
    abstract toJSON(): Record<string, unknown>;
}
