import type { Logger } from '../logger/types.js';
import type { Variant } from '../variants/types.js';
import type { DockformRuntimeError } from '../errors/DockformRuntimeError.js';
import type { OverlayLock } from './overlay-lock.js';

/** Directory inside a variant that configuration overlays own */
export const CONF_DIR = 'conf';

/** Directory inside a variant that receives the shared bootstrap files */
export const BASELAYOUT_DIR = 'baselayout';

/**
 * How a failed copy into one variant is handled:
 * - strict: abort the overlay with the error
 * - lenient: log it, record it in the result and go on with the remaining variants
 */
export type OverlayMode = 'strict' | 'lenient';

export interface OverlayOptions {
    /** Remove the variant's target directory before copying */
    clearFirst?: boolean;
    /** Defaults to strict */
    mode?: OverlayMode;
    logger: Logger;
    /** Base dir progress lines are shown relative to */
    baseDir?: string;
    /** Defaults to the process-wide lock */
    lock?: OverlayLock;
}

export interface OverlayFailure {
    variant: Variant;
    error: DockformRuntimeError;
}

export interface OverlayResult {
    applied: Variant[];
    failed: OverlayFailure[];
}
