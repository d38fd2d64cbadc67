/**
 * Overlay Module
 *
 * Configuration overlays onto variant `conf/` directories and bootstrap file deployment
 */

export {
    overlayConfiguration,
    clearConfiguration,
    copyIntoVariants,
    assertReadableDirectory,
} from './overlay-engine.js';
export { deployBaselayout } from './baselayout.js';
export { OverlayLock, overlayLock } from './overlay-lock.js';
export { OverlayError } from './errors.js';
export { OverlayErrorCode } from './error-codes.js';
export { CONF_DIR, BASELAYOUT_DIR } from './types.js';
export type {
    OverlayMode,
    OverlayOptions,
    OverlayFailure,
    OverlayResult,
} from './types.js';
