/**
 * Dockerfile Macros Module
 *
 * Scans Dockerfiles for `#[family:selector]` markers, resolves them to fragment files in the
 * provisioning tree and expands them in place.
 */

export {
    MARKER_PATTERN,
    MARKER_PREFIX,
    MARKER_SUFFIX,
    createMarker,
    parseMarker,
} from './marker.js';
export type { MacroMarker } from './marker.js';
export { scanMarkers, scanMarkersInText } from './scanner.js';
export { resolveMarker, fragmentPathFor, FRAGMENT_DIR } from './resolver.js';
export { expandMarker, expandMarkers, replaceMarker, replaceMarkers } from './expander.js';
export { deployDockerfileMacros } from './deploy-macros.js';
export type { DeployMacrosOptions, DeployMacrosResult } from './deploy-macros.js';
export { MacroError } from './errors.js';
export { MacroErrorCode } from './error-codes.js';
