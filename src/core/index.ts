/**
 * dockform core - library entry point
 *
 * Provisions a tree of multi-variant container image definitions: configuration overlays,
 * bootstrap files and Dockerfile macro expansion, driven by a target table.
 */

// Configuration
export * from './config/index.js';

// Target dispatch
export * from './dispatch/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Dockerfile macros
export * from './macros/index.js';

// Variant name filters
export * from './matcher/index.js';

// Overlays and bootstrap files
export * from './overlay/index.js';

// Utils
export * from './utils/index.js';

// Variant discovery
export * from './variants/index.js';
