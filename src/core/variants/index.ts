export { listFamilies, discoverVariants, listVariants } from './variant-discovery.js';
export { VariantError } from './errors.js';
export { VariantErrorCode } from './error-codes.js';
export { DEFINITION_FILE } from './types.js';
export type { Variant } from './types.js';
