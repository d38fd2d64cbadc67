/**
 * Variant discovery error codes
 */
export enum VariantErrorCode {
    FAMILY_NOT_FOUND = 'variant_family_not_found',
    LIST_FAILED = 'variant_list_failed',
}
