/**
 * Variant name filters
 *
 * Glob-style filters select the variants of an image family that a step applies to,
 * e.g. `centos-*` or `*-php7`. Only `*` is special; it matches any run of characters
 * (including none). Everything else matches literally and case-sensitively, and the
 * whole name must match.
 */

export const MATCH_ALL = '*';

const compiled = new Map<string, RegExp>();

function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Compile a filter into an anchored regular expression
 */
export function compileFilter(filter: string): RegExp {
    const cached = compiled.get(filter);
    if (cached) {
        return cached;
    }

    const source = filter.split('*').map(escapeRegExp).join('.*');
    const pattern = new RegExp(`^${source}$`, 's');
    compiled.set(filter, pattern);
    return pattern;
}

/**
 * Whether a variant directory name is selected by a filter
 */
export function matchesFilter(variantName: string, filter: string): boolean {
    if (filter === MATCH_ALL) {
        return true;
    }
    return compileFilter(filter).test(variantName);
}
