/**
 * Macro marker grammar
 *
 * A marker embedded in a Dockerfile reads `#[family:selector]`, e.g. `#[apache:alpine-3]`.
 * Both parts are non-empty runs of letters, digits, `.` and `-`. The leading `#` keeps an
 * unexpanded marker a comment line for Docker. The whole bracketed token is what gets replaced.
 */

import { MacroError } from './errors.js';

export const MARKER_PREFIX = '#[';
export const MARKER_SUFFIX = ']';

const IDENTIFIER = '[A-Za-z0-9.-]+';
const TAG_PATTERN = new RegExp(`^(${IDENTIFIER}):(${IDENTIFIER})$`);

/** Global pattern over a whole file; group 1 is family, group 2 is selector */
export const MARKER_PATTERN = new RegExp(`#\\[(${IDENTIFIER}):(${IDENTIFIER})\\]`, 'g');

export interface MacroMarker {
    /** `family:selector` */
    tag: string;
    family: string;
    selector: string;
    /** Delimited token as it appears in the file, `#[family:selector]` */
    token: string;
}

export function createMarker(family: string, selector: string): MacroMarker {
    const tag = `${family}:${selector}`;
    return { tag, family, selector, token: `${MARKER_PREFIX}${tag}${MARKER_SUFFIX}` };
}

/**
 * Parse a `family:selector` tag
 */
export function parseMarker(tag: string): MacroMarker {
    const match = TAG_PATTERN.exec(tag);
    if (!match?.[1] || !match[2]) {
        throw MacroError.invalidMarker(tag);
    }
    return createMarker(match[1], match[2]);
}
