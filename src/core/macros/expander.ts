/**
 * Marker expansion
 *
 * Substitution is a single pass over the original text: fragment content is inserted verbatim
 * and never scanned again, so a fragment that happens to contain marker syntax stays literal.
 */

import { promises as fs } from 'fs';
import { writeFileAtomic } from '../utils/fs.js';
import { MARKER_PATTERN, type MacroMarker } from './marker.js';
import { MacroError } from './errors.js';

/**
 * Replace the markers of `fragments` (keyed by tag) in one pass.
 * Markers without an entry are left as they are.
 */
export function replaceMarkers(text: string, fragments: ReadonlyMap<string, string>): string {
    return text.replace(MARKER_PATTERN, (token: string, family: string, selector: string) => {
        return fragments.get(`${family}:${selector}`) ?? token;
    });
}

/**
 * Replace every occurrence of one marker's token with the fragment
 */
export function replaceMarker(text: string, marker: MacroMarker, fragment: string): string {
    return text.split(marker.token).join(fragment);
}

async function readText(filePath: string): Promise<string> {
    try {
        return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw MacroError.readFailed(filePath, error);
    }
}

async function rewrite(targetFile: string, content: string): Promise<void> {
    try {
        await writeFileAtomic(targetFile, content);
    } catch (error) {
        throw MacroError.writeFailed(targetFile, error);
    }
}

/**
 * Expand one marker of a file in place with the content of its fragment.
 * The file is replaced atomically; on failure it keeps its previous content.
 */
export async function expandMarker(
    targetFile: string,
    marker: MacroMarker,
    fragmentPath: string
): Promise<void> {
    const fragment = await readText(fragmentPath);
    const original = await readText(targetFile);
    const expanded = replaceMarker(original, marker, fragment);
    if (expanded !== original) {
        await rewrite(targetFile, expanded);
    }
}

/**
 * Expand several resolved markers of a file in place with a single read and write.
 * @param resolutions tag -> fragment path
 * @returns whether the file changed
 */
export async function expandMarkers(
    targetFile: string,
    resolutions: ReadonlyMap<string, string>
): Promise<boolean> {
    const fragments = new Map<string, string>();
    for (const [tag, fragmentPath] of resolutions) {
        fragments.set(tag, await readText(fragmentPath));
    }

    const original = await readText(targetFile);
    const expanded = replaceMarkers(original, fragments);
    if (expanded === original) {
        return false;
    }
    await rewrite(targetFile, expanded);
    return true;
}
