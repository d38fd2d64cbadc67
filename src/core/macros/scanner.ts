import { promises as fs } from 'fs';
import { MARKER_PATTERN, createMarker, type MacroMarker } from './marker.js';
import { MacroError } from './errors.js';

/**
 * Markers present in a text, in first-occurrence order, each once
 */
export function scanMarkersInText(text: string): MacroMarker[] {
    const seen = new Map<string, MacroMarker>();
    for (const match of text.matchAll(MARKER_PATTERN)) {
        const [, family, selector] = match;
        if (family === undefined || selector === undefined) {
            continue;
        }
        const marker = createMarker(family, selector);
        if (!seen.has(marker.tag)) {
            seen.set(marker.tag, marker);
        }
    }
    return [...seen.values()];
}

async function readDefinition(filePath: string): Promise<string> {
    try {
        return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw MacroError.readFailed(filePath, error);
    }
}

/**
 * Markers of a build-definition file.
 * The file is read when iteration starts, so each call is one fresh pass.
 */
export async function* scanMarkers(
    filePath: string
): AsyncGenerator<MacroMarker, void, undefined> {
    const text = await readDefinition(filePath);
    yield* scanMarkersInText(text);
}
