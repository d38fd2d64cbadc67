import * as path from 'path';
import { isRegularFile } from '../utils/fs.js';
import { MacroError } from './errors.js';
import type { MacroMarker } from './marker.js';

/** Directory inside a family's provisioning tree that holds its fragments */
export const FRAGMENT_DIR = 'Dockerfile';

/**
 * `apache:alpine-3` -> `<root>/apache/Dockerfile/Dockerfile.alpine-3`
 */
export function fragmentPathFor(marker: MacroMarker, provisioningRoot: string): string {
    return path.join(
        provisioningRoot,
        marker.family,
        FRAGMENT_DIR,
        `Dockerfile.${marker.selector}`
    );
}

/**
 * Path of the fragment a marker refers to.
 * @throws {DockformRuntimeError} MacroErrorCode.UNRESOLVED when it is not a regular file
 */
export async function resolveMarker(
    marker: MacroMarker,
    provisioningRoot: string,
    dockerfile?: string
): Promise<string> {
    const expectedPath = fragmentPathFor(marker, provisioningRoot);
    if (!(await isRegularFile(expectedPath))) {
        throw MacroError.unresolved(marker.tag, expectedPath, dockerfile);
    }
    return expectedPath;
}
