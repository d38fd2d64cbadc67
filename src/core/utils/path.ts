import * as path from 'path';

/**
 * Path relative to the project base dir for progress output, e.g. `docker/php/alpine-3`.
 * Paths outside the base dir are returned unchanged.
 */
export function relativeToBase(baseDir: string, target: string): string {
    const relative = path.relative(baseDir, target);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
        return target;
    }
    return relative.split(path.sep).join('/');
}
