import { promises as fs } from 'fs';
import * as path from 'path';
import { matchesFilter } from '../matcher/tag-matcher.js';
import { isRegularFile } from '../utils/fs.js';
import { DEFINITION_FILE, type Variant } from './types.js';
import { VariantError } from './errors.js';

async function listSubdirectories(directory: string): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
}

/**
 * List the image families under the docker root, sorted by name
 */
export async function listFamilies(dockerRoot: string): Promise<string[]> {
    try {
        return await listSubdirectories(dockerRoot);
    } catch (error) {
        throw VariantError.listFailed(dockerRoot, error);
    }
}

/**
 * Describe every variant directory of a family, whether or not it has a Dockerfile
 */
export async function discoverVariants(dockerRoot: string, family: string): Promise<Variant[]> {
    const familyPath = path.join(dockerRoot, family);

    let names: string[];
    try {
        names = await listSubdirectories(familyPath);
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            throw VariantError.familyNotFound(family, familyPath);
        }
        throw VariantError.listFailed(familyPath, error);
    }

    const variants: Variant[] = [];
    for (const name of names) {
        const variantPath = path.join(familyPath, name);
        variants.push({
            name,
            familyPath,
            path: variantPath,
            hasDefinition: await isRegularFile(path.join(variantPath, DEFINITION_FILE)),
        });
    }
    return variants;
}

/**
 * Variants of a family selected by a filter that carry a Dockerfile.
 * Directories without one are never provisioned.
 */
export async function listVariants(
    dockerRoot: string,
    family: string,
    filter: string
): Promise<Variant[]> {
    const variants = await discoverVariants(dockerRoot, family);
    return variants.filter(
        (variant) => variant.hasDefinition && matchesFilter(variant.name, filter)
    );
}
