import * as path from 'path';
import type { Logger } from '../logger/types.js';
import { DockformLogComponent } from '../logger/types.js';
import { listFamilies, discoverVariants } from '../variants/variant-discovery.js';
import { DEFINITION_FILE } from '../variants/types.js';
import { relativeToBase } from '../utils/path.js';
import { scanMarkers } from './scanner.js';
import { resolveMarker } from './resolver.js';
import { expandMarkers } from './expander.js';

export interface DeployMacrosOptions {
    /** Root of the image tree, `<base>/docker` */
    dockerRoot: string;
    /** Root of the fragment tree, `<base>/provisioning` */
    provisioningRoot: string;
    /** Base dir progress lines are shown relative to */
    baseDir: string;
    logger: Logger;
}

export interface DeployMacrosResult {
    /** Dockerfiles rewritten */
    files: string[];
    /** Markers expanded across all files */
    expansions: number;
}

/**
 * Expand the macros of every Dockerfile under the docker root.
 *
 * All markers of a file are resolved before it is touched, and the first unresolved marker
 * aborts the whole pass.
 */
export async function deployDockerfileMacros(
    options: DeployMacrosOptions
): Promise<DeployMacrosResult> {
    const logger = options.logger.createChild(DockformLogComponent.MACROS);
    const result: DeployMacrosResult = { files: [], expansions: 0 };

    logger.info(' -> Deploying Dockerfile macros');

    for (const family of await listFamilies(options.dockerRoot)) {
        for (const variant of await discoverVariants(options.dockerRoot, family)) {
            if (!variant.hasDefinition) {
                continue;
            }
            const dockerfile = path.join(variant.path, DEFINITION_FILE);

            const resolutions = new Map<string, string>();
            for await (const marker of scanMarkers(dockerfile)) {
                const fragmentPath = await resolveMarker(
                    marker,
                    options.provisioningRoot,
                    dockerfile
                );
                resolutions.set(marker.tag, fragmentPath);
                logger.debug(`Resolved ${marker.tag}`, { dockerfile, fragmentPath });
            }

            if (resolutions.size === 0) {
                continue;
            }

            if (await expandMarkers(dockerfile, resolutions)) {
                logger.info(`    - ${relativeToBase(options.baseDir, variant.path)}`);
                result.files.push(dockerfile);
                result.expansions += resolutions.size;
            }
        }
    }

    logger.debug('Dockerfile macros deployed', {
        files: result.files.length,
        expansions: result.expansions,
    });
    return result;
}
