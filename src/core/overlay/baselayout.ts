/**
 * Bootstrap files
 *
 * The shared `baselayout/` tree (init scripts, helper binaries) is materialized into the
 * build context of the base images, where their Dockerfile copies it into the image with
 * `COPY baselayout/ /`. Any previous copy is replaced so removed files do not linger.
 */

import type { Variant } from '../variants/types.js';
import { DockformLogComponent } from '../logger/types.js';
import { copyIntoVariants } from './overlay-engine.js';
import { BASELAYOUT_DIR, type OverlayOptions, type OverlayResult } from './types.js';

export async function deployBaselayout(
    baselayoutDir: string,
    variants: readonly Variant[],
    options: Omit<OverlayOptions, 'clearFirst'>
): Promise<OverlayResult> {
    return copyIntoVariants(baselayoutDir, variants, BASELAYOUT_DIR, {
        ...options,
        clearFirst: true,
        logger: options.logger.createChild(DockformLogComponent.BOOTSTRAP),
    });
}
