/**
 * Configuration Overlay Engine
 *
 * Copies a configuration bundle into the `conf/` directory of each selected variant.
 * The copy merges by overwrite; files only present in `conf/` stay unless the overlay
 * clears the directory first. A target typically clears with its first bundle and layers
 * later bundles (OS specific, version specific) on top.
 */

import fs from 'fs-extra';
import { promises as fsp, constants } from 'fs';
import * as path from 'path';
import type { Variant } from '../variants/types.js';
import { DockformLogComponent, type Logger } from '../logger/types.js';
import { relativeToBase } from '../utils/path.js';
import { errorMessage } from '../utils/fs.js';
import {
    isDockformRuntimeError,
    type DockformRuntimeError,
} from '../errors/DockformRuntimeError.js';
import { OverlayError } from './errors.js';
import { overlayLock } from './overlay-lock.js';
import { CONF_DIR, type OverlayOptions, type OverlayResult } from './types.js';

function displayPath(variant: Variant, baseDir: string | undefined): string {
    return baseDir ? relativeToBase(baseDir, variant.path) : variant.path;
}

/**
 * Fails with SOURCE_UNREADABLE unless `sourceDir` is a readable directory
 */
export async function assertReadableDirectory(sourceDir: string): Promise<void> {
    try {
        const stats = await fsp.stat(sourceDir);
        if (!stats.isDirectory()) {
            throw OverlayError.sourceUnreadable(sourceDir, 'not a directory');
        }
        await fsp.access(sourceDir, constants.R_OK | constants.X_OK);
    } catch (error) {
        if (isDockformRuntimeError(error)) {
            throw error;
        }
        throw OverlayError.sourceUnreadable(sourceDir, errorMessage(error));
    }
}

/**
 * Copy a source tree into one directory of every variant, honoring clear and failure modes.
 * Shared by configuration overlays and the bootstrap step.
 */
export async function copyIntoVariants(
    sourceDir: string,
    variants: readonly Variant[],
    targetDirName: string,
    options: OverlayOptions
): Promise<OverlayResult> {
    const logger = options.logger;
    const lock = options.lock ?? overlayLock;
    const mode = options.mode ?? 'strict';
    const result: OverlayResult = { applied: [], failed: [] };

    await assertReadableDirectory(sourceDir);

    for (const variant of variants) {
        const target = path.join(variant.path, targetDirName);
        logger.info(`    - ${displayPath(variant, options.baseDir)}`);

        try {
            await lock.run(target, async () => {
                if (options.clearFirst) {
                    await clearDirectory(variant, target);
                }
                await copyTree(sourceDir, variant, target, logger);
            });
            result.applied.push(variant);
        } catch (error) {
            const failure: DockformRuntimeError = isDockformRuntimeError(error)
                ? error
                : OverlayError.copyFailed(variant.name, sourceDir, target, error);
            if (mode === 'strict') {
                throw failure;
            }
            logger.warn(`Skipping ${variant.name}: ${failure.message}`, {
                variant: variant.path,
                code: failure.code,
            });
            result.failed.push({ variant, error: failure });
        }
    }

    return result;
}

async function clearDirectory(variant: Variant, target: string): Promise<void> {
    try {
        await fs.remove(target);
    } catch (error) {
        throw OverlayError.clearFailed(variant.name, target, error);
    }
}

async function copyTree(
    sourceDir: string,
    variant: Variant,
    target: string,
    logger: Logger
): Promise<void> {
    try {
        await fs.copy(sourceDir, target, {
            overwrite: true,
            errorOnExist: false,
            filter: (src) => {
                logger.silly(`copy ${src}`);
                return true;
            },
        });
    } catch (error) {
        throw OverlayError.copyFailed(variant.name, sourceDir, target, error);
    }
}

/**
 * Overlay a configuration bundle onto the `conf/` directory of every variant
 */
export async function overlayConfiguration(
    sourceDir: string,
    variants: readonly Variant[],
    options: OverlayOptions
): Promise<OverlayResult> {
    return copyIntoVariants(sourceDir, variants, CONF_DIR, {
        ...options,
        logger: options.logger.createChild(DockformLogComponent.OVERLAY),
    });
}

/**
 * Remove the `conf/` directory of every variant
 */
export async function clearConfiguration(
    variants: readonly Variant[],
    options: Omit<OverlayOptions, 'clearFirst' | 'mode'>
): Promise<void> {
    const logger = options.logger.createChild(DockformLogComponent.OVERLAY);
    const lock = options.lock ?? overlayLock;

    for (const variant of variants) {
        const target = path.join(variant.path, CONF_DIR);
        logger.info(`    - ${displayPath(variant, options.baseDir)}`);
        await lock.run(target, () => clearDirectory(variant, target));
    }
}
