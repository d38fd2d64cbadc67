/**
 * Target Dispatcher
 *
 * Runs the steps of each selected target against the variants its filters match.
 * Steps run strictly in table order, one variant at a time.
 */

import * as path from 'path';
import type { Logger } from '../logger/types.js';
import { DockformLogComponent } from '../logger/types.js';
import type { ProjectPaths } from '../config/schemas.js';
import { listVariants } from '../variants/variant-discovery.js';
import { overlayConfiguration, clearConfiguration } from '../overlay/overlay-engine.js';
import { deployBaselayout } from '../overlay/baselayout.js';
import type { OverlayFailure, OverlayMode } from '../overlay/types.js';
import { deployDockerfileMacros } from '../macros/deploy-macros.js';
import { MacroErrorCode } from '../macros/error-codes.js';
import { isDockformRuntimeError } from '../errors/DockformRuntimeError.js';
import { MATCH_ALL } from '../matcher/tag-matcher.js';
import { DispatchError } from './errors.js';
import type { Target, TargetStep, TargetTable } from './schemas.js';

export const ALL_TARGETS = 'all';

export interface DispatchContext {
    paths: ProjectPaths;
    /** Image namespace shown in headers */
    namespace: string;
    /** Failure handling for overlay copies, strict unless chosen explicitly */
    overlayMode: OverlayMode;
    logger: Logger;
}

export interface DispatchSummary {
    /** Targets that ran, in order */
    targets: string[];
    /** Variant copies skipped in lenient mode */
    failures: OverlayFailure[];
    /** Dockerfiles rewritten by macro steps */
    dockerfiles: string[];
}

export function shouldRunTarget(targetName: string, requestedTarget: string): boolean {
    return requestedTarget === ALL_TARGETS || requestedTarget === targetName;
}

/**
 * Short description of a step for progress and error messages
 */
export function describeStep(step: TargetStep): string {
    switch (step.type) {
        case 'configuration':
            return `configuration ${step.bundle} -> ${step.family} (${step.filter})`;
        case 'baselayout':
            return `baselayout -> ${step.family} (${step.filter})`;
        case 'clear':
            return `clear ${step.family} (${step.filter})`;
        case 'macros':
            return 'Dockerfile macros';
    }
}

function emptySummary(): DispatchSummary {
    return { targets: [], failures: [], dockerfiles: [] };
}

async function runStep(
    step: TargetStep,
    context: DispatchContext,
    summary: DispatchSummary,
    logger: Logger
): Promise<void> {
    const { paths } = context;

    switch (step.type) {
        case 'configuration': {
            logger.info(
                step.filter === MATCH_ALL
                    ? ' -> Deploying configuration'
                    : ` -> Deploying configuration with filter '${step.filter}'`
            );
            const variants = await listVariants(paths.dockerRoot, step.family, step.filter);
            const result = await overlayConfiguration(
                path.join(paths.provisioningRoot, step.bundle),
                variants,
                {
                    clearFirst: step.clear,
                    mode: context.overlayMode,
                    logger,
                    baseDir: paths.baseDir,
                }
            );
            summary.failures.push(...result.failed);
            return;
        }

        case 'baselayout': {
            logger.info(' -> Deploying baselayout');
            const variants = await listVariants(paths.dockerRoot, step.family, step.filter);
            const result = await deployBaselayout(paths.baselayoutDir, variants, {
                mode: context.overlayMode,
                logger,
                baseDir: paths.baseDir,
            });
            summary.failures.push(...result.failed);
            return;
        }

        case 'clear': {
            logger.info(' -> Clearing configuration');
            const variants = await listVariants(paths.dockerRoot, step.family, step.filter);
            await clearConfiguration(variants, { logger, baseDir: paths.baseDir });
            return;
        }

        case 'macros': {
            const result = await deployDockerfileMacros({
                dockerRoot: paths.dockerRoot,
                provisioningRoot: paths.provisioningRoot,
                baseDir: paths.baseDir,
                logger,
            });
            summary.dockerfiles.push(...result.files);
            return;
        }
    }
}

/**
 * Run one target if it is selected by the requested target name.
 * An unresolved macro propagates unchanged; other failures are wrapped with the target and step.
 */
export async function runTarget(
    target: Target,
    requestedTarget: string,
    context: DispatchContext,
    summary: DispatchSummary = emptySummary()
): Promise<DispatchSummary> {
    if (!shouldRunTarget(target.name, requestedTarget)) {
        return summary;
    }

    const logger = context.logger.createChild(DockformLogComponent.DISPATCH);
    const header = target.header ?? target.name;
    if (header !== false) {
        logger.info(`Building configuration for ${context.namespace}/${header}`);
    }

    for (const step of target.steps) {
        try {
            await runStep(step, context, summary, logger);
        } catch (error) {
            if (isDockformRuntimeError(error, MacroErrorCode.UNRESOLVED)) {
                throw error;
            }
            throw DispatchError.stepFailed(target.name, describeStep(step), error, {
                ...('family' in step ? { family: step.family } : {}),
            });
        }
    }

    summary.targets.push(target.name);
    return summary;
}

/**
 * Run every target of the table selected by `requestedTarget`, in table order
 * @throws {DockformRuntimeError} UNKNOWN_TARGET if the name is neither "all" nor in the table
 */
export async function runTargets(
    table: TargetTable,
    requestedTarget: string,
    context: DispatchContext
): Promise<DispatchSummary> {
    const names = table.targets.map((target) => target.name);
    if (requestedTarget !== ALL_TARGETS && !names.includes(requestedTarget)) {
        throw DispatchError.unknownTarget(requestedTarget, names);
    }

    const summary = emptySummary();
    for (const target of table.targets) {
        await runTarget(target, requestedTarget, context, summary);
    }
    return summary;
}
