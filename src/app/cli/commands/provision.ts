import path from 'path';
import {
    loadProjectConfig,
    loadProjectEnvironment,
    isPushMode,
    resolveProjectPaths,
} from '../../../core/config/loader.js';
import { loadTargetTable } from '../../../core/dispatch/table.js';
import { runTargets, ALL_TARGETS } from '../../../core/dispatch/dispatcher.js';
import { createLogger } from '../../../core/logger/factory.js';
import { LoggerConfigSchema } from '../../../core/logger/schemas.js';
import type { Logger } from '../../../core/logger/types.js';
import { DockformRuntimeError } from '../../../core/errors/DockformRuntimeError.js';
import { DockformValidationError } from '../../../core/errors/DockformValidationError.js';
import { applyCLIOverrides } from '../utils/cli-overrides.js';
import type { CliOptions } from '../utils/options.js';
import { EXIT_FAILURE, EXIT_SUCCESS, exitCodeFor } from '../utils/exit-codes.js';

export interface ProvisionCommandDeps {
    /** Environment `.env` values are merged into; defaults to process.env */
    env?: NodeJS.ProcessEnv;
    /** Replaces the logger built from configuration */
    logger?: Logger;
}

/**
 * Provision the image tree for one target, or every target with "all".
 * @returns process exit code
 */
export async function handleProvisionCommand(
    target: string = ALL_TARGETS,
    options: CliOptions,
    deps: ProvisionCommandDeps = {}
): Promise<number> {
    const env = deps.env ?? process.env;
    const baseDir = path.resolve(options.baseDir ?? process.cwd());

    loadProjectEnvironment(baseDir, env);

    // Until dockform.yml is read, report through a console logger at the requested level
    let logger =
        deps.logger ??
        createLogger({ config: LoggerConfigSchema.parse({ level: options.logLevel ?? 'info' }) });

    if (isPushMode(env)) {
        logger.info('BUILD_MODE is push, skipping provisioning');
        await logger.destroy();
        return EXIT_SUCCESS;
    }

    try {
        const config = applyCLIOverrides(await loadProjectConfig(baseDir), options);
        if (!deps.logger) {
            await logger.destroy();
            logger = createLogger({ config: config.logger, baseDir });
        }

        const paths = resolveProjectPaths(baseDir, config);
        const table = await loadTargetTable(paths.targetsFile);
        logger.debug('Provisioning', { target, baseDir, overlayMode: config.overlay.mode });

        const summary = await runTargets(table, target, {
            paths,
            namespace: config.namespace,
            overlayMode: config.overlay.mode,
            logger,
        });

        if (summary.failures.length > 0) {
            logger.error(`${summary.failures.length} variant copies failed:`);
            for (const failure of summary.failures) {
                logger.error(`  ${failure.variant.name}: ${failure.error.message}`);
            }
            pointToLogFile(logger);
            return EXIT_FAILURE;
        }

        logger.debug('Provisioning finished', {
            targets: summary.targets,
            dockerfiles: summary.dockerfiles.length,
        });
        return EXIT_SUCCESS;
    } catch (error) {
        reportError(logger, error);
        pointToLogFile(logger);
        return exitCodeFor(error);
    } finally {
        await logger.destroy();
    }
}

function reportError(logger: Logger, error: unknown): void {
    if (error instanceof DockformValidationError) {
        logger.error(error.message);
        return;
    }
    if (error instanceof DockformRuntimeError) {
        logger.error(error.message, { code: error.code, ...error.context });
        return;
    }
    if (error instanceof Error) {
        logger.trackException(error);
        return;
    }
    logger.error(String(error));
}

function pointToLogFile(logger: Logger): void {
    const logFile = logger.getLogFilePath();
    if (logFile) {
        logger.error(`Full log: ${logFile}`);
    }
}
