/**
 * Merges command-line flags into the project configuration loaded from dockform.yml
 */

import type { ProjectConfig } from '../../../core/config/schemas.js';
import type { CliOptions } from './options.js';

/**
 * Fields the command line can override
 */
export type CLIConfigOverrides = Pick<CliOptions, 'targets' | 'logLevel' | 'keepGoing'>;

/**
 * Flags win over file values. `--keep-going` only ever loosens the overlay mode.
 */
export function applyCLIOverrides(
    baseConfig: ProjectConfig,
    cliOverrides?: Partial<CLIConfigOverrides>
): ProjectConfig {
    if (!cliOverrides) {
        return baseConfig;
    }

    return {
        ...baseConfig,
        targetsFile: cliOverrides.targets ?? baseConfig.targetsFile,
        overlay: {
            ...baseConfig.overlay,
            mode: cliOverrides.keepGoing ? 'lenient' : baseConfig.overlay.mode,
        },
        logger: {
            ...baseConfig.logger,
            level: cliOverrides.logLevel ?? baseConfig.logger.level,
        },
    };
}
