import path from 'path';
import chalk from 'chalk';
import { loadProjectConfig, resolveProjectPaths } from '../../../core/config/loader.js';
import { loadTargetTable } from '../../../core/dispatch/table.js';
import { describeStep } from '../../../core/dispatch/dispatcher.js';
import { applyCLIOverrides } from '../utils/cli-overrides.js';
import type { CliOptions } from '../utils/options.js';

export interface ListTargetsCommandOptions {
    /** Print the steps of each target */
    verbose?: boolean;
}

/**
 * Print target names in run order
 */
export async function handleListTargetsCommand(
    options: CliOptions,
    listOptions: ListTargetsCommandOptions = {}
): Promise<void> {
    const baseDir = path.resolve(options.baseDir ?? process.cwd());
    const config = applyCLIOverrides(await loadProjectConfig(baseDir), options);
    const paths = resolveProjectPaths(baseDir, config);
    const table = await loadTargetTable(paths.targetsFile);

    console.log(chalk.bold(`Targets (${table.targets.length}), run in this order by "all":`));
    for (const target of table.targets) {
        console.log(`  ${target.name}`);
        if (listOptions.verbose) {
            for (const step of target.steps) {
                console.log(`      ${describeStep(step)}`);
            }
        }
    }
}
