#!/usr/bin/env node
import { readFileSync } from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { handleProvisionCommand, handleListTargetsCommand } from './cli/commands/index.js';
import {
    validateCliOptions,
    handleCliOptionsError,
    type CliOptions,
} from './cli/utils/options.js';
import { EXIT_FAILURE, exitCodeFor } from './cli/utils/exit-codes.js';

const pkg: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);
const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';

const program = new Command();

program
    .name('dockform')
    .description(
        'Provision multi-variant container image definitions: configuration overlays, Dockerfile macros and bootstrap files'
    )
    .version(version, '-v, --version', 'output the current version')
    .option(
        '-C, --base-dir <dir>',
        'project directory holding docker/, provisioning/ and baselayout/'
    )
    .option('-t, --targets <file>', 'target table to use instead of the shipped one')
    .option('--log-level <level>', 'debug, info, warn, error or silly')
    .option('--keep-going', 'continue with the remaining variants when a copy fails');

function globalOptions(): CliOptions | undefined {
    try {
        return validateCliOptions(program.opts());
    } catch (err) {
        handleCliOptionsError(err);
        return undefined;
    }
}

program
    .command('targets')
    .description('List the targets of the target table in run order')
    .option('--verbose', 'show the steps of each target')
    .action(async (listOptions: { verbose?: boolean }) => {
        const options = globalOptions();
        if (!options) {
            process.exitCode = EXIT_FAILURE;
            return;
        }
        try {
            await handleListTargetsCommand(options, listOptions);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(chalk.red(`dockform targets failed: ${message}`));
            process.exitCode = exitCodeFor(err);
        }
    });

program
    .argument('[target]', 'target to provision, or "all"', 'all')
    .action(async (target: string) => {
        const options = globalOptions();
        if (!options) {
            process.exitCode = EXIT_FAILURE;
            return;
        }
        process.exitCode = await handleProvisionCommand(target, options);
    });

await program.parseAsync(process.argv);
