import { z } from 'zod';
import chalk from 'chalk';
import { LogLevelSchema } from '../../../core/logger/schemas.js';

/**
 * Global options shared by every dockform command
 */
export const CliOptionsSchema = z
    .object({
        baseDir: z.string().min(1, 'Base directory must not be empty').optional(),
        targets: z.string().min(1, 'Target table path must not be empty').optional(),
        logLevel: LogLevelSchema.optional(),
        keepGoing: z
            .boolean()
            .optional()
            .default(false)
            .describe('Continue with sibling variants when a copy fails'),
    })
    .strict();

export type CliOptions = z.output<typeof CliOptionsSchema>;
export type CliOptionsInput = z.input<typeof CliOptionsSchema>;

/**
 * Validates the command-line options.
 * @param opts - The command-line options object from commander.
 * @throws {z.ZodError} If validation fails.
 */
export function validateCliOptions(opts: unknown): CliOptions {
    return CliOptionsSchema.parse(opts);
}

export function handleCliOptionsError(error: unknown): void {
    if (error instanceof z.ZodError) {
        console.error(chalk.red('Invalid command-line options detected:'));
        error.errors.forEach((err) => {
            const fieldName = err.path.join('.') || 'Unknown Option';
            console.error(chalk.red(`- Option '${fieldName}': ${err.message}`));
        });
        console.error(chalk.yellowBright('Please check your command-line arguments and try again.'));
    } else {
        console.error(
            chalk.red(
                `Validation error: ${error instanceof Error ? error.message : String(error)}`
            )
        );
    }
}
