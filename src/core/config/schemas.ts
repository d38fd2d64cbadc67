/**
 * Project configuration schema (`dockform.yml` at the base dir)
 */

import { z } from 'zod';
import { LoggerConfigSchema } from '../logger/schemas.js';

export const CONFIG_FILE_NAME = 'dockform.yml';

const PathsSchema = z
    .object({
        docker: z.string().min(1).default('docker').describe('Image tree, one directory per family'),
        provisioning: z
            .string()
            .min(1)
            .default('provisioning')
            .describe('Configuration bundles and Dockerfile fragments'),
        baselayout: z
            .string()
            .min(1)
            .default('baselayout')
            .describe('Shared bootstrap files'),
    })
    .strict()
    .default({});

export const ProjectConfigSchema = z
    .object({
        namespace: z
            .string()
            .min(1)
            .default('dockform')
            .describe('Image namespace shown in target headers, e.g. "acme" for acme/php'),
        paths: PathsSchema,
        targetsFile: z
            .string()
            .min(1)
            .optional()
            .describe('Target table; defaults to the table shipped with dockform'),
        overlay: z
            .object({
                mode: z
                    .enum(['strict', 'lenient'])
                    .default('strict')
                    .describe('lenient logs failed variant copies and continues'),
            })
            .strict()
            .default({}),
        logger: LoggerConfigSchema.default({}),
    })
    .strict()
    .describe('dockform project configuration');

export type ProjectConfig = z.output<typeof ProjectConfigSchema>;
export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

/**
 * Absolute locations derived from the base dir and the configuration
 */
export interface ProjectPaths {
    baseDir: string;
    dockerRoot: string;
    provisioningRoot: string;
    baselayoutDir: string;
    /** Undefined when the shipped table is used */
    targetsFile: string | undefined;
}
