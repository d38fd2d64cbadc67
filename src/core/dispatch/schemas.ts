/**
 * Target table schema
 *
 * A target is an ordered list of steps. The table is data (YAML), so adding an image
 * family means adding entries, not code.
 */

import { z } from 'zod';

const FamilySchema = z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'Family must be a single directory name')
    .describe('Image family directory under the docker root');

const FilterSchema = z
    .string()
    .default('*')
    .describe('Variant name filter, "*" selects all variants');

const ConfigurationStepSchema = z
    .object({
        type: z.literal('configuration'),
        bundle: z
            .string()
            .min(1)
            .describe('Configuration bundle under the provisioning root, e.g. php/general'),
        family: FamilySchema,
        filter: FilterSchema,
        clear: z
            .boolean()
            .default(false)
            .describe('Remove conf/ of the selected variants before copying'),
    })
    .strict();

const BaselayoutStepSchema = z
    .object({
        type: z.literal('baselayout'),
        family: FamilySchema,
        filter: FilterSchema,
    })
    .strict();

const MacrosStepSchema = z
    .object({
        type: z.literal('macros'),
    })
    .strict();

const ClearStepSchema = z
    .object({
        type: z.literal('clear'),
        family: FamilySchema,
        filter: FilterSchema,
    })
    .strict();

export const TargetStepSchema = z.discriminatedUnion('type', [
    ConfigurationStepSchema,
    BaselayoutStepSchema,
    MacrosStepSchema,
    ClearStepSchema,
]);

export const TargetSchema = z
    .object({
        name: z
            .string()
            .min(1)
            .refine((name) => name !== 'all', 'Target name "all" is reserved'),
        header: z
            .union([z.string().min(1), z.literal(false)])
            .optional()
            .describe('Image name in the header line; false prints no header; defaults to name'),
        steps: z.array(TargetStepSchema).min(1),
    })
    .strict();

export const TargetTableSchema = z
    .object({
        targets: z.array(TargetSchema).min(1),
    })
    .strict()
    .superRefine((table, ctx) => {
        const seen = new Set<string>();
        table.targets.forEach((target, index) => {
            if (seen.has(target.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Duplicate target '${target.name}'`,
                    path: ['targets', index, 'name'],
                });
            }
            seen.add(target.name);
        });
    });

export type TargetStep = z.output<typeof TargetStepSchema>;
export type Target = z.output<typeof TargetSchema>;
export type TargetTable = z.output<typeof TargetTableSchema>;
export type TargetTableInput = z.input<typeof TargetTableSchema>;

export type ConfigurationStep = Extract<TargetStep, { type: 'configuration' }>;
export type BaselayoutStep = Extract<TargetStep, { type: 'baselayout' }>;
export type ClearStep = Extract<TargetStep, { type: 'clear' }>;
