import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { DockformValidationError } from '../errors/DockformValidationError.js';
import { ErrorScope } from '../errors/types.js';
import { zodToIssues } from '../utils/result.js';
import { errorMessage } from '../utils/fs.js';
import { DispatchError } from './errors.js';
import { TargetTableSchema, type TargetTable } from './schemas.js';

/** Table shipped with dockform, `config/targets.yml` at the package root */
export const DEFAULT_TARGETS_FILE = fileURLToPath(
    new URL('../../../config/targets.yml', import.meta.url)
);

/**
 * Validate raw table data
 * @throws {DockformValidationError} listing every schema violation
 */
export function parseTargetTable(raw: unknown, source?: string): TargetTable {
    const parsed = TargetTableSchema.safeParse(raw);
    if (!parsed.success) {
        throw new DockformValidationError(
            zodToIssues(parsed.error, ErrorScope.DISPATCH, source ? { tablePath: source } : undefined)
        );
    }
    return parsed.data;
}

/**
 * Load and validate a target table from YAML
 */
export async function loadTargetTable(tablePath: string = DEFAULT_TARGETS_FILE): Promise<TargetTable> {
    let content: string;
    try {
        content = await fs.readFile(tablePath, 'utf-8');
    } catch (error) {
        throw DispatchError.tableReadError(tablePath, errorMessage(error));
    }

    let raw: unknown;
    try {
        raw = parseYaml(content);
    } catch (error) {
        throw DispatchError.tableParseError(tablePath, errorMessage(error));
    }

    return parseTargetTable(raw, tablePath);
}

export function targetNames(table: TargetTable): string[] {
    return table.targets.map((target) => target.name);
}
