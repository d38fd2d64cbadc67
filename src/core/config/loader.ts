import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { DockformValidationError } from '../errors/DockformValidationError.js';
import { ErrorScope } from '../errors/types.js';
import { zodToIssues } from '../utils/result.js';
import { errorMessage } from '../utils/fs.js';
import { ConfigError } from './errors.js';
import {
    CONFIG_FILE_NAME,
    ProjectConfigSchema,
    type ProjectConfig,
    type ProjectPaths,
} from './schemas.js';

/**
 * Loads `<baseDir>/dockform.yml`, applying defaults for everything it leaves out.
 * A missing file is the same as an empty one.
 *
 * @throws {DockformRuntimeError} FILE_READ_ERROR if the file exists but cannot be read
 * @throws {DockformRuntimeError} PARSE_ERROR if the content is not valid YAML
 * @throws {DockformValidationError} if the content does not match the schema
 */
export async function loadProjectConfig(
    baseDir: string,
    configFile: string = CONFIG_FILE_NAME
): Promise<ProjectConfig> {
    const absoluteBase = path.resolve(baseDir);
    try {
        const stats = await fs.stat(absoluteBase);
        if (!stats.isDirectory()) {
            throw ConfigError.baseDirNotFound(absoluteBase);
        }
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            throw ConfigError.baseDirNotFound(absoluteBase);
        }
        throw error;
    }

    const configPath = path.resolve(absoluteBase, configFile);

    let fileContent: string | undefined;
    try {
        fileContent = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
            throw ConfigError.fileReadError(configPath, errorMessage(error));
        }
    }

    let raw: unknown = {};
    if (fileContent !== undefined) {
        try {
            raw = parseYaml(fileContent) ?? {};
        } catch (error) {
            throw ConfigError.parseError(configPath, errorMessage(error));
        }
    }

    return parseProjectConfig(raw, configPath);
}

/**
 * Validate raw configuration data
 * @throws {DockformValidationError} listing every schema violation
 */
export function parseProjectConfig(raw: unknown, source?: string): ProjectConfig {
    const parsed = ProjectConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new DockformValidationError(
            zodToIssues(parsed.error, ErrorScope.CONFIG, source ? { configPath: source } : undefined)
        );
    }
    return parsed.data;
}

/**
 * Absolute project locations; relative config paths resolve against the base dir
 */
export function resolveProjectPaths(baseDir: string, config: ProjectConfig): ProjectPaths {
    const absoluteBase = path.resolve(baseDir);
    return {
        baseDir: absoluteBase,
        dockerRoot: path.resolve(absoluteBase, config.paths.docker),
        provisioningRoot: path.resolve(absoluteBase, config.paths.provisioning),
        baselayoutDir: path.resolve(absoluteBase, config.paths.baselayout),
        targetsFile: config.targetsFile ? path.resolve(absoluteBase, config.targetsFile) : undefined,
    };
}

/**
 * Load `<baseDir>/.env` into the environment. Variables already set in the shell win.
 * @returns names of the variables that were added
 */
export function loadProjectEnvironment(
    baseDir: string,
    env: NodeJS.ProcessEnv = process.env
): string[] {
    const result = dotenv.config({ path: path.join(baseDir, '.env'), processEnv: {} });
    if (!result.parsed) {
        return [];
    }

    const added: string[] = [];
    for (const [key, value] of Object.entries(result.parsed)) {
        if (env[key] === undefined || env[key] === '') {
            env[key] = value;
            added.push(key);
        }
    }
    return added;
}

/**
 * Provisioning is skipped when images are only being pushed
 */
export function isPushMode(env: NodeJS.ProcessEnv = process.env): boolean {
    return env.BUILD_MODE === 'push';
}
