export {
    loadProjectConfig,
    parseProjectConfig,
    resolveProjectPaths,
    loadProjectEnvironment,
    isPushMode,
} from './loader.js';
export { ProjectConfigSchema, CONFIG_FILE_NAME } from './schemas.js';
export type { ProjectConfig, ProjectConfigInput, ProjectPaths } from './schemas.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
