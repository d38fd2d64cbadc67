export {
    runTargets,
    runTarget,
    shouldRunTarget,
    describeStep,
    ALL_TARGETS,
} from './dispatcher.js';
export type { DispatchContext, DispatchSummary } from './dispatcher.js';
export { loadTargetTable, parseTargetTable, targetNames, DEFAULT_TARGETS_FILE } from './table.js';
export { TargetTableSchema, TargetSchema, TargetStepSchema } from './schemas.js';
export type {
    Target,
    TargetStep,
    TargetTable,
    TargetTableInput,
    ConfigurationStep,
    BaselayoutStep,
    ClearStep,
} from './schemas.js';
export { DispatchError } from './errors.js';
export { DispatchErrorCode } from './error-codes.js';
