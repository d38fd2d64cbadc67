export { handleProvisionCommand, type ProvisionCommandDeps } from './provision.js';
export { handleListTargetsCommand, type ListTargetsCommandOptions } from './list-targets.js';
