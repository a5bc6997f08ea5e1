/**
 * CLI command registration
 */

export { registerResolveCommand, runResolve } from './resolve.js';
export { registerUnresolvedCommand, runUnresolved } from './unresolved.js';
export { registerRegistryCommands, runCounties, runLookup } from './registry.js';
export { registerMergeCommand, runMerge } from './merge.js';
