/**
 * Command registration
 */

export { registerIngestionCommands } from './ingestions/index.js';
export { registerLoadCommands } from './load/index.js';
export { registerDatasetCommands } from './dataset/index.js';
export { registerCollectionCommands } from './collection/index.js';
export { registerWorkflowCommands } from './workflow/index.js';
