/**
 * Command module exports
 */

export { registerRunCommand, runWorkflowFile } from './run.ts';
export { registerValidateCommand, validateWorkflows } from './validate.ts';
export { parseInputs } from './utils.ts';
