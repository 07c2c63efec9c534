import { dirname, isAbsolute, resolve } from 'node:path';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import type { LoadedWorkflow, WorkflowLoader } from './executors/types.ts';

/**
 * Loads subworkflow definitions from YAML files. Relative paths resolve against the
 * directory of the workflow that references them.
 */
export class FileWorkflowLoader implements WorkflowLoader {
  async load(path: string, fromDir: string): Promise<LoadedWorkflow> {
    const fullPath = isAbsolute(path) ? path : resolve(fromDir, path);
    return {
      definition: WorkflowParser.loadWorkflow(fullPath),
      dir: dirname(fullPath),
    };
  }
}
