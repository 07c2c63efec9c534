/**
 * stepwright run command
 * Execute a workflow
 */

import { dirname, resolve } from 'node:path';
import type { Command } from 'commander';
import type { Config } from '../parser/config-schema.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import {
  BuiltinConnectorRegistry,
  CompositeConnectorRegistry,
} from '../runner/connectors/builtin-registry.ts';
import type { ConnectorRegistry, LLMProvider } from '../runner/executors/types.ts';
import { WorkflowRunner } from '../runner/workflow-runner.ts';
import { WorkflowStatus } from '../types/status.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { maskSensitive } from '../utils/redactor.ts';
import { errorMessage, parseInputs, reportProblems } from './utils.ts';

export interface RunOptions {
  input?: string[];
}

/** Collaborators the CLI has no flags for; tests and embedders supply them */
export interface RunDependencies {
  logger?: Logger;
  connectors?: ConnectorRegistry;
  llm?: LLMProvider;
  config?: Config;
  signal?: AbortSignal;
}

/** Exit code of a run stopped by SIGINT */
export const EXIT_CANCELED = 130;

/**
 * Load, validate and run the workflow at `path`, printing its outputs as JSON.
 * Returns the process exit code.
 */
export async function runWorkflowFile(
  path: string,
  options: RunOptions = {},
  deps: RunDependencies = {}
): Promise<number> {
  const logger = deps.logger ?? new ConsoleLogger();
  const { inputs, problems } = parseInputs(options.input);
  reportProblems(logger, problems);

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('\n🛑 Received SIGINT, cancelling...');
    controller.abort();
  };
  const onParentAbort = () => controller.abort();
  process.once('SIGINT', onSigint);
  deps.signal?.addEventListener('abort', onParentAbort, { once: true });

  try {
    const resolved = resolve(path);
    const definition = WorkflowParser.loadWorkflow(resolved);
    const runner = new WorkflowRunner({
      connectors: new CompositeConnectorRegistry(
        new BuiltinConnectorRegistry({ logger }),
        deps.connectors
      ),
      llm: deps.llm,
      logger,
      config: deps.config,
      workflowDir: dirname(resolved),
    });

    const result = await runner.runDetailed(definition, inputs, { signal: controller.signal });
    if (result.status === WorkflowStatus.SUCCESS) {
      if (Object.keys(result.outputs).length > 0) {
        logger.log('Outputs:');
        logger.log(JSON.stringify(maskSensitive(result.outputs), null, 2));
      }
      return 0;
    }
    if (result.status === WorkflowStatus.CANCELED) {
      return EXIT_CANCELED;
    }
    logger.error(`✗ Failed to execute workflow: ${result.error?.message ?? 'unknown error'}`);
    return 1;
  } catch (error) {
    logger.error(`✗ Failed to execute workflow: ${errorMessage(error)}`);
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
    deps.signal?.removeEventListener('abort', onParentAbort);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a workflow')
    .argument('<workflow>', 'Path to the workflow file')
    .option('-i, --input <key=value...>', 'Input values')
    .action(async (workflowPath: string, options: RunOptions) => {
      process.exitCode = await runWorkflowFile(workflowPath, options);
    });
}
