import { randomUUID } from 'node:crypto';
import { ParameterResolver } from '../expression/resolver.ts';
import type { Config } from '../parser/config-schema.ts';
import type { Definition } from '../parser/schema.ts';
import { validate } from '../parser/validate.ts';
import { StepError, WorkflowValidationError, toError } from '../types/errors.ts';
import { WorkflowStatus, type WorkflowStatusType } from '../types/status.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { parseDuration } from '../utils/duration.ts';
import { ConsoleLogger, type Logger, RedactingLogger } from '../utils/logger.ts';
import { Redactor, isSensitiveKey } from '../utils/redactor.ts';
import type {
  EngineDefaults,
  LoadedWorkflow,
  StepExecutorOptions,
  SubworkflowResult,
} from './executors/types.ts';
import { InputValidator } from './services/input-validator.ts';
import { StepExecutor } from './step-executor.ts';
import { type StepOutput, stepOutputToMap } from './step-output.ts';
import { WorkflowContext } from './workflow-context.ts';
import { FileWorkflowLoader } from './workflow-loader.ts';

export interface RunnerOptions extends Omit<StepExecutorOptions, 'runWorkflow'> {
  /** Named secret values masked in every log line */
  secrets?: Record<string, string>;
  /** Variables exposed as `.env`; defaults to the configured allow-list */
  env?: Record<string, string>;
  tools?: Record<string, unknown>;
  /** Replaces the loaded configuration */
  config?: Config;
}

export interface RunCallOptions {
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  status: WorkflowStatusType;
  /** Top-level step outputs by id, in completion order */
  steps: Record<string, StepOutput>;
  /** Declared workflow outputs, or every top-level step map when none are declared */
  outputs: Record<string, unknown>;
  /** The unhandled failure of a failed or canceled run */
  error?: StepError;
}

/**
 * Engine defaults taken from the `engine` and `retry` configuration sections.
 */
export function engineDefaultsFromConfig(config: Config): EngineDefaults {
  const timeout = config.engine.default_step_timeout;
  return {
    maxConcurrency: config.engine.default_max_concurrency,
    maxLoopIterations: config.engine.max_loop_iterations,
    stepTimeoutMs: timeout === undefined ? undefined : parseDuration(timeout),
    retry: {
      maxAttempts: config.retry.default_max_attempts,
      baseMs: parseDuration(config.retry.default_backoff_base),
      maxBackoffMs: parseDuration(config.retry.max_backoff),
    },
  };
}

/**
 * Main workflow execution engine
 *
 * Validates the definition, applies input defaults, then runs the top-level steps in
 * declared order. Parallelism only happens inside parallel and foreach steps.
 */
export class WorkflowRunner {
  private readonly baseLogger: Logger;
  private readonly config: Config;

  constructor(private readonly options: RunnerOptions) {
    this.baseLogger = options.logger ?? new ConsoleLogger();
    this.config = options.config ?? ConfigLoader.load(this.baseLogger);
  }

  /**
   * Run to completion and return the top-level step outputs. The first unhandled step
   * failure is thrown as a StepError carrying the outputs recorded before it.
   */
  async run(
    definition: Definition,
    inputs: Record<string, unknown> = {},
    options: RunCallOptions = {}
  ): Promise<Record<string, StepOutput>> {
    const result = await this.runDetailed(definition, inputs, options);
    if (result.error) {
      throw result.error;
    }
    return result.steps;
  }

  /**
   * Like `run`, but step failures come back as a failed or canceled result. Validation and
   * input errors still throw.
   */
  async runDetailed(
    definition: Definition,
    inputs: Record<string, unknown> = {},
    options: RunCallOptions = {}
  ): Promise<RunResult> {
    const { errors, security } = validate(definition);
    if (errors.length > 0) {
      throw new WorkflowValidationError(errors);
    }

    const validated = new InputValidator(definition.inputs, inputs).applyDefaultsAndValidate();
    const logger = this.createLogger(validated.inputs, validated.secretValues);

    for (const finding of [...security.errors, ...security.warnings]) {
      logger.warn(`  ⚠️  ${finding.stepId}: ${finding.message}`);
    }

    const runId = randomUUID();
    const context = new WorkflowContext(validated.inputs, {
      env: this.options.env ?? ConfigLoader.templateEnv(process.env, this.config),
      tools: this.options.tools,
    });
    context.setVar('run_id', runId);
    context.setVar('workflow_name', definition.name);
    context.setVar('started_at', new Date().toISOString());

    const depth = this.options.depth ?? 0;
    const executor = new StepExecutor({
      ...this.options,
      logger,
      loader: this.options.loader ?? new FileWorkflowLoader(),
      defaults: this.options.defaults ?? engineDefaultsFromConfig(this.config),
      depth,
      runWorkflow: (loaded, childInputs, signal, childDepth) =>
        this.runSubworkflow(loaded, childInputs, signal, childDepth),
    });
    const signal = options.signal ?? new AbortController().signal;

    logger.log(`🏛️  Running workflow: ${definition.name}${depth > 0 ? ` (depth ${depth})` : ''}`);

    for (const step of definition.steps) {
      try {
        await executor.execute(step, context, signal);
      } catch (caught) {
        const error = toError(caught);
        if (!(error instanceof StepError)) {
          throw error;
        }
        error.outputs = { ...context.ownOutputs(), ...error.outputs };
        const status = error.cancelled ? WorkflowStatus.CANCELED : WorkflowStatus.FAILED;
        logger.error(
          status === WorkflowStatus.CANCELED
            ? `🛑 Workflow ${definition.name} canceled`
            : `✗ Workflow ${definition.name} failed: ${error.message}`
        );
        return { runId, status, steps: context.ownOutputs(), outputs: {}, error };
      }
    }

    logger.log(`✨ Workflow ${definition.name} completed successfully!`);
    return {
      runId,
      status: WorkflowStatus.SUCCESS,
      steps: context.ownOutputs(),
      outputs: this.renderOutputs(definition, context),
    };
  }

  private createLogger(inputs: Record<string, unknown>, secretValues: string[]): Logger {
    if (!this.config.storage.redact_secrets) {
      return this.baseLogger;
    }

    const named: Record<string, unknown> = { ...(this.options.secrets ?? {}) };
    for (const [key, value] of Object.entries(inputs)) {
      if (isSensitiveKey(key)) named[key] = value;
    }
    const redactor = new Redactor(named, { forcedSecrets: secretValues });
    return redactor.active ? new RedactingLogger(this.baseLogger, redactor) : this.baseLogger;
  }

  private renderOutputs(definition: Definition, context: WorkflowContext): Record<string, unknown> {
    const outputs: Record<string, unknown> = {};
    if (definition.outputs && definition.outputs.length > 0) {
      const data = context.templateData();
      for (const output of definition.outputs) {
        outputs[output.name] = ParameterResolver.resolveString(output.value, data);
      }
      return outputs;
    }

    for (const [id, output] of Object.entries(context.ownOutputs())) {
      outputs[id] = stepOutputToMap(output);
    }
    return outputs;
  }

  private async runSubworkflow(
    loaded: LoadedWorkflow,
    inputs: Record<string, unknown>,
    signal: AbortSignal,
    depth: number
  ): Promise<SubworkflowResult> {
    const child = new WorkflowRunner({
      ...this.options,
      logger: this.baseLogger,
      config: this.config,
      workflowDir: loaded.dir,
      depth,
    });
    const result = await child.runDetailed(loaded.definition, inputs, { signal });
    if (result.error) {
      throw result.error;
    }
    return { outputs: result.outputs, steps: result.steps };
  }
}
