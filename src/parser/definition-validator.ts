import { LIMITS, TIMEOUTS } from '../utils/constants.ts';
import { parseDuration } from '../utils/duration.ts';
import { isRecord } from '../expression/values.ts';
import { ValidationError } from '../types/errors.ts';
import { StepKind } from '../types/status.ts';
import type {
  Connector,
  ConnectorAuth,
  Definition,
  PollTrigger,
  RateLimit,
  StepDefinition,
  TriggerConfig,
} from './schema.ts';
import { BUILTIN_CONNECTORS } from './workflow-parser.ts';

const REF_PATTERN = /^([^.\s]+)\.([^.\s]+)$/;
const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'];
const POLL_INTEGRATIONS = ['slack', 'pagerduty', 'jira', 'datadog'];
const POLL_STARTUP_MODES = ['since_last', 'ignore_historical', 'backfill'];
const QUERY_VALUE_PATTERN = /^[a-zA-Z0-9_@.-]+$/;
const TRIGGER_TYPES = ['webhook', 'api', 'schedule', 'poll', 'file'] as const;

/** Keys every step output map already carries */
export const RESERVED_OUTPUT_KEYS = ['text', 'response', 'error'];

/** Nesting state carried down the step tree */
interface Scope {
  path: string;
  parallelDepth: number;
  insideForeach: boolean;
  insideLoop: boolean;
}

/**
 * Structural checks over a parsed definition. Every problem is collected; nothing throws.
 */
export class DefinitionValidator {
  private readonly errors: ValidationError[] = [];
  private readonly allStepIds = new Set<string>();

  private constructor(private readonly definition: Definition) {}

  static validate(definition: Definition): ValidationError[] {
    const validator = new DefinitionValidator(definition);
    validator.run();
    return validator.errors;
  }

  private run(): void {
    const { definition } = this;

    if (!definition.name.trim()) {
      this.fail('name', 'workflow name is required', 'add a top-level name: field');
    }
    if (definition.steps.length === 0) {
      this.fail('steps', 'workflow must have at least one step', 'add a step under steps:');
    }

    this.collectIds(definition.steps);
    this.validateSteps(definition.steps, {
      path: 'steps',
      parallelDepth: 0,
      insideForeach: false,
      insideLoop: false,
    });

    for (const [name, connector] of Object.entries(definition.connectors ?? {})) {
      this.validateConnector(name, connector);
    }

    if (definition.listen) {
      this.validateTriggers(definition.listen);
    }

    const outputNames = new Set<string>();
    for (const output of definition.outputs ?? []) {
      if (outputNames.has(output.name)) {
        this.fail(`outputs.${output.name}`, `duplicate output name: ${output.name}`);
      }
      outputNames.add(output.name);
    }
  }

  private fail(field: string, message: string, suggestion = ''): void {
    this.errors.push(new ValidationError(field, message, suggestion));
  }

  private collectIds(steps: StepDefinition[]): void {
    for (const step of steps) {
      if (step.id) this.allStepIds.add(step.id);
      for (const children of childLists(step)) this.collectIds(children);
    }
  }

  // ===== Steps =====

  private validateSteps(steps: StepDefinition[], scope: Scope): void {
    const seen = new Set<string>();
    steps.forEach((step, index) => {
      if (!step.id.trim()) {
        this.fail(`${scope.path}[${index}].id`, 'step ID is required', 'give every step a unique id');
        return;
      }
      if (seen.has(step.id)) {
        this.fail(`${scope.path}.${step.id}`, `duplicate step ID: ${step.id}`, 'rename one of the steps');
      }
      seen.add(step.id);
      this.validateStep(step, scope);
    });
  }

  private validateStep(step: StepDefinition, scope: Scope): void {
    const field = `${scope.path}.${step.id}`;
    this.validateKind(step, field);
    this.validateCommon(step, field);

    const isParallel = step.type === StepKind.PARALLEL;
    const parallelDepth = scope.parallelDepth + (isParallel ? 1 : 0);
    if (isParallel && parallelDepth === LIMITS.MAX_PARALLEL_DEPTH + 1) {
      this.fail(
        field,
        `parallel nesting depth exceeds maximum of ${LIMITS.MAX_PARALLEL_DEPTH}`,
        'flatten the inner parallel blocks'
      );
    }

    const hasForeach = step.foreach !== undefined;
    if (hasForeach && scope.insideForeach) {
      this.fail(
        `${field}.foreach`,
        'nested foreach is not supported',
        'move the inner iteration into a subworkflow'
      );
    }

    const isLoop = step.type === StepKind.LOOP;
    if (isLoop && scope.insideLoop) {
      this.fail(field, 'nested loops are not supported', 'move the inner loop into a subworkflow');
    }

    const childScope = (path: string): Scope => ({
      path,
      parallelDepth,
      insideForeach: scope.insideForeach || hasForeach,
      insideLoop: scope.insideLoop || isLoop,
    });

    if (step.steps) this.validateSteps(step.steps, childScope(`${field}.steps`));
    if (step.condition?.then) this.validateSteps(step.condition.then, childScope(`${field}.then`));
    if (step.condition?.else) this.validateSteps(step.condition.else, childScope(`${field}.else`));
  }

  private validateKind(step: StepDefinition, field: string): void {
    switch (step.type) {
      case StepKind.LLM:
        if (!step.model) this.fail(`${field}.model`, 'model is required for llm steps');
        if (!step.prompt) this.fail(`${field}.prompt`, 'prompt is required for llm steps');
        break;

      case StepKind.CONNECTOR:
        this.validateRef(step.connector, `${field}.connector`, 'connector');
        break;

      case StepKind.BUILTIN: {
        const parts = this.validateRef(step.builtin, `${field}.builtin`, 'builtin');
        if (parts && !BUILTIN_CONNECTORS.some((name) => name === parts.name)) {
          this.fail(
            `${field}.builtin`,
            `invalid builtin connector: ${parts.name} (must be shell, file, http, or transform)`
          );
        }
        break;
      }

      case StepKind.INTEGRATION:
        this.validateIntegrationRef(step, field);
        break;

      case StepKind.PARALLEL:
        if (!step.steps?.length) {
          this.fail(`${field}.steps`, 'parallel step requires nested steps');
        }
        break;

      case StepKind.FOREACH:
        if (step.foreach === undefined) {
          this.fail(`${field}.foreach`, 'foreach expression is required for foreach steps');
        }
        if (!step.steps?.length) {
          this.fail(`${field}.steps`, 'foreach step requires nested steps');
        }
        break;

      case StepKind.CONDITION:
        if (!step.condition?.expression?.trim()) {
          this.fail(
            `${field}.condition`,
            'condition expression is required for condition steps',
            'set condition.expression or when:'
          );
        }
        break;

      case StepKind.LOOP:
        if (!step.steps?.length) {
          this.fail(`${field}.steps`, 'loop step requires nested steps');
        }
        if (step.until === undefined && step.max_iterations === undefined) {
          this.fail(field, 'loop step requires until or max_iterations', 'add max_iterations: 10');
        }
        if (
          step.max_iterations !== undefined &&
          (step.max_iterations < 1 || step.max_iterations > LIMITS.MAX_LOOP_ITERATIONS)
        ) {
          this.fail(
            `${field}.max_iterations`,
            `max_iterations must be between 1 and ${LIMITS.MAX_LOOP_ITERATIONS}`
          );
        }
        break;

      case StepKind.SUBWORKFLOW:
        if (!step.workflow) {
          this.fail(`${field}.workflow`, 'workflow path is required for subworkflow steps');
        }
        if (step.prompt !== undefined) {
          this.fail(
            `${field}.prompt`,
            "subworkflow step cannot have 'prompt' field",
            "use 'inputs' to pass data"
          );
        }
        break;

      case StepKind.TRANSFORM:
        if (step.template === undefined && step.inputs === undefined) {
          this.fail(field, 'transform step requires template or inputs');
        }
        for (const key of Object.keys(step.inputs ?? {})) {
          if (RESERVED_OUTPUT_KEYS.includes(key)) {
            this.fail(
              `${field}.inputs.${key}`,
              `"${key}" is a reserved output key`,
              'rename the key; text, response and error are set by the engine'
            );
          }
        }
        break;
    }
  }

  private validateRef(
    ref: string | undefined,
    field: string,
    label: string
  ): { name: string; operation: string } | undefined {
    if (!ref) {
      this.fail(field, `${label} reference is required`);
      return undefined;
    }
    const match = REF_PATTERN.exec(ref);
    if (!match) {
      this.fail(field, `${label} must be in format '${label}_name.operation_name'`);
      return undefined;
    }
    return { name: match[1], operation: match[2] };
  }

  private validateIntegrationRef(step: StepDefinition, field: string): void {
    const ref = step.integration;
    if (!ref) {
      this.fail(`${field}.integration`, 'integration reference is required');
      return;
    }
    const match = REF_PATTERN.exec(ref);
    if (!match) {
      this.fail(
        `${field}.integration`,
        "integration must be in format 'integration_name.operation_name'"
      );
      return;
    }

    const [, name, operation] = match;
    const connector = this.definition.connectors?.[name];
    if (!connector) {
      this.fail(
        `${field}.integration`,
        `references undefined integration: ${name}`,
        `declare it under connectors.${name}`
      );
      return;
    }
    // Packaged connectors declare their operations elsewhere
    if (!connector.from && !connector.operations?.[operation]) {
      this.fail(`${field}.integration`, `undefined operation ${operation} in integration ${name}`);
    }
  }

  private validateCommon(step: StepDefinition, field: string): void {
    if (
      step.max_concurrency !== undefined &&
      (step.max_concurrency < 0 || step.max_concurrency > LIMITS.MAX_CONCURRENCY)
    ) {
      this.fail(
        `${field}.max_concurrency`,
        `max_concurrency must be between 0 and ${LIMITS.MAX_CONCURRENCY}`,
        '0 selects the default'
      );
    }

    if (Array.isArray(step.foreach) && step.foreach.length > LIMITS.MAX_ARRAY_LENGTH) {
      this.fail(
        `${field}.foreach`,
        `foreach array exceeds maximum of ${LIMITS.MAX_ARRAY_LENGTH} elements`
      );
    }

    const expr = step.inputs?.expr;
    if (typeof expr === 'string' && expr.includes('{{') && expr.includes('}}')) {
      this.fail(
        `${field}.inputs.expr`,
        'expr must not contain template expressions',
        'pass dynamic values as separate inputs and reference them as variables in the expression'
      );
    }

    if (step.retry) {
      const { max_attempts, backoff_multiplier, backoff_base, max_backoff } = step.retry;
      if (max_attempts !== undefined && max_attempts < 1) {
        this.fail(`${field}.retry.max_attempts`, 'max_attempts must be at least 1');
      }
      if (backoff_multiplier !== undefined && backoff_multiplier < 1) {
        this.fail(`${field}.retry.backoff_multiplier`, 'backoff_multiplier must be at least 1.0');
      }
      this.checkDuration(backoff_base, `${field}.retry.backoff_base`);
      this.checkDuration(max_backoff, `${field}.retry.max_backoff`);
    }
    this.checkDuration(step.timeout, `${field}.timeout`);

    if (step.on_error?.strategy === 'fallback') {
      const { value, fallback_step } = step.on_error;
      if (value === undefined && !fallback_step) {
        this.fail(
          `${field}.on_error`,
          "fallback_step or value is required when error strategy is 'fallback'"
        );
      }
      if (fallback_step && !this.allStepIds.has(fallback_step)) {
        this.fail(
          `${field}.on_error.fallback_step`,
          `fallback_step references undefined step: ${fallback_step}`
        );
      }
    }
  }

  private checkDuration(value: string | number | undefined, field: string): number | undefined {
    if (value === undefined) return undefined;
    try {
      return parseDuration(value);
    } catch (error) {
      this.fail(field, error instanceof Error ? error.message : String(error));
      return undefined;
    }
  }

  // ===== Connectors =====

  private validateConnector(name: string, connector: Connector): void {
    const field = `connectors.${name}`;
    const inline = connector.base_url !== undefined || connector.operations !== undefined;

    if (connector.from && inline) {
      this.fail(
        field,
        "connector cannot specify both 'from' (package import) and inline definition (base_url/operations)"
      );
    } else if (!connector.from && !inline) {
      this.fail(
        field,
        "connector must specify either 'from' (package import) or inline definition (base_url + operations)"
      );
    } else if (!connector.from) {
      if (!connector.base_url) {
        this.fail(`${field}.base_url`, 'base_url is required for inline connector definition');
      }
      if (Object.keys(connector.operations ?? {}).length === 0) {
        this.fail(`${field}.operations`, 'inline connector must define at least one operation');
      }
    }

    if (connector.auth) this.validateAuth(connector.auth, `${field}.auth`);
    if (connector.rate_limit) this.validateRateLimit(connector.rate_limit, `${field}.rate_limit`);

    for (const [operationName, operation] of Object.entries(connector.operations ?? {})) {
      const operationField = `${field}.operations.${operationName}`;
      if (!operation.method) {
        this.fail(`${operationField}.method`, 'method is required');
      } else if (!HTTP_METHODS.includes(operation.method.toUpperCase())) {
        this.fail(
          `${operationField}.method`,
          `invalid method: ${operation.method} (must be GET, POST, PUT, PATCH, DELETE, or HEAD)`
        );
      }
      if (!operation.path) {
        this.fail(`${operationField}.path`, 'path is required');
      }
      this.checkDuration(operation.timeout, `${operationField}.timeout`);
    }
  }

  private validateAuth(auth: ConnectorAuth, field: string): void {
    // A bare token is bearer auth
    const type = auth.type ?? (auth.token ? 'bearer' : '');

    switch (type) {
      case 'bearer':
        if (!auth.token) this.fail(`${field}.token`, 'token is required for bearer auth');
        break;
      case 'basic':
        if (!auth.username) this.fail(`${field}.username`, 'username is required for basic auth');
        if (!auth.password) this.fail(`${field}.password`, 'password is required for basic auth');
        break;
      case 'api_key':
        if (!auth.header) this.fail(`${field}.header`, 'header is required for api_key auth');
        if (!auth.value) this.fail(`${field}.value`, 'value is required for api_key auth');
        break;
      case 'oauth2_client':
        this.fail(
          `${field}.type`,
          'oauth2_client auth type is not yet implemented',
          'use bearer auth with a pre-issued token'
        );
        break;
      default:
        this.fail(
          `${field}.type`,
          `invalid auth type: ${type || '(empty)'} (must be bearer, basic, api_key, or oauth2_client)`
        );
    }
  }

  private validateRateLimit(limit: RateLimit, field: string): void {
    if (limit.requests_per_second === undefined && limit.requests_per_minute === undefined) {
      this.fail(
        field,
        'at least one of requests_per_second or requests_per_minute must be specified'
      );
    }
    for (const key of ['requests_per_second', 'requests_per_minute', 'burst', 'timeout'] as const) {
      const value = limit[key];
      if (value !== undefined && value < 0) {
        this.fail(`${field}.${key}`, `${key} must be non-negative`);
      }
    }
  }

  // ===== Triggers =====

  private validateTriggers(listen: TriggerConfig): void {
    const configured = TRIGGER_TYPES.filter((type) => listen[type] !== undefined);
    if (configured.length === 0) {
      this.fail('listen', 'at least one trigger type must be configured');
    } else if (configured.length > 1) {
      this.fail('listen', 'only one trigger type can be configured per workflow');
    }

    if (listen.poll) this.validatePoll(listen.poll, 'listen.poll');
    if (listen.schedule && !listen.schedule.cron.trim()) {
      this.fail('listen.schedule.cron', 'cron expression is required for schedule triggers');
    }
    if (listen.webhook && !listen.webhook.path.startsWith('/')) {
      this.fail('listen.webhook.path', 'webhook path must start with /');
    }
    if (listen.file && listen.file.paths.length === 0) {
      this.fail('listen.file.paths', 'at least one path is required for file triggers');
    }
  }

  private validatePoll(poll: PollTrigger, field: string): void {
    if (!poll.integration) {
      this.fail(`${field}.integration`, 'integration is required for poll triggers');
    } else if (!POLL_INTEGRATIONS.includes(poll.integration)) {
      this.fail(
        `${field}.integration`,
        `unsupported integration: ${poll.integration}`,
        `use one of ${POLL_INTEGRATIONS.join(', ')}`
      );
    }

    if (!poll.query || Object.keys(poll.query).length === 0) {
      this.fail(`${field}.query`, 'query parameters are required for poll triggers');
    }

    if (poll.interval !== undefined) {
      const interval = this.checkDuration(poll.interval, `${field}.interval`);
      if (interval !== undefined && interval < TIMEOUTS.MIN_POLL_INTERVAL_MS) {
        this.fail(`${field}.interval`, `interval must be at least 10s, got: ${poll.interval}`);
      }
    }

    if (poll.startup !== undefined) {
      if (!POLL_STARTUP_MODES.includes(poll.startup)) {
        this.fail(`${field}.startup`, `invalid startup mode: ${poll.startup}`);
      } else if (poll.startup === 'backfill') {
        if (poll.backfill === undefined) {
          this.fail(`${field}.backfill`, "backfill duration is required when startup is 'backfill'");
        } else {
          const backfill = this.checkDuration(poll.backfill, `${field}.backfill`);
          if (backfill !== undefined && backfill > TIMEOUTS.MAX_POLL_BACKFILL_MS) {
            this.fail(`${field}.backfill`, `backfill duration cannot exceed 24h, got: ${poll.backfill}`);
          }
        }
      }
    }

    for (const [key, value] of Object.entries(poll.query ?? {})) {
      const values = Array.isArray(value) ? value : [value];
      for (const entry of values) {
        if (typeof entry === 'string' && !QUERY_VALUE_PATTERN.test(entry)) {
          this.fail(`${field}.query.${key}`, 'invalid query parameter value');
        }
        if (isRecord(entry)) {
          this.fail(`${field}.query.${key}`, 'query parameter values must be scalars');
        }
      }
    }
  }
}

/**
 * Every nested step list of a step: `steps`, `condition.then` and `condition.else`.
 */
export function childLists(step: StepDefinition): StepDefinition[][] {
  const lists: StepDefinition[][] = [];
  if (step.steps) lists.push(step.steps);
  if (step.condition?.then) lists.push(step.condition.then);
  if (step.condition?.else) lists.push(step.condition.else);
  return lists;
}
