export { WorkflowParser, BUILTIN_CONNECTORS } from './parser/workflow-parser.ts';
export { DefinitionValidator } from './parser/definition-validator.ts';
export {
  SecurityValidator,
  type SecurityFinding,
  type SecurityResult,
} from './parser/security-validator.ts';
export { validate, type ValidationResult } from './parser/validate.ts';
export type {
  Connector,
  ConnectorAuth,
  Definition,
  ErrorHandling,
  RetryPolicy,
  StepDefinition,
  WorkflowInput,
  WorkflowOutput,
} from './parser/schema.ts';
export { ConfigSchema, type Config } from './parser/config-schema.ts';

export { ParameterResolver } from './expression/resolver.ts';
export { renderTemplate, Template, TemplateError } from './expression/template.ts';
export { TEMPLATE_FUNCTIONS } from './expression/functions.ts';

export {
  WorkflowRunner,
  engineDefaultsFromConfig,
  type RunnerOptions,
  type RunCallOptions,
  type RunResult,
} from './runner/workflow-runner.ts';
export { StepExecutor, effectiveKind } from './runner/step-executor.ts';
export { WorkflowContext } from './runner/workflow-context.ts';
export {
  createStepOutput,
  stepOutputToMap,
  type StepMetadata,
  type StepOutput,
  type TokenUsage,
} from './runner/step-output.ts';
export { FileWorkflowLoader } from './runner/workflow-loader.ts';
export {
  BuiltinConnectorRegistry,
  CompositeConnectorRegistry,
  type BuiltinConnectorOptions,
} from './runner/connectors/builtin-registry.ts';
export type {
  Completion,
  CompletionOptions,
  ConnectorRegistry,
  ConnectorResult,
  EngineDefaults,
  LLMProvider,
  LoadedWorkflow,
  WorkflowLoader,
} from './runner/executors/types.ts';
export { withRetry, type Clock } from './runner/retry.ts';
export { AiSdkProvider, type ModelResolver } from './runner/llm-provider.ts';
export { MockConnectorRegistry, MockLLMProvider, CapturingLogger } from './runner/test-harness.ts';

export * from './types/errors.ts';
export * from './types/status.ts';
export { ConfigLoader } from './utils/config-loader.ts';
export { ConsoleLogger, RedactingLogger, SilentLogger, type Logger } from './utils/logger.ts';
export { Redactor, maskSensitive } from './utils/redactor.ts';
