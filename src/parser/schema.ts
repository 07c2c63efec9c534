import { z } from 'zod';

// ===== Shared =====

/** `"30s"`, `"1m30s"`, `"250ms"`, or a number of seconds */
const DurationSchema = z.union([z.string(), z.number().nonnegative()]);

// ===== Input / Output Schema =====

const INPUT_TYPES = ['string', 'number', 'integer', 'boolean', 'array', 'object'] as const;

export type InputType = (typeof INPUT_TYPES)[number];

export function matchesInputType(type: InputType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}

/** `a string`, `an integer` */
export function describeType(type: InputType): string {
  return `${/^[aeiou]/.test(type) ? 'an' : 'a'} ${type}`;
}

const InputSchema = z
  .object({
    type: z.enum(INPUT_TYPES).optional(),
    required: z.boolean().optional(),
    default: z.unknown().optional(),
    values: z.array(z.union([z.string(), z.number(), z.boolean()])).optional(),
    secret: z.boolean().optional(),
    description: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    const type = value.type ?? 'string';
    if (value.default !== undefined && !matchesInputType(type, value.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `default must be ${describeType(type)}`,
      });
    }

    if (value.values) {
      for (const allowed of value.values) {
        if (!matchesInputType(type, allowed)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `enum value ${JSON.stringify(allowed)} must be ${describeType(type)}`,
          });
        }
      }
      const allowed: unknown[] = value.values;
      if (value.default !== undefined && !allowed.includes(value.default)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `default must be one of: ${value.values.map((v) => JSON.stringify(v)).join(', ')}`,
        });
      }
    }
  });

const OutputSchema = z.object({
  name: z.string(),
  value: z.string(),
  type: z.string().optional(),
  description: z.string().optional(),
});

// ===== Retry / Error Handling =====

const RetryPolicySchema = z.object({
  max_attempts: z.number().int().optional(),
  backoff_base: DurationSchema.optional(),
  backoff_multiplier: z.number().optional(),
  max_backoff: DurationSchema.optional(),
  jitter: z.boolean().optional(),
});

const ErrorHandlingSchema = z.object({
  strategy: z.enum(['fail', 'continue', 'fallback']),
  value: z.unknown().optional(),
  fallback_step: z.string().optional(),
});

// ===== Step Schema =====

const StepKindSchema = z.enum([
  'llm',
  'connector',
  'builtin',
  'integration',
  'parallel',
  'foreach',
  'condition',
  'loop',
  'subworkflow',
  'transform',
]);

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type ErrorHandling = z.infer<typeof ErrorHandlingSchema>;

export interface ConditionBlock {
  expression: string;
  then?: StepDefinition[];
  else?: StepDefinition[];
}

export interface StepDefinition {
  id: string;
  type: z.infer<typeof StepKindSchema>;
  name?: string;
  description?: string;
  // llm
  model?: string;
  prompt?: string;
  system?: string;
  max_tokens?: number;
  // connector / builtin / integration
  connector?: string;
  builtin?: string;
  integration?: string;
  // subworkflow
  workflow?: string;
  // transform
  template?: string;
  inputs?: Record<string, unknown>;
  condition?: ConditionBlock;
  steps?: StepDefinition[];
  foreach?: string | unknown[];
  max_concurrency?: number;
  max_iterations?: number;
  until?: string;
  retry?: RetryPolicy;
  on_error?: ErrorHandling;
  timeout?: string | number;
  when?: string;
}

const ConditionSchema: z.ZodType<ConditionBlock, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    expression: z.string(),
    then: z.array(StepSchema).optional(),
    else: z.array(StepSchema).optional(),
  })
);

export const StepSchema: z.ZodType<StepDefinition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    id: z.string(),
    type: StepKindSchema,
    name: z.string().optional(),
    description: z.string().optional(),
    model: z.string().optional(),
    prompt: z.string().optional(),
    system: z.string().optional(),
    max_tokens: z.number().int().positive().optional(),
    connector: z.string().optional(),
    builtin: z.string().optional(),
    integration: z.string().optional(),
    workflow: z.string().optional(),
    template: z.string().optional(),
    inputs: z.record(z.unknown()).optional(),
    condition: ConditionSchema.optional(),
    steps: z.array(StepSchema).optional(),
    foreach: z.union([z.string(), z.array(z.unknown())]).optional(),
    max_concurrency: z.number().int().optional(),
    max_iterations: z.number().int().optional(),
    until: z.string().optional(),
    retry: RetryPolicySchema.optional(),
    on_error: ErrorHandlingSchema.optional(),
    timeout: DurationSchema.optional(),
    when: z.string().optional(),
  })
);

// ===== Connector Schema =====

const AuthSchema = z.object({
  type: z.string().optional(),
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  header: z.string().optional(),
  value: z.string().optional(),
  // oauth2_client (reserved)
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  token_url: z.string().optional(),
  scopes: z.array(z.string()).optional(),
});

const RateLimitSchema = z.object({
  requests_per_second: z.number().optional(),
  requests_per_minute: z.number().optional(),
  burst: z.number().optional(),
  timeout: z.number().optional(),
});

const OperationSchema = z.object({
  method: z.string(),
  path: z.string(),
  timeout: DurationSchema.optional(),
  description: z.string().optional(),
  headers: z.record(z.string()).optional(),
  response_transform: z.unknown().optional(),
});

const ConnectorSchema = z.object({
  from: z.string().optional(),
  base_url: z.string().optional(),
  description: z.string().optional(),
  headers: z.record(z.string()).optional(),
  auth: AuthSchema.optional(),
  rate_limit: RateLimitSchema.optional(),
  operations: z.record(OperationSchema).optional(),
});

// ===== Trigger Schema =====

const TriggerSchema = z.object({
  webhook: z
    .object({
      path: z.string(),
      source: z.string().optional(),
      events: z.array(z.string()).optional(),
      secret: z.string().optional(),
      input_mapping: z.record(z.string()).optional(),
    })
    .optional(),
  api: z.object({ secret: z.string().optional() }).optional(),
  schedule: z
    .object({
      cron: z.string(),
      timezone: z.string().optional(),
      enabled: z.boolean().optional(),
      inputs: z.record(z.unknown()).optional(),
    })
    .optional(),
  poll: z
    .object({
      integration: z.string(),
      query: z.record(z.unknown()).optional(),
      interval: DurationSchema.optional(),
      startup: z.string().optional(),
      backfill: DurationSchema.optional(),
      input_mapping: z.record(z.string()).optional(),
    })
    .optional(),
  file: z
    .object({
      paths: z.array(z.string()),
      events: z.array(z.string()).optional(),
      include_patterns: z.array(z.string()).optional(),
      exclude_patterns: z.array(z.string()).optional(),
      debounce: DurationSchema.optional(),
      recursive: z.boolean().optional(),
      inputs: z.record(z.unknown()).optional(),
    })
    .optional(),
});

// ===== Security Policy Schema =====

const SecurityPolicySchema = z.object({
  filesystem: z
    .object({
      read: z.array(z.string()).optional(),
      write: z.array(z.string()).optional(),
      deny: z.array(z.string()).optional(),
    })
    .optional(),
  network: z
    .object({
      allow: z.array(z.string()).optional(),
      deny: z.array(z.string()).optional(),
    })
    .optional(),
  shell: z
    .object({
      commands: z.array(z.string()).optional(),
      deny_patterns: z.array(z.string()).optional(),
    })
    .optional(),
});

// ===== Workflow Schema =====

export const WorkflowSchema = z.object({
  name: z.string(),
  version: z.string().optional(),
  description: z.string().optional(),
  inputs: z.record(InputSchema).optional(),
  steps: z.array(StepSchema),
  outputs: z.array(OutputSchema).optional(),
  connectors: z.record(ConnectorSchema).optional(),
  listen: TriggerSchema.optional(),
  security: SecurityPolicySchema.optional(),
  requires: z
    .object({
      integrations: z.array(z.string()).optional(),
    })
    .optional(),
});

// ===== Types =====

export type WorkflowInput = z.infer<typeof InputSchema>;
export type WorkflowOutput = z.infer<typeof OutputSchema>;
export type Connector = z.infer<typeof ConnectorSchema>;
export type ConnectorAuth = z.infer<typeof AuthSchema>;
export type RateLimit = z.infer<typeof RateLimitSchema>;
export type ConnectorOperation = z.infer<typeof OperationSchema>;
export type TriggerConfig = z.infer<typeof TriggerSchema>;
export type PollTrigger = NonNullable<TriggerConfig['poll']>;
export type SecurityPolicy = z.infer<typeof SecurityPolicySchema>;
export type Definition = z.infer<typeof WorkflowSchema>;

export { InputSchema, RetryPolicySchema, ErrorHandlingSchema, ConnectorSchema, TriggerSchema };
