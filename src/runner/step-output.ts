import { StepStatus, type TerminalStepStatus } from '../types/status.ts';
import { isRecord } from '../expression/values.ts';

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface StepMetadata {
  /** Wall-clock duration in milliseconds */
  duration: number;
  token_usage?: TokenUsage;
  provider?: string;
  model?: string;
  /** Number of dispatches made for the step, retries included */
  attempts?: number;
}

/**
 * What a terminated step leaves behind for downstream templates.
 */
export interface StepOutput {
  text: string;
  data: unknown;
  error?: string;
  status: TerminalStepStatus;
  metadata: StepMetadata;
}

export function createStepOutput(
  fields: Partial<Omit<StepOutput, 'metadata'>> & { metadata?: Partial<StepMetadata> } = {}
): StepOutput {
  const { metadata, ...rest } = fields;
  return {
    text: '',
    data: null,
    status: StepStatus.SUCCESS,
    ...rest,
    metadata: { duration: 0, ...metadata },
  };
}

/**
 * Sum of the given usage records, or undefined when there is none.
 */
export function sumTokenUsage(usages: Iterable<TokenUsage | undefined>): TokenUsage | undefined {
  let total: TokenUsage | undefined;
  for (const usage of usages) {
    if (!usage) continue;
    total = {
      prompt_tokens: (total?.prompt_tokens ?? 0) + usage.prompt_tokens,
      completion_tokens: (total?.completion_tokens ?? 0) + usage.completion_tokens,
      total_tokens: (total?.total_tokens ?? 0) + usage.total_tokens,
    };
  }
  return total;
}

export function skippedOutput(): StepOutput {
  return createStepOutput({ status: StepStatus.SKIPPED });
}

/**
 * Projection used under `steps.<id>` in template data.
 *
 * Mapping data is flattened to the top level, anything else sits under `data`. The
 * reserved keys `text`, `response` (alias of a non-empty text) and `error` always win;
 * `status` is added unless the data already carries one.
 */
export function stepOutputToMap(output: StepOutput): Record<string, unknown> {
  const map: Record<string, unknown> = {};
  if (isRecord(output.data)) {
    Object.assign(map, output.data);
  } else if (output.data !== null && output.data !== undefined) {
    map.data = output.data;
  }

  map.text = output.text;
  if (output.text !== '') {
    map.response = output.text;
  }
  if (output.error) {
    map.error = output.error;
  }
  if (!('status' in map)) {
    map.status = output.status;
  }
  return map;
}
