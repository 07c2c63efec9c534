import { ParameterResolver } from '../../expression/resolver.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { createStepOutput, type StepOutput } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import type { ExecutorEnv } from './types.ts';

/**
 * Execute an llm step: render model, prompt and system text, then ask the provider for a
 * completion.
 */
export async function executeLlmStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  if (!env.llm) {
    throw new Error(`no LLM provider configured for step "${step.id}"`);
  }

  const data = context.templateData();
  const model = ParameterResolver.renderText(step.model ?? '', data);
  const prompt = ParameterResolver.renderText(step.prompt ?? '', data);
  const system = step.system === undefined ? undefined : ParameterResolver.renderText(step.system, data);

  env.logger.debug?.(`  model: ${model}, prompt: ${prompt.length} chars`);

  const completion = await env.llm.complete(signal, model, prompt, {
    system,
    maxTokens: step.max_tokens,
  });

  return createStepOutput({
    text: completion.text,
    metadata: {
      model,
      provider: completion.provider,
      token_usage: completion.usage,
    },
  });
}
