import { type LanguageModel, generateText } from 'ai';
import type { Completion, CompletionOptions, LLMProvider } from './executors/types.ts';

/**
 * Maps a step's rendered `model` string to an AI SDK language model, e.g.
 * `(id) => openai(id)` with a provider package.
 */
export type ModelResolver = (model: string) => LanguageModel;

/**
 * LLMProvider backed by the AI SDK's `generateText`.
 */
export class AiSdkProvider implements LLMProvider {
  constructor(
    private readonly resolveModel: ModelResolver,
    private readonly name = 'ai-sdk'
  ) {}

  async complete(
    signal: AbortSignal,
    model: string,
    prompt: string,
    options: CompletionOptions
  ): Promise<Completion> {
    const result = await generateText({
      model: this.resolveModel(model),
      prompt,
      system: options.system,
      maxTokens: options.maxTokens,
      abortSignal: signal,
    });

    return {
      text: result.text,
      provider: this.name,
      usage: {
        prompt_tokens: result.usage.promptTokens,
        completion_tokens: result.usage.completionTokens,
        total_tokens: result.usage.totalTokens,
      },
    };
  }
}
