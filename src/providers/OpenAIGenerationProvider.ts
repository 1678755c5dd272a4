/**
 * OpenAI chat-completion generation provider.
 */

import OpenAI from 'openai';
import type { GenerationPrompt, IGenerationProvider } from './IGenerationProvider.js';
import { GenerationProviderError, messageOf } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 600;

export class OpenAIGenerationProvider implements IGenerationProvider {
  private client: OpenAI;
  readonly model: string;
  private readonly maxTokens: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    maxTokens?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async generate(prompt: GenerationPrompt, signal?: AbortSignal): Promise<string> {
    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: prompt.temperature ?? 0,
          max_tokens: this.maxTokens,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
        },
        { signal }
      );
    } catch (err) {
      throw new GenerationProviderError(`OpenAI completion failed: ${messageOf(err)}`, err);
    }

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new GenerationProviderError('OpenAI completion returned no content');
    }
    return content;
  }
}
