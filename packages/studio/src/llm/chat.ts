import type OpenAI from 'openai';
import { getLlmClient, type LlmOverrides } from './client';

export type ChatRequest = {
  prompt: string;
  system?: string;
  maxTokens?: number;
};

export type ChatFn = (request: ChatRequest) => Promise<string>;

const DEFAULT_MAX_TOKENS = 2000;

/** Chat completion backed by the configured provider. The client is built on first use. */
export function createChat(overrides?: LlmOverrides): ChatFn {
  let resolved: ReturnType<typeof getLlmClient> | null = null;

  return async ({ prompt, system, maxTokens = DEFAULT_MAX_TOKENS }) => {
    resolved ??= getLlmClient(overrides);
    const { client, model, provider } = resolved;

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (system) messages.push({ role: 'system', content: system });
    messages.push({ role: 'user', content: prompt });

    const completion = await client.chat.completions.create({
      model,
      messages,
      max_tokens: maxTokens,
    });
    const content = completion.choices[0]?.message?.content ?? '';
    if (!content.trim()) {
      console.warn('[llm.chat] empty_response', { provider, model });
      throw new Error('llm_empty_response');
    }
    return content;
  };
}
