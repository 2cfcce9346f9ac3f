/**
 * LLM client factory. Supports OpenAI and Anthropic (through its OpenAI-compatible endpoint).
 * API keys come from env only.
 */

import OpenAI from 'openai';

export type LlmProvider = 'openai' | 'anthropic';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
export const ANTHROPIC_DEFAULT_BASE_URL = 'https://api.anthropic.com/v1/';
export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-haiku-latest';

export type LlmOverrides = {
  provider?: LlmProvider;
  baseUrl?: string;
  model?: string;
};

export type LlmConfig = {
  provider: LlmProvider;
  baseUrl: string | undefined;
  model: string;
};

const env = (name: string) => (process.env[name] ?? '').trim();

const parseProvider = (value: string | undefined): LlmProvider =>
  value?.trim().toLowerCase() === 'anthropic' ? 'anthropic' : 'openai';

function looksLikeOpenAiModel(model: string): boolean {
  const m = model.toLowerCase();
  return m.startsWith('gpt-') || m.startsWith('o1') || /^o\d/.test(m);
}

function looksLikeAnthropicModel(model: string): boolean {
  return model.toLowerCase().startsWith('claude-');
}

/**
 * Resolve provider, baseUrl, model from overrides then provider-scoped env.
 * A model that clearly belongs to the other provider is replaced by the default.
 */
export function getLlmConfig(overrides?: LlmOverrides): LlmConfig {
  const provider = overrides?.provider ?? parseProvider(process.env.LLM_PROVIDER);
  const rawBase = (overrides?.baseUrl ?? '').trim();
  const rawModel = (overrides?.model ?? '').trim();

  if (provider === 'openai') {
    const model = rawModel || env('OPENAI_CHAT_MODEL') || OPENAI_DEFAULT_MODEL;
    return {
      provider,
      baseUrl: rawBase || env('OPENAI_BASE_URL') || undefined,
      model: looksLikeAnthropicModel(model) ? OPENAI_DEFAULT_MODEL : model,
    };
  }

  const model = rawModel || env('ANTHROPIC_CHAT_MODEL') || ANTHROPIC_DEFAULT_MODEL;
  return {
    provider,
    baseUrl: rawBase || env('ANTHROPIC_BASE_URL') || ANTHROPIC_DEFAULT_BASE_URL,
    model: looksLikeOpenAiModel(model) ? ANTHROPIC_DEFAULT_MODEL : model,
  };
}

/**
 * Return an OpenAI SDK client and the resolved config.
 * openai => OPENAI_API_KEY; anthropic => ANTHROPIC_API_KEY.
 * @throws Error if the API key is missing for the chosen provider
 */
export function getLlmClient(overrides?: LlmOverrides): LlmConfig & { client: OpenAI } {
  const config = getLlmConfig(overrides);
  const apiKey = config.provider === 'anthropic' ? env('ANTHROPIC_API_KEY') : env('OPENAI_API_KEY');

  if (!apiKey) {
    throw new Error(
      config.provider === 'anthropic'
        ? 'Anthropic API key not configured. Set ANTHROPIC_API_KEY in the environment.'
        : 'OpenAI API key not configured. Set OPENAI_API_KEY in the environment.',
    );
  }

  const client = new OpenAI({ apiKey, baseURL: config.baseUrl });
  return { ...config, client };
}
