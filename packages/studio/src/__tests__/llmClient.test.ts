import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ANTHROPIC_DEFAULT_BASE_URL,
  ANTHROPIC_DEFAULT_MODEL,
  OPENAI_DEFAULT_MODEL,
  getLlmClient,
  getLlmConfig,
} from '../llm/client';

const LLM_ENV = [
  'LLM_PROVIDER',
  'OPENAI_API_KEY',
  'OPENAI_BASE_URL',
  'OPENAI_CHAT_MODEL',
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_BASE_URL',
  'ANTHROPIC_CHAT_MODEL',
];

let saved: Record<string, string | undefined> = {};

beforeEach(() => {
  saved = Object.fromEntries(LLM_ENV.map((name) => [name, process.env[name]]));
  for (const name of LLM_ENV) delete process.env[name];
});

afterEach(() => {
  for (const name of LLM_ENV) {
    const value = saved[name];
    if (value === undefined) delete process.env[name];
    else process.env[name] = value;
  }
});

describe('getLlmConfig', () => {
  it('defaults to OpenAI with the SDK base URL', () => {
    expect(getLlmConfig()).toEqual({ provider: 'openai', baseUrl: undefined, model: OPENAI_DEFAULT_MODEL });
  });

  it('reads provider-scoped env vars', () => {
    process.env.LLM_PROVIDER = ' Anthropic ';
    process.env.ANTHROPIC_CHAT_MODEL = 'claude-3-5-sonnet-latest';
    process.env.OPENAI_CHAT_MODEL = 'gpt-4o';
    expect(getLlmConfig()).toEqual({
      provider: 'anthropic',
      baseUrl: ANTHROPIC_DEFAULT_BASE_URL,
      model: 'claude-3-5-sonnet-latest',
    });
  });

  it('prefers overrides over env and treats blank env as unset', () => {
    process.env.OPENAI_BASE_URL = '   ';
    process.env.OPENAI_CHAT_MODEL = 'gpt-4o';
    expect(getLlmConfig({ model: 'gpt-4.1-mini' })).toEqual({
      provider: 'openai',
      baseUrl: undefined,
      model: 'gpt-4.1-mini',
    });
    expect(getLlmConfig({ baseUrl: 'http://localhost:8080/v1' }).baseUrl).toBe('http://localhost:8080/v1');
  });

  it('swaps a model that belongs to the other provider for the default', () => {
    expect(getLlmConfig({ provider: 'openai', model: 'claude-3-opus' }).model).toBe(OPENAI_DEFAULT_MODEL);
    expect(getLlmConfig({ provider: 'anthropic', model: 'gpt-4o' }).model).toBe(ANTHROPIC_DEFAULT_MODEL);
    expect(getLlmConfig({ provider: 'anthropic', model: 'o3-mini' }).model).toBe(ANTHROPIC_DEFAULT_MODEL);
  });
});

describe('getLlmClient', () => {
  it('throws a message naming the missing key', () => {
    expect(() => getLlmClient()).toThrow('OpenAI API key not configured. Set OPENAI_API_KEY in the environment.');
    expect(() => getLlmClient({ provider: 'anthropic' })).toThrow(
      'Anthropic API key not configured. Set ANTHROPIC_API_KEY in the environment.',
    );
  });

  it('builds a client pointed at the resolved base URL', () => {
    process.env.ANTHROPIC_API_KEY = 'test-secret';
    const { client, provider, model } = getLlmClient({ provider: 'anthropic' });
    expect(provider).toBe('anthropic');
    expect(model).toBe(ANTHROPIC_DEFAULT_MODEL);
    expect(client.baseURL).toBe(ANTHROPIC_DEFAULT_BASE_URL);
  });
});
