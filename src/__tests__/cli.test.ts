import { createAIClient, formatAIStats } from '../cli';
import { AIClient } from '../ai/AIClient';
import { DEFAULT_CONFIG, FormatterConfig } from '../config/ConfigLoader';

function configWith(ai: Partial<FormatterConfig['ai']>): FormatterConfig {
  return { ...DEFAULT_CONFIG, ai: { ...DEFAULT_CONFIG.ai, ...ai } };
}

describe('createAIClient', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('returns null when AI is disabled', () => {
    expect(createAIClient(configWith({ enabled: false, apiKey: 'test-key' }))).toBeNull();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('warns and returns null without an API key', () => {
    expect(createAIClient(configWith({ apiKey: '' }))).toBeNull();
    expect(warnSpy).toHaveBeenCalledWith(
      'GROQ_API_KEY is not set; pattern suggestions will use the fallback generator'
    );
  });

  it('builds a client from the configured model', () => {
    const client = createAIClient(configWith({ apiKey: 'test-key', model: 'custom-model' }));

    expect(client).toBeInstanceOf(AIClient);
    expect(client?.getStats()).toEqual({ callCount: 0, totalTokensUsed: 0, model: 'custom-model' });
  });
});

describe('formatAIStats', () => {
  it('summarises calls, tokens and model', () => {
    expect(formatAIStats({ callCount: 2, totalTokensUsed: 84, model: 'custom-model' })).toBe(
      'AI calls: 2, tokens used: 84 (model: custom-model)'
    );
  });
});
