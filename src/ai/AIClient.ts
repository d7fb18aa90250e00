/**
 * AIClient - Interface to Groq for regex pattern suggestions.
 *
 * One chat completion per call, low temperature and a short output limit.
 * Failures are surfaced to the caller, which falls back to the
 * deterministic generator; the client itself never retries.
 */

import Groq from 'groq-sdk';
import { FormatterError } from '../errors/FormatterError';

export interface AIClientConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * Anything that turns a prompt into text.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface AIStats {
  callCount: number;
  totalTokensUsed: number;
  model: string;
}

/** Subset of the Groq SDK used by the client */
export interface ChatCompletionsApi {
  create(
    params: {
      model: string;
      messages: Array<{ role: 'system' | 'user'; content: string }>;
      max_tokens: number;
      temperature: number;
    },
    options?: { signal?: AbortSignal }
  ): Promise<{
    choices: Array<{ message?: { content?: string | null } | null }>;
    usage?: { total_tokens?: number } | null;
  }>;
}

const DEFAULT_CONFIG: Required<Omit<AIClientConfig, 'apiKey'>> = {
  model: 'llama-3.3-70b-versatile',
  maxTokens: 150,
  temperature: 0.1,
  timeoutMs: 30000,
};

function createGroqCompletions(apiKey: string, timeoutMs: number): ChatCompletionsApi {
  const groq = new Groq({ apiKey, maxRetries: 0, timeout: timeoutMs });
  return {
    create: (params, options) =>
      groq.chat.completions.create({ ...params, stream: false }, { signal: options?.signal }),
  };
}

const SYSTEM_PROMPT =
  'You are a data parsing expert. You answer with a single regular expression and nothing else.';

export class AIClient implements TextGenerator {
  private completions: ChatCompletionsApi;
  private config: Required<AIClientConfig>;
  private totalTokensUsed: number = 0;
  private callCount: number = 0;

  constructor(config: AIClientConfig, completions?: ChatCompletionsApi) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (!this.config.apiKey) {
      throw new FormatterError('ConfigError', 'GROQ_API_KEY is required for AI operations');
    }

    this.completions = completions ?? createGroqCompletions(this.config.apiKey, this.config.timeoutMs);
  }

  /**
   * Send a prompt and return the trimmed completion text.
   */
  async generate(prompt: string): Promise<string> {
    const response = await this.withTimeout(
      (signal) =>
        this.completions.create(
          {
            model: this.config.model,
            messages: [
              { role: 'system', content: SYSTEM_PROMPT },
              { role: 'user', content: prompt },
            ],
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
          },
          { signal }
        ),
      this.config.timeoutMs
    );

    this.callCount++;
    this.totalTokensUsed += response.usage?.total_tokens ?? 0;

    const content = (response.choices[0]?.message?.content ?? '').trim();
    if (!content) {
      throw new FormatterError('EmptyResponse', 'Empty response from AI model');
    }
    return content;
  }

  getStats(): AIStats {
    return {
      callCount: this.callCount,
      totalTokensUsed: this.totalTokensUsed,
      model: this.config.model,
    };
  }

  /**
   * Run a request with timeout protection. The request's signal is aborted
   * when the timeout wins the race.
   */
  private async withTimeout<T>(
    request: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
  ): Promise<T> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error(`AI request timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([request(controller.signal), timeoutPromise]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
