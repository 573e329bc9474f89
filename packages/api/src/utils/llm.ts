import Groq from 'groq-sdk';
import type { AppConfig } from '../config';
import type { Logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for the generation call. The learning-block
 * generator only sees this interface; tests substitute a scripted fake.
 */

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface LLMClient {
  readonly model: string;
  generate(prompt: string, options?: LLMOptions): Promise<string>;
}

/**
 * GroqClient Implementation
 *
 * Uses the Groq inference API (OpenAI-compatible chat completions).
 */
export class GroqClient implements LLMClient {
  private client: Groq;
  readonly model: string;

  constructor(groqConfig: AppConfig['groq'], private readonly logger: Logger) {
    if (!groqConfig.apiKey || groqConfig.apiKey.trim() === '') {
      throw new Error(
        'GROQ_API_KEY is not configured. ' +
          'Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new Groq({ apiKey: groqConfig.apiKey });
    this.model = groqConfig.model;

    this.logger.info({ model: this.model }, 'GroqClient initialized');
  }

  /**
   * Generate a single completion.
   */
  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 1500,
          ...(options.jsonMode && { response_format: { type: 'json_object' as const } }),
        },
        { signal: options.signal }
      );

      const result = response.choices[0]?.message?.content?.trim() || '';
      const latency = Date.now() - startTime;

      this.logger.info({ latency, model: this.model }, 'LLM generation completed');

      return result;
    } catch (error) {
      this.logger.error({ error }, 'LLM generation failed');
      throw error;
    }
  }
}
