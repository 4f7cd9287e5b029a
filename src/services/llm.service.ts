import { z } from 'zod';
import { LlmConfig } from '../types/config.types';
import { ExternalServiceError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

export type ProbeOutcome = 'valid' | 'invalid' | 'unavailable';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Minimal surface of the external language-model service
 */
export interface LlmClient {
  /** Cheap authenticated request used only to judge whether a key works */
  probe(apiKey: string): Promise<ProbeOutcome>;
  chat(apiKey: string, messages: ChatMessage[]): Promise<string>;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

/**
 * Client for an OpenAI-compatible HTTP API (Gemini exposes one).
 * The caller's own key is sent with each request.
 */
export class OpenAiCompatibleClient implements LlmClient {
  private readonly options: LlmConfig;

  constructor(options: LlmConfig) {
    this.options = options;
  }

  async probe(apiKey: string): Promise<ProbeOutcome> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/models`, {
        method: 'GET',
        headers: { Authorization: `Bearer ${apiKey}` },
        signal: AbortSignal.timeout(this.options.probeTimeoutMs),
      });
    } catch (error) {
      logger.error('API key probe could not reach the LLM service', {
        kind: 'ExternalServiceError',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return 'unavailable';
    }

    if (response.ok) {
      return 'valid';
    }

    if (response.status === 429 || response.status >= 500) {
      logger.error('API key probe got a service-side failure', {
        kind: 'ExternalServiceError',
        status: response.status,
      });
      return 'unavailable';
    }

    logger.info('API key probe rejected the key', { status: response.status });
    return 'invalid';
  }

  async chat(apiKey: string, messages: ChatMessage[]): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({ model: this.options.model, messages }),
        signal: AbortSignal.timeout(this.options.chatTimeoutMs),
      });
    } catch (error) {
      logger.error('Chat request could not reach the LLM service', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new ExternalServiceError('The language model service is unreachable');
    }

    if (!response.ok) {
      logger.error('Chat request failed', { status: response.status });
      throw new ExternalServiceError(`The language model service answered with status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      logger.error('Chat response body could not be read', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new ExternalServiceError('Malformed response from the language model service');
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError('Malformed response from the language model service');
    }

    return parsed.data.choices[0].message.content ?? '';
  }
}
