import OpenAI from 'openai';
import { GenerationFailedError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { AIAdapter, CompletionOptions } from './ai/AIAdapter.js';
import type { Env } from './env.js';

type OpenAIAdapterEnv = Pick<
  Env,
  | 'OPENAI_API_KEY'
  | 'OPENAI_BASE_URL'
  | 'OPENAI_MODEL'
  | 'OPENAI_TEMPERATURE'
  | 'GENERATION_TIMEOUT_MS'
>;

/**
 * OpenAI API adapter - wrapper for the Chat Completions API
 *
 * One request per call: SDK retries are disabled and the request is
 * aborted after GENERATION_TIMEOUT_MS.
 */
export class OpenAIAdapter implements AIAdapter {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(env: OpenAIAdapterEnv) {
    this.client = new OpenAI({
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      timeout: env.GENERATION_TIMEOUT_MS,
      maxRetries: 0,
    });
    this.model = env.OPENAI_MODEL;
    this.temperature = env.OPENAI_TEMPERATURE;
  }

  getBackendName(): string {
    return 'openai';
  }

  async completion(options: CompletionOptions): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.instructions) {
      messages.push({ role: 'system', content: options.instructions });
    }
    messages.push({ role: 'user', content: options.input });

    const temperature = options.temperature ?? this.temperature;

    let response: OpenAI.Chat.ChatCompletion;
    try {
      logger.info('Calling OpenAI Chat Completions API', {
        model: this.model,
        temperature,
        maxOutputTokens: options.maxOutputTokens,
        inputLength: options.input.length,
      });

      response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature,
        max_tokens: options.maxOutputTokens,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('OpenAI completion failed', { model: this.model, message });
      throw new GenerationFailedError(message, { backend: this.getBackendName() });
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      logger.error('Empty response from OpenAI', {
        choices: response.choices.length,
        finishReason: response.choices[0]?.finish_reason,
      });
      throw new GenerationFailedError('response contained no message content', {
        backend: this.getBackendName(),
      });
    }

    logger.info('OpenAI completion successful', {
      inputLength: options.input.length,
      responseLength: content.length,
      finishReason: response.choices[0]?.finish_reason,
    });

    return content;
  }
}
