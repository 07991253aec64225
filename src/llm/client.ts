import OpenAI from 'openai';

import { describeError } from '../errors';
import { exponentialBackoff } from '../util/retry';
import { CV_EXTRACTION_PROMPT, buildAnswerPrompt } from './prompts';

/**
 * Language-model boundary. Both calls reject on transport, auth or quota
 * failures; callers bound them with a timeout.
 */
export interface LlmClient {
  complete(systemPrompt: string, context: string, question: string, signal?: AbortSignal): Promise<string>;
  extractCvFields(cvText: string, signal?: AbortSignal): Promise<unknown>;
}

export type OpenAiLlmOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  maxAttempts: number;
};

type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

export class OpenAiLlmClient implements LlmClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiLlmOptions) {}

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    const { apiKey, baseUrl } = this.options;

    if (!apiKey) {
      throw new Error('LLM API key not configured. Set OPENAI_API_KEY.');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl,
      maxRetries: 0,
    });

    return this.client;
  }

  private async chat(
    messages: ChatMessage[],
    { temperature, json, signal }: { temperature: number; json: boolean; signal?: AbortSignal },
  ): Promise<string> {
    const client = this.getClient();

    const response = await exponentialBackoff(
      () =>
        client.chat.completions.create(
          {
            model: this.options.model,
            temperature,
            messages,
            ...(json ? { response_format: { type: 'json_object' as const } } : {}),
          },
          { signal },
        ),
      { label: 'LLM call', maxAttempts: this.options.maxAttempts, signal },
    );

    const content = response.choices[0]?.message?.content;

    if (!content) {
      throw new Error('LLM response did not contain any content.');
    }

    return content.trim();
  }

  complete(systemPrompt: string, context: string, question: string, signal?: AbortSignal): Promise<string> {
    return this.chat(
      [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: buildAnswerPrompt(context, question) },
      ],
      { temperature: 0.3, json: false, signal },
    );
  }

  async extractCvFields(cvText: string, signal?: AbortSignal): Promise<unknown> {
    const content = await this.chat(
      [
        { role: 'system', content: CV_EXTRACTION_PROMPT },
        { role: 'user', content: `Parse this CV completely and extract ALL information:\n\n${cvText}` },
      ],
      { temperature: 0, json: true, signal },
    );

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to parse LLM JSON response: ${describeError(error)}`);
    }
  }
}
