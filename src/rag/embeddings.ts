import OpenAI from 'openai';

import { EmbeddingUnavailableError, InvalidInputError, describeError } from '../errors';
import { exponentialBackoff, getStatus } from '../util/retry';
import { withTimeout } from '../util/timeout';

/**
 * Turns texts into vectors, one per text and in input order. Implementations
 * own their transport and retry policy.
 */
export interface EmbeddingProvider {
  readonly model: string;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

const normalizeEmbeddingVector = (values: unknown): number[] => {
  if (!Array.isArray(values)) {
    throw new Error('Embedding response did not include an array of numbers.');
  }

  return values.map((value, index) => {
    const numeric = typeof value === 'number' ? value : Number(value);
    if (Number.isNaN(numeric)) {
      throw new Error(`Embedding value at index ${index} is not a valid number.`);
    }
    return numeric;
  });
};

const splitBatches = (texts: string[], batchSize: number): string[][] => {
  const batches: string[][] = [];

  for (let index = 0; index < texts.length; index += batchSize) {
    batches.push(texts.slice(index, index + batchSize));
  }

  return batches;
};

const logRetry = (provider: string, error: unknown, attempt: number, delay: number): void => {
  const status = getStatus(error);
  const prefix = typeof status === 'number' ? `status ${status}: ` : '';

  console.warn(
    `${provider} embedding attempt ${attempt} failed (${prefix}${describeError(error)}). Retrying in ${delay}ms.`,
  );
};

type OpenAiEmbeddingOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  batchSize: number;
  maxAttempts: number;
};

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;

  private readonly batchSize: number;

  private readonly maxAttempts: number;

  private readonly client: OpenAI;

  constructor({ apiKey, baseUrl, model, batchSize, maxAttempts }: OpenAiEmbeddingOptions) {
    if (!apiKey) {
      throw new Error('Embedding API key not configured. Set OPENAI_API_KEY.');
    }

    this.model = model;
    this.batchSize = Math.max(1, batchSize);
    this.maxAttempts = Math.max(1, maxAttempts);
    this.client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const batch of splitBatches(texts, this.batchSize)) {
      const response = await exponentialBackoff(
        () => this.client.embeddings.create({ model: this.model, input: batch }, { signal }),
        {
          label: 'OpenAI embedding',
          maxAttempts: this.maxAttempts,
          signal,
          onRetry: (error, attempt, delay) => logRetry('OpenAI', error, attempt, delay),
        },
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      embeddings.push(...ordered.map((item) => normalizeEmbeddingVector(item.embedding)));
    }

    return embeddings;
  }
}

type OllamaEmbeddingOptions = {
  baseUrl: string;
  model: string;
  batchSize: number;
  maxAttempts: number;
};

const buildOllamaEndpoint = (baseUrl: string): string => {
  try {
    const url = new URL(baseUrl);
    url.pathname = '/api/embeddings';
    url.search = '';
    return url.toString();
  } catch (error) {
    throw new Error(`Invalid embedding service URL "${baseUrl}": ${describeError(error)}`);
  }
};

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;

  private readonly batchSize: number;

  private readonly maxAttempts: number;

  private readonly endpoint: string;

  constructor({ baseUrl, model, batchSize, maxAttempts }: OllamaEmbeddingOptions) {
    this.model = model;
    this.batchSize = Math.max(1, batchSize);
    this.maxAttempts = Math.max(1, maxAttempts);
    this.endpoint = buildOllamaEndpoint(baseUrl);
  }

  private async requestBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const text of batch) {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
        signal,
      });

      if (!response.ok) {
        const detailText = await response.text();
        throw Object.assign(new Error(detailText || response.statusText), {
          status: response.status,
          detail: detailText || response.statusText,
        });
      }

      let data: unknown;

      try {
        data = await response.json();
      } catch (error) {
        throw new Error(`Failed to parse embedding response JSON: ${describeError(error)}`);
      }

      const embedding = data && typeof data === 'object' && 'embedding' in data ? data.embedding : undefined;

      embeddings.push(normalizeEmbeddingVector(embedding));
    }

    return embeddings;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const batch of splitBatches(texts, this.batchSize)) {
      const batchEmbeddings = await exponentialBackoff(() => this.requestBatch(batch, signal), {
        label: 'Ollama embedding',
        maxAttempts: this.maxAttempts,
        signal,
        onRetry: (error, attempt, delay) => logRetry('Ollama', error, attempt, delay),
      });

      embeddings.push(...batchEmbeddings);
    }

    return embeddings;
  }
}

export type EmbeddingClientOptions = {
  dimension: number;
  timeoutMs: number;
};

/**
 * Validating front for an {@link EmbeddingProvider}. Every failure, including
 * a timeout or a malformed response, surfaces as EmbeddingUnavailableError and
 * a batch is returned whole or not at all.
 */
export class EmbeddingClient {
  readonly dimension: number;

  private readonly timeoutMs: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    { dimension, timeoutMs }: EmbeddingClientOptions,
  ) {
    this.dimension = dimension;
    this.timeoutMs = timeoutMs;
  }

  get model(): string {
    return this.provider.model;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const inputs = texts.map((text, index) => {
      const trimmed = text.trim();
      if (!trimmed) {
        throw new InvalidInputError(`Cannot embed empty text (item ${index}).`);
      }
      return trimmed;
    });

    let vectors: number[][];

    try {
      vectors = await withTimeout(
        (signal) => this.provider.embedBatch(inputs, signal),
        this.timeoutMs,
        () => new EmbeddingUnavailableError(`Embedding request timed out after ${this.timeoutMs}ms.`),
      );
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }

      const status = getStatus(error);
      const message =
        typeof status === 'number'
          ? `Embedding request failed (status ${status}): ${describeError(error)}`
          : `Embedding request failed: ${describeError(error)}`;
      console.error(message);
      throw new EmbeddingUnavailableError(message, error);
    }

    if (vectors.length !== inputs.length) {
      throw new EmbeddingUnavailableError(
        `Embedding provider returned ${vectors.length} vectors for ${inputs.length} texts.`,
      );
    }

    const malformed = vectors.findIndex((vector) => vector.length !== this.dimension);
    if (malformed !== -1) {
      throw new EmbeddingUnavailableError(
        `Embedding ${malformed} has dimension ${vectors[malformed].length}, expected ${this.dimension}.`,
      );
    }

    return vectors;
  }
}
