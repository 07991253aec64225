import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { LlmClient } from '../src/llm/client';
import { EmbeddingProvider } from '../src/rag/embeddings';
import { CvFieldsInput } from '../src/rag/schema';

export const createTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'cv-query-test-'));

export const removeDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

/** Unit vector at the given cosine from [1, 0]. */
export const vectorAtCosine = (cosine: number): number[] => [cosine, Math.sqrt(1 - cosine * cosine)];

/**
 * Deterministic, never-zero vector for any text, so tests that do not care
 * about geometry need no lookup table.
 */
export const hashVector = (text: string, dimension: number): number[] => {
  const vector = new Array<number>(dimension).fill(0);
  for (let i = 0; i < text.length; i += 1) {
    vector[i % dimension] += text.charCodeAt(i) % 31;
  }
  vector[0] += 1;
  return vector;
};

type StubEmbeddingOptions = {
  dimension: number;
  vectors?: Record<string, number[]>;
  failOn?: string;
};

export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'stub-embedding';

  readonly calls: string[][] = [];

  failOn: string | undefined;

  private readonly dimension: number;

  private readonly vectors: Record<string, number[]>;

  constructor({ dimension, vectors = {}, failOn }: StubEmbeddingOptions) {
    this.dimension = dimension;
    this.vectors = vectors;
    this.failOn = failOn;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);

    return texts.map((text) => {
      if (text === this.failOn) {
        throw Object.assign(new Error('quota exceeded'), { status: 429 });
      }
      return this.vectors[text] ?? hashVector(text, this.dimension);
    });
  }
}

export class StubLlmClient implements LlmClient {
  readonly completions: Array<{ systemPrompt: string; context: string; question: string }> = [];

  reply = 'Stub answer.';

  failure: Error | undefined;

  hang = false;

  extracted: unknown = {};

  complete(systemPrompt: string, context: string, question: string): Promise<string> {
    this.completions.push({ systemPrompt, context, question });

    if (this.hang) {
      return new Promise<string>(() => undefined);
    }

    return this.failure ? Promise.reject(this.failure) : Promise.resolve(this.reply);
  }

  async extractCvFields(): Promise<unknown> {
    return this.extracted;
  }
}

export const sampleFields = (name: string, overrides: Partial<CvFieldsInput> = {}): CvFieldsInput => ({
  name,
  email: `${name.toLowerCase()}@example.com`,
  summary: `${name} is a backend engineer.`,
  skills: ['TypeScript', 'Postgres'],
  experience: [
    {
      title: 'Engineer',
      company: 'Acme',
      duration: '2020-2023',
      description: 'Built billing services.',
    },
  ],
  ...overrides,
});

export const silenceConsole = (): void => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });
};
