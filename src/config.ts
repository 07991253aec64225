import path from 'node:path';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    PORT: positiveInt(3000),
    DATA_DIR: z.string().min(1).default('.data'),
    INDEX_PATH: optionalString,
    EMBEDDING_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIMENSION: positiveInt(1536),
    OLLAMA_EMBED_URL: z.string().url().default('http://localhost:11434'),
    EMBEDDING_BATCH_SIZE: positiveInt(64),
    EMBEDDING_MAX_ATTEMPTS: positiveInt(5),
    EMBEDDING_TIMEOUT_MS: positiveInt(30_000),
    OPENAI_API_KEY: optionalString,
    LLM_BASE_URL: optionalString,
    LLM_MODEL: z.string().min(1).default('gpt-4-turbo'),
    LLM_MAX_ATTEMPTS: positiveInt(3),
    LLM_TIMEOUT_MS: positiveInt(60_000),
    CHUNK_MAX_CHARS: positiveInt(1500),
    RETRIEVAL_DEFAULT_TOP_K: positiveInt(10),
    RETRIEVAL_MAX_TOP_K: positiveInt(50),
    RETRIEVAL_OVERFETCH: z.coerce.number().int().min(0).default(5),
    CONTEXT_MAX_CHARS: positiveInt(12_000),
    CONFIDENCE_HIGH: z.coerce.number().min(0).max(1).default(0.5),
    CONFIDENCE_LOW: z.coerce.number().min(0).max(1).default(0.25),
    CONFIDENCE_STRATEGY: z.enum(['mean', 'top1']).default('mean'),
  })
  .refine((env) => env.CONFIDENCE_LOW <= env.CONFIDENCE_HIGH, {
    message: 'CONFIDENCE_LOW must not exceed CONFIDENCE_HIGH',
    path: ['CONFIDENCE_LOW'],
  })
  .refine((env) => env.RETRIEVAL_DEFAULT_TOP_K <= env.RETRIEVAL_MAX_TOP_K, {
    message: 'RETRIEVAL_DEFAULT_TOP_K must not exceed RETRIEVAL_MAX_TOP_K',
    path: ['RETRIEVAL_DEFAULT_TOP_K'],
  });

export type ConfidenceStrategy = 'mean' | 'top1';

export type AppConfig = {
  port: number;
  dataDir: string;
  indexPath: string;
  embedding: {
    provider: 'openai' | 'ollama';
    model: string;
    dimension: number;
    ollamaUrl: string;
    batchSize: number;
    maxAttempts: number;
    timeoutMs: number;
  };
  llm: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    maxAttempts: number;
    timeoutMs: number;
  };
  chunking: {
    maxChars: number;
  };
  retrieval: {
    defaultTopK: number;
    maxTopK: number;
    overfetch: number;
  };
  answer: {
    maxContextChars: number;
    highThreshold: number;
    lowThreshold: number;
    strategy: ConfidenceStrategy;
  };
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const validation = envSchema.safeParse(env);

  if (!validation.success) {
    const issues = validation.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const parsed = validation.data;
  const dataDir = path.resolve(parsed.DATA_DIR);

  return {
    port: parsed.PORT,
    dataDir,
    indexPath: parsed.INDEX_PATH ? path.resolve(parsed.INDEX_PATH) : path.join(dataDir, 'vector-index.json'),
    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimension: parsed.EMBEDDING_DIMENSION,
      ollamaUrl: parsed.OLLAMA_EMBED_URL,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      maxAttempts: parsed.EMBEDDING_MAX_ATTEMPTS,
      timeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    },
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
      maxAttempts: parsed.LLM_MAX_ATTEMPTS,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
    chunking: {
      maxChars: parsed.CHUNK_MAX_CHARS,
    },
    retrieval: {
      defaultTopK: parsed.RETRIEVAL_DEFAULT_TOP_K,
      maxTopK: parsed.RETRIEVAL_MAX_TOP_K,
      overfetch: parsed.RETRIEVAL_OVERFETCH,
    },
    answer: {
      maxContextChars: parsed.CONTEXT_MAX_CHARS,
      highThreshold: parsed.CONFIDENCE_HIGH,
      lowThreshold: parsed.CONFIDENCE_LOW,
      strategy: parsed.CONFIDENCE_STRATEGY,
    },
  };
};
