import path from 'node:path';

import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig({ DATA_DIR: '/srv/cv' });

    expect(config.port).toBe(3000);
    expect(config.dataDir).toBe('/srv/cv');
    expect(config.indexPath).toBe(path.join('/srv/cv', 'vector-index.json'));
    expect(config.embedding).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-small',
      dimension: 1536,
      ollamaUrl: 'http://localhost:11434',
      batchSize: 64,
      maxAttempts: 5,
      timeoutMs: 30_000,
    });
    expect(config.retrieval).toEqual({ defaultTopK: 10, maxTopK: 50, overfetch: 5 });
    expect(config.answer).toEqual({ maxContextChars: 12_000, highThreshold: 0.5, lowThreshold: 0.25, strategy: 'mean' });
    expect(config.llm.apiKey).toBeUndefined();
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      DATA_DIR: '/srv/cv',
      INDEX_PATH: '/var/index.json',
      EMBEDDING_PROVIDER: 'ollama',
      EMBEDDING_DIMENSION: '768',
      OPENAI_API_KEY: ' test-secret ',
      CONFIDENCE_STRATEGY: 'top1',
      RETRIEVAL_OVERFETCH: '0',
    });

    expect(config.indexPath).toBe('/var/index.json');
    expect(config.embedding.provider).toBe('ollama');
    expect(config.embedding.dimension).toBe(768);
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.answer.strategy).toBe('top1');
    expect(config.retrieval.overfetch).toBe(0);
  });

  test('rejects inconsistent thresholds', () => {
    expect(() => loadConfig({ CONFIDENCE_HIGH: '0.2', CONFIDENCE_LOW: '0.4' })).toThrow(
      'Invalid configuration: CONFIDENCE_LOW: CONFIDENCE_LOW must not exceed CONFIDENCE_HIGH',
    );
  });

  test('rejects malformed numbers', () => {
    expect(() => loadConfig({ EMBEDDING_DIMENSION: 'wide' })).toThrow(/^Invalid configuration: EMBEDDING_DIMENSION/);
  });
});
