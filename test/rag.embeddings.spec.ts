import path from 'node:path';

import { EmbeddingUnavailableError, InvalidInputError } from '../src/errors';
import { EmbeddingClient, EmbeddingProvider, OllamaEmbeddingProvider } from '../src/rag/embeddings';
import { VectorIndex } from '../src/rag/vectorIndex';
import { StubEmbeddingProvider, createTempDir, removeDir, silenceConsole } from './common';

describe('EmbeddingClient', () => {
  silenceConsole();

  const clientFor = (provider: EmbeddingProvider, timeoutMs = 1_000) =>
    new EmbeddingClient(provider, { dimension: 2, timeoutMs });

  test('returns one vector per text in input order', async () => {
    const provider = new StubEmbeddingProvider({ dimension: 2, vectors: { x: [1, 0], y: [0, 1] } });

    expect(await clientFor(provider).embedBatch(['y', ' x '])).toEqual([
      [0, 1],
      [1, 0],
    ]);
    expect(provider.calls).toEqual([['y', 'x']]);
  });

  test('skips the provider for an empty batch', async () => {
    const provider = new StubEmbeddingProvider({ dimension: 2 });

    expect(await clientFor(provider).embedBatch([])).toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  test('refuses empty text before calling the provider', async () => {
    const provider = new StubEmbeddingProvider({ dimension: 2 });

    await expect(clientFor(provider).embedBatch(['x', '  '])).rejects.toThrow(
      new InvalidInputError('Cannot embed empty text (item 1).'),
    );
    expect(provider.calls).toEqual([]);
  });

  test('fails the whole batch when one item fails and nothing reaches the index', async () => {
    const dir = createTempDir();

    try {
      const provider = new StubEmbeddingProvider({ dimension: 2, failOn: 'y' });
      const index = new VectorIndex({ dimension: 2, filePath: path.join(dir, 'index.json') });

      const attempt = clientFor(provider).embedBatch(['x', 'y']);

      await expect(attempt).rejects.toBeInstanceOf(EmbeddingUnavailableError);
      await expect(attempt).rejects.toThrow('Embedding request failed (status 429): quota exceeded');
      expect((await index.stats()).total).toBe(0);
    } finally {
      removeDir(dir);
    }
  });

  test('rejects vectors of the wrong dimension', async () => {
    const provider = new StubEmbeddingProvider({ dimension: 2, vectors: { x: [1, 0, 0] } });

    await expect(clientFor(provider).embed('x')).rejects.toThrow(
      new EmbeddingUnavailableError('Embedding 0 has dimension 3, expected 2.'),
    );
  });

  test('rejects a response with the wrong number of vectors', async () => {
    const provider: EmbeddingProvider = { model: 'short', embedBatch: async () => [[1, 0]] };

    await expect(clientFor(provider).embedBatch(['x', 'y'])).rejects.toThrow(
      new EmbeddingUnavailableError('Embedding provider returned 1 vectors for 2 texts.'),
    );
  });

  test('times out a provider that never answers', async () => {
    const provider: EmbeddingProvider = { model: 'slow', embedBatch: () => new Promise<number[][]>(() => undefined) };

    await expect(clientFor(provider, 20).embed('x')).rejects.toThrow(
      new EmbeddingUnavailableError('Embedding request timed out after 20ms.'),
    );
  });
});

describe('OllamaEmbeddingProvider', () => {
  silenceConsole();

  const provider = () =>
    new OllamaEmbeddingProvider({
      baseUrl: 'http://localhost:11434/ignored?x=1',
      model: 'nomic-embed-text',
      batchSize: 8,
      maxAttempts: 3,
    });

  test('requests one embedding per text', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response(JSON.stringify({ embedding: [0.5, '0.25'] }), { status: 200 }));

    const vectors = await provider().embedBatch(['first', 'second']);

    expect(vectors).toEqual([
      [0.5, 0.25],
      [0.5, 0.25],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/embeddings');
    expect(fetchMock.mock.calls[1][1]?.body).toBe(JSON.stringify({ model: 'nomic-embed-text', prompt: 'second' }));
  });

  test('does not retry client errors', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response('model not found', { status: 404 }));

    await expect(provider().embedBatch(['first'])).rejects.toMatchObject({
      message: 'model not found',
      status: 404,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
