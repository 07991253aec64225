import { AppConfig } from './config';
import { LlmClient, OpenAiLlmClient } from './llm/client';
import { IndexingOrchestrator } from './pipeline/indexing';
import { Retriever } from './pipeline/retrieve';
import { AnswerSynthesizer } from './pipeline/synthesize';
import { EmbeddingClient, EmbeddingProvider, OllamaEmbeddingProvider, OpenAiEmbeddingProvider } from './rag/embeddings';
import { VectorIndex } from './rag/vectorIndex';
import { UploadJobStore } from './store/jobs';
import { JsonRecordStore, RecordStore } from './store/records';

export type Services = {
  config: AppConfig;
  records: RecordStore;
  jobs: UploadJobStore;
  index: VectorIndex;
  embeddings: EmbeddingClient;
  llm: LlmClient;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  orchestrator: IndexingOrchestrator;
};

export type ServiceOverrides = {
  embeddingProvider?: EmbeddingProvider;
  llm?: LlmClient;
  records?: RecordStore;
};

export const buildEmbeddingProvider = ({ embedding, llm }: AppConfig): EmbeddingProvider => {
  if (embedding.provider === 'ollama') {
    return new OllamaEmbeddingProvider({
      baseUrl: embedding.ollamaUrl,
      model: embedding.model,
      batchSize: embedding.batchSize,
      maxAttempts: embedding.maxAttempts,
    });
  }

  return new OpenAiEmbeddingProvider({
    apiKey: llm.apiKey,
    model: embedding.model,
    batchSize: embedding.batchSize,
    maxAttempts: embedding.maxAttempts,
  });
};

/**
 * Wires one vector index, loaded from disk, into every component that needs
 * it. Nothing here is a module-level singleton.
 */
export const createServices = async (config: AppConfig, overrides: ServiceOverrides = {}): Promise<Services> => {
  const records = overrides.records ?? new JsonRecordStore({ dataDir: config.dataDir });
  const jobs = new UploadJobStore({ dataDir: config.dataDir });
  const index = await VectorIndex.open({ dimension: config.embedding.dimension, filePath: config.indexPath });
  const embeddings = new EmbeddingClient(overrides.embeddingProvider ?? buildEmbeddingProvider(config), {
    dimension: config.embedding.dimension,
    timeoutMs: config.embedding.timeoutMs,
  });
  const llm =
    overrides.llm ??
    new OpenAiLlmClient({
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      maxAttempts: config.llm.maxAttempts,
    });

  return {
    config,
    records,
    jobs,
    index,
    embeddings,
    llm,
    retriever: new Retriever(embeddings, index, records, config.retrieval),
    synthesizer: new AnswerSynthesizer(llm, {
      maxContextChars: config.answer.maxContextChars,
      highThreshold: config.answer.highThreshold,
      lowThreshold: config.answer.lowThreshold,
      strategy: config.answer.strategy,
      timeoutMs: config.llm.timeoutMs,
    }),
    orchestrator: new IndexingOrchestrator(records, embeddings, index, { maxChunkChars: config.chunking.maxChars }),
  };
};
