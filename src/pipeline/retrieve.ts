import { InvalidQueryError } from '../errors';
import { EmbeddingClient } from '../rag/embeddings';
import { RetrievedChunk, SearchHit } from '../rag/schema';
import { VectorIndex } from '../rag/vectorIndex';
import { RecordStore } from '../store/records';

export type RetrieverOptions = {
  maxTopK: number;
  /** Extra hits requested from the index to make up for stale entries. */
  overfetch: number;
};

export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly index: VectorIndex,
    private readonly records: RecordStore,
    private readonly options: RetrieverOptions,
  ) {}

  async retrieve(question: string, topK: number, candidateId?: string): Promise<RetrievedChunk[]> {
    const query = question.trim();

    if (!query) {
      throw new InvalidQueryError('Question must not be empty.');
    }

    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidQueryError(`top_k must be a positive integer, received ${topK}.`);
    }

    if (candidateId !== undefined && !candidateId.trim()) {
      throw new InvalidQueryError('candidate_id must not be blank.');
    }

    const limit = Math.min(topK, this.options.maxTopK);
    const queryVector = await this.embeddings.embed(query);
    const hits = await this.index.search(queryVector, limit + this.options.overfetch, { candidateId });

    const resolved: RetrievedChunk[] = [];

    for (const hit of hits) {
      if (resolved.length >= limit) {
        break;
      }

      const chunk = await this.resolve(hit, candidateId);
      if (chunk) {
        resolved.push(chunk);
      }
    }

    return resolved;
  }

  private async resolve(hit: SearchHit, candidateId: string | undefined): Promise<RetrievedChunk | undefined> {
    const [chunk, candidate] = await Promise.all([
      this.records.getChunk(hit.chunkId),
      this.records.getCandidate(hit.candidateId),
    ]);

    if (!chunk || !candidate || chunk.candidateId !== hit.candidateId) {
      console.warn(`Skipping stale index entry ${hit.chunkId} (candidate ${hit.candidateId}).`);
      return undefined;
    }

    if (candidateId !== undefined && chunk.candidateId !== candidateId) {
      return undefined;
    }

    return {
      chunkId: hit.chunkId,
      candidateId: chunk.candidateId,
      candidateName: candidate.name,
      section: chunk.section,
      text: chunk.text,
      score: hit.score,
    };
  }
}
