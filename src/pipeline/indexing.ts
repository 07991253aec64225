import { NotFoundError, describeError } from '../errors';
import { chunkCandidate } from '../rag/chunker';
import { EmbeddingClient } from '../rag/embeddings';
import { Chunk } from '../rag/schema';
import { VectorIndex } from '../rag/vectorIndex';
import { RecordStore } from '../store/records';
import { ReadWriteLock } from '../util/lock';

/** States an upload passes through on success, in order. */
export type IngestStage = 'parsed' | 'chunked' | 'embedded' | 'indexed';

/** The step that was running when an upload failed. */
export type IngestStep = 'parse' | 'chunk' | 'embed' | 'index';

export type IngestInput = {
  fields: unknown;
  fileName?: string | null;
};

export type IngestOutcome =
  | { state: 'indexed'; candidateId: string; chunkCount: number; persisted: boolean }
  | { state: 'failed'; stage: IngestStep; candidateId?: string; error: Error };

export type StageObserver = (stage: IngestStage, candidateId: string) => void;

export type DeleteOutcome = {
  candidateId: string;
  removedChunkIds: string[];
};

const asError = (error: unknown): Error => (error instanceof Error ? error : new Error(describeError(error)));

/**
 * Keeps the record store and the vector index in step. Chunks are stored
 * before they are embedded, so a failure past that point leaves a candidate
 * that can be fetched by id but not found by search; it is logged and the
 * upload must be resubmitted in full.
 */
export class IndexingOrchestrator {
  // Held by delete and by the index step of ingest, so a candidate cannot be
  // deleted between the existence check and its chunks reaching the index.
  private readonly commitLock = new ReadWriteLock();

  constructor(
    private readonly records: RecordStore,
    private readonly embeddings: EmbeddingClient,
    private readonly index: VectorIndex,
    private readonly options: { maxChunkChars: number },
  ) {}

  async ingest({ fields, fileName = null }: IngestInput, onStage?: StageObserver): Promise<IngestOutcome> {
    let candidateId: string;
    let chunks: Chunk[];
    let vectors: number[][];

    try {
      const candidate = await this.records.createCandidate(fields, { fileName });
      candidateId = candidate.id;
      onStage?.('parsed', candidateId);

      chunks = chunkCandidate(candidateId, candidate, { maxChars: this.options.maxChunkChars });
    } catch (error) {
      console.error(`Ingestion failed while parsing fields: ${describeError(error)}`);
      return { state: 'failed', stage: 'parse', error: asError(error) };
    }

    try {
      await this.records.saveChunks(chunks);
      onStage?.('chunked', candidateId);
    } catch (error) {
      console.error(`Ingestion of candidate ${candidateId} failed while storing chunks: ${describeError(error)}`);
      return { state: 'failed', stage: 'chunk', candidateId, error: asError(error) };
    }

    try {
      vectors = await this.embeddings.embedBatch(chunks.map((chunk) => chunk.text));
      onStage?.('embedded', candidateId);
    } catch (error) {
      this.logDegraded(candidateId, chunks.length, error);
      return { state: 'failed', stage: 'embed', candidateId, error: asError(error) };
    }

    const committed = await this.commitLock.write(async (): Promise<{ persisted: boolean } | { error: Error }> => {
      try {
        if (!(await this.records.getCandidate(candidateId))) {
          throw new NotFoundError(`Candidate ${candidateId} was deleted before its chunks were indexed.`);
        }

        await this.index.addBatch(
          chunks.map((chunk, position) => ({
            chunkId: chunk.id,
            vector: vectors[position],
            metadata: { candidateId: chunk.candidateId, section: chunk.section },
          })),
        );
      } catch (error) {
        this.logDegraded(candidateId, chunks.length, error);
        return { error: asError(error) };
      }

      try {
        await this.index.persist();
        return { persisted: true };
      } catch (error) {
        console.error(
          `Candidate ${candidateId} is indexed in memory but the index was not persisted: ${describeError(error)}`,
        );
        return { persisted: false };
      }
    });

    if ('error' in committed) {
      return { state: 'failed', stage: 'index', candidateId, error: committed.error };
    }

    const { persisted } = committed;

    onStage?.('indexed', candidateId);
    console.log(`Indexed candidate ${candidateId} with ${chunks.length} chunks.`);

    return { state: 'indexed', candidateId, chunkCount: chunks.length, persisted };
  }

  /**
   * Soft-removes every chunk of the candidate from the index, persists the
   * index, then drops the candidate and its chunks from the record store.
   */
  delete(candidateId: string): Promise<DeleteOutcome> {
    return this.commitLock.write(() => this.deleteCommitted(candidateId));
  }

  private async deleteCommitted(candidateId: string): Promise<DeleteOutcome> {
    const [candidate, storedIds, indexedIds] = await Promise.all([
      this.records.getCandidate(candidateId),
      this.records.listChunkIds(candidateId),
      this.index.listChunkIds(candidateId),
    ]);

    if (!candidate && !storedIds.length && !indexedIds.length) {
      throw new NotFoundError(`Candidate ${candidateId} not found.`);
    }

    const chunkIds = Array.from(new Set([...storedIds, ...indexedIds]));
    let removed = 0;

    for (const chunkId of chunkIds) {
      if (await this.index.remove(chunkId)) {
        removed += 1;
      }
    }

    if (removed > 0) {
      await this.index.persist();
    }

    await this.records.deleteCandidate(candidateId);
    console.log(`Deleted candidate ${candidateId} (${chunkIds.length} chunks, ${removed} index records removed).`);

    return { candidateId, removedChunkIds: chunkIds };
  }

  private logDegraded(candidateId: string, chunkCount: number, error: unknown): void {
    console.error(
      `Candidate ${candidateId} has ${chunkCount} stored chunks that are not searchable: ${describeError(error)}`,
    );
  }
}
