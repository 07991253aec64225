import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import {
  DimensionMismatchError,
  DuplicateChunkError,
  IndexCorruptionError,
  InvalidInputError,
  InvalidQueryError,
  describeError,
} from '../errors';
import { ReadWriteLock } from '../util/lock';
import { ChunkMetadata, EmbeddingRecord, SearchHit } from './schema';
import { clampScore, dotProduct, isFiniteVector, normalize } from './vector';

const FORMAT_VERSION = 1;

const persistedIndexSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  dimension: z.number().int().positive(),
  nextSequence: z.number().int().nonnegative(),
  records: z.array(
    z
      .object({
        chunkId: z.string().min(1),
        candidateId: z.string().min(1),
        section: z.string(),
        vector: z.array(z.number()),
        softDeleted: z.boolean(),
        sequence: z.number().int().nonnegative(),
      })
      .strict(),
  ),
});

type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export type VectorIndexOptions = {
  dimension: number;
  filePath: string;
};

export type IndexEntry = {
  chunkId: string;
  vector: readonly number[];
  metadata: ChunkMetadata;
};

export type SearchFilter = {
  candidateId?: string;
};

export type IndexStats = {
  dimension: number;
  total: number;
  live: number;
  deleted: number;
};

type IndexState = {
  records: EmbeddingRecord[];
  byChunkId: Map<string, EmbeddingRecord>;
  nextSequence: number;
};

const emptyState = (): IndexState => ({ records: [], byChunkId: new Map(), nextSequence: 0 });

const errorCode = (error: unknown): string | undefined =>
  error && typeof error === 'object' && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

/**
 * Flat (exhaustive) cosine index over chunk embeddings. Removal only flags a
 * record; the vector stays in memory and in the persisted file until
 * {@link VectorIndex.compact} runs.
 */
export class VectorIndex {
  readonly dimension: number;

  readonly filePath: string;

  private state: IndexState = emptyState();

  private readonly lock = new ReadWriteLock();

  constructor({ dimension, filePath }: VectorIndexOptions) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`Invalid index dimension: ${dimension}`);
    }

    this.dimension = dimension;
    this.filePath = filePath;
  }

  static async open(options: VectorIndexOptions): Promise<VectorIndex> {
    const index = new VectorIndex(options);
    await index.load();
    return index;
  }

  add(chunkId: string, vector: readonly number[], metadata: ChunkMetadata): Promise<void> {
    return this.addBatch([{ chunkId, vector, metadata }]);
  }

  /**
   * Adds every entry or none: all entries are validated before the first
   * record is appended.
   */
  addBatch(entries: readonly IndexEntry[]): Promise<void> {
    return this.lock.write(() => {
      const prepared = this.prepare(entries);

      for (const record of prepared) {
        this.state.records.push(record);
        this.state.byChunkId.set(record.chunkId, record);
      }

      this.state.nextSequence += prepared.length;
    });
  }

  search(queryVector: readonly number[], k: number, filter: SearchFilter = {}): Promise<SearchHit[]> {
    if (!Number.isInteger(k) || k < 1) {
      return Promise.reject(new InvalidQueryError(`k must be a positive integer, received ${k}.`));
    }

    if (queryVector.length !== this.dimension) {
      return Promise.reject(new DimensionMismatchError(this.dimension, queryVector.length));
    }

    const query = isFiniteVector(queryVector) ? normalize(queryVector) : undefined;

    if (!query) {
      return Promise.reject(new InvalidQueryError('Query vector must be finite and non-zero.'));
    }

    return this.lock.read(() => {
      const scored: Array<{ record: EmbeddingRecord; similarity: number }> = [];

      for (const record of this.state.records) {
        if (record.softDeleted) {
          continue;
        }

        if (filter.candidateId !== undefined && record.candidateId !== filter.candidateId) {
          continue;
        }

        scored.push({ record, similarity: dotProduct(query, record.vector) });
      }

      scored.sort((a, b) => b.similarity - a.similarity || a.record.sequence - b.record.sequence);

      return scored.slice(0, k).map<SearchHit>(({ record, similarity }) => ({
        chunkId: record.chunkId,
        candidateId: record.candidateId,
        section: record.section,
        score: clampScore(similarity),
      }));
    });
  }

  /**
   * Flags the record as deleted. Returns false when the id is unknown or was
   * already removed.
   */
  remove(chunkId: string): Promise<boolean> {
    return this.lock.write(() => {
      const record = this.state.byChunkId.get(chunkId);

      if (!record || record.softDeleted) {
        return false;
      }

      record.softDeleted = true;
      return true;
    });
  }

  listChunkIds(candidateId: string): Promise<string[]> {
    return this.lock.read(() =>
      this.state.records
        .filter((record) => !record.softDeleted && record.candidateId === candidateId)
        .map((record) => record.chunkId),
    );
  }

  stats(): Promise<IndexStats> {
    return this.lock.read(() => {
      const deleted = this.state.records.filter((record) => record.softDeleted).length;

      return {
        dimension: this.dimension,
        total: this.state.records.length,
        live: this.state.records.length - deleted,
        deleted,
      };
    });
  }

  persist(): Promise<void> {
    return this.lock.write(async () => {
      const payload: PersistedIndex = {
        version: FORMAT_VERSION,
        dimension: this.dimension,
        nextSequence: this.state.nextSequence,
        records: this.state.records.map((record) => ({
          chunkId: record.chunkId,
          candidateId: record.candidateId,
          section: record.section,
          vector: record.vector,
          softDeleted: record.softDeleted,
          sequence: record.sequence,
        })),
      };

      await fs.mkdir(path.dirname(this.filePath), { recursive: true });

      const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

      try {
        await fs.writeFile(tempPath, JSON.stringify(payload));
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          console.warn(`Failed to remove temporary index file ${tempPath}: ${describeError(cleanupError)}`);
        });
        throw error;
      }
    });
  }

  /**
   * Replaces the in-memory state with the persisted file. A missing file
   * yields an empty index; an unreadable one leaves the current state intact.
   */
  load(): Promise<void> {
    return this.lock.write(async () => {
      let raw: string;

      try {
        raw = await fs.readFile(this.filePath, 'utf-8');
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          this.state = emptyState();
          console.log(`No vector index at ${this.filePath}; starting empty.`);
          return;
        }
        throw error;
      }

      this.state = this.restore(raw);
      console.log(`Loaded vector index from ${this.filePath} (${this.state.records.length} records).`);
    });
  }

  /**
   * Drops soft-deleted records for good. Sequence numbers are kept so tie
   * order is unchanged. Returns the number of records dropped.
   */
  compact(): Promise<number> {
    return this.lock.write(() => {
      const live = this.state.records.filter((record) => !record.softDeleted);
      const dropped = this.state.records.length - live.length;

      this.state = {
        records: live,
        byChunkId: new Map(live.map((record) => [record.chunkId, record])),
        nextSequence: this.state.nextSequence,
      };

      return dropped;
    });
  }

  private prepare(entries: readonly IndexEntry[]): EmbeddingRecord[] {
    const seen = new Set<string>();

    return entries.map<EmbeddingRecord>(({ chunkId, vector, metadata }, offset) => {
      if (!chunkId) {
        throw new InvalidInputError('Chunk id must not be empty.');
      }

      if (seen.has(chunkId) || this.state.byChunkId.has(chunkId)) {
        throw new DuplicateChunkError(chunkId);
      }
      seen.add(chunkId);

      if (!metadata.candidateId) {
        throw new InvalidInputError(`Chunk "${chunkId}" has no candidate id.`);
      }

      if (vector.length !== this.dimension) {
        throw new DimensionMismatchError(this.dimension, vector.length);
      }

      const normalized = isFiniteVector(vector) ? normalize(vector) : undefined;

      if (!normalized) {
        throw new InvalidInputError(`Vector for chunk "${chunkId}" must be finite and non-zero.`);
      }

      return {
        chunkId,
        candidateId: metadata.candidateId,
        section: metadata.section,
        vector: normalized,
        softDeleted: false,
        sequence: this.state.nextSequence + offset,
      };
    });
  }

  private restore(raw: string): IndexState {
    let json: unknown;

    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new IndexCorruptionError(`Vector index file ${this.filePath} is not valid JSON.`, error);
    }

    const validation = persistedIndexSchema.safeParse(json);

    if (!validation.success) {
      throw new IndexCorruptionError(
        `Vector index file ${this.filePath} is malformed: ${validation.error.issues[0]?.message ?? 'unknown issue'}`,
        validation.error,
      );
    }

    const persisted = validation.data;

    if (persisted.dimension !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, persisted.dimension);
    }

    const state = emptyState();
    state.nextSequence = persisted.nextSequence;

    for (const record of persisted.records) {
      if (record.vector.length !== this.dimension) {
        throw new IndexCorruptionError(`Record "${record.chunkId}" has ${record.vector.length} components.`);
      }

      if (state.byChunkId.has(record.chunkId)) {
        throw new IndexCorruptionError(`Record "${record.chunkId}" appears more than once.`);
      }

      if (record.sequence >= persisted.nextSequence) {
        throw new IndexCorruptionError(`Record "${record.chunkId}" has sequence beyond the index counter.`);
      }

      state.records.push(record);
      state.byChunkId.set(record.chunkId, record);
    }

    return state;
  }
}
