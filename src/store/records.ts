import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { InvalidInputError, NotFoundError, describeError } from '../errors';
import { Candidate, Chunk, cvFieldsSchema } from '../rag/schema';

export type CandidateFilter = {
  /** Every listed skill must be present, compared case-insensitively. */
  skills?: string[];
  /** Minimum number of experience entries. */
  minExperience?: number;
  /** Case-insensitive substring of any experience company. */
  company?: string;
  limit?: number;
};

export const DEFAULT_FILTER_LIMIT = 50;

/**
 * Owner of candidate records and chunk text. The retrieval core only reads
 * through the lookup methods; ingestion and deletion go through the writers.
 */
export interface RecordStore {
  getCandidate(id: string): Promise<Candidate | undefined>;
  getChunk(id: string): Promise<Chunk | undefined>;
  getChunkText(id: string): Promise<string | undefined>;
  listChunkIds(candidateId?: string): Promise<string[]>;
  listCandidates(): Promise<Candidate[]>;
  filterCandidates(filter: CandidateFilter): Promise<Candidate[]>;
  createCandidate(fields: unknown, options?: { fileName?: string | null }): Promise<Candidate>;
  saveChunks(chunks: Chunk[]): Promise<void>;
  deleteCandidate(id: string): Promise<boolean>;
}

const candidateSchema = cvFieldsSchema.extend({
  id: z.string().min(1),
  fileName: z.string().nullable(),
  createdAt: z.string(),
});

const chunkSchema = z
  .object({
    id: z.string().min(1),
    candidateId: z.string().min(1),
    section: z.string().min(1),
    text: z.string().min(1),
    position: z.number().int().nonnegative(),
  })
  .strict();

const storeFileSchema = z.object({
  candidates: z.array(candidateSchema),
  chunks: z.array(chunkSchema),
});

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'fields'}: ${issue.message}`).join('; ');

export type JsonRecordStoreOptions = {
  /** Directory for `records.json`; records stay in memory only when omitted. */
  dataDir?: string;
};

export class JsonRecordStore implements RecordStore {
  private readonly candidatesById = new Map<string, Candidate>();

  private readonly chunksById = new Map<string, Chunk>();

  private readonly storePath: string | null;

  constructor({ dataDir }: JsonRecordStoreOptions = {}) {
    this.storePath = dataDir ? path.join(dataDir, 'records.json') : null;
    this.loadStoreFromDisk();
  }

  private loadStoreFromDisk(): void {
    if (!this.storePath || !fs.existsSync(this.storePath)) {
      return;
    }

    const raw = fs.readFileSync(this.storePath, 'utf-8');
    if (!raw.trim()) {
      return;
    }

    let json: unknown;

    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Record store ${this.storePath} is malformed: ${describeError(error)}`);
    }

    const validation = storeFileSchema.safeParse(json);

    if (!validation.success) {
      throw new Error(`Record store ${this.storePath} is malformed: ${formatIssues(validation.error)}`);
    }

    validation.data.candidates.forEach((candidate) => this.candidatesById.set(candidate.id, candidate));
    validation.data.chunks.forEach((chunk) => this.chunksById.set(chunk.id, chunk));
  }

  private persistStore(): void {
    if (!this.storePath) {
      return;
    }

    fs.mkdirSync(path.dirname(this.storePath), { recursive: true });

    const payload = JSON.stringify(
      {
        candidates: Array.from(this.candidatesById.values()),
        chunks: Array.from(this.chunksById.values()),
      },
      null,
      2,
    );
    const tempPath = `${this.storePath}.tmp`;

    fs.writeFileSync(tempPath, payload);
    fs.renameSync(tempPath, this.storePath);
  }

  async getCandidate(id: string): Promise<Candidate | undefined> {
    return this.candidatesById.get(id);
  }

  async getChunk(id: string): Promise<Chunk | undefined> {
    return this.chunksById.get(id);
  }

  async getChunkText(id: string): Promise<string | undefined> {
    return this.chunksById.get(id)?.text;
  }

  async listChunkIds(candidateId?: string): Promise<string[]> {
    return Array.from(this.chunksById.values())
      .filter((chunk) => candidateId === undefined || chunk.candidateId === candidateId)
      .map((chunk) => chunk.id);
  }

  async listCandidates(): Promise<Candidate[]> {
    return Array.from(this.candidatesById.values()).sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async filterCandidates({
    skills = [],
    minExperience,
    company,
    limit = DEFAULT_FILTER_LIMIT,
  }: CandidateFilter): Promise<Candidate[]> {
    const wantedSkills = skills.map((skill) => skill.trim().toLowerCase()).filter(Boolean);
    const wantedCompany = company?.trim().toLowerCase();

    const matches = (await this.listCandidates()).filter((candidate) => {
      const owned = new Set(candidate.skills.map((skill) => skill.toLowerCase()));

      if (!wantedSkills.every((skill) => owned.has(skill))) {
        return false;
      }

      if (minExperience !== undefined && candidate.experience.length < minExperience) {
        return false;
      }

      return (
        !wantedCompany ||
        candidate.experience.some((entry) => (entry.company ?? '').toLowerCase().includes(wantedCompany))
      );
    });

    return matches.slice(0, limit);
  }

  async createCandidate(fields: unknown, { fileName = null }: { fileName?: string | null } = {}): Promise<Candidate> {
    const validation = cvFieldsSchema.safeParse(fields);

    if (!validation.success) {
      throw new InvalidInputError(`Unrecognized CV fields: ${formatIssues(validation.error)}`);
    }

    const candidate: Candidate = {
      ...validation.data,
      id: uuidv4(),
      fileName,
      createdAt: new Date().toISOString(),
    };

    this.candidatesById.set(candidate.id, candidate);
    this.persistStore();

    return candidate;
  }

  async saveChunks(chunks: Chunk[]): Promise<void> {
    const incoming = new Set<string>();

    for (const chunk of chunks) {
      const validation = chunkSchema.safeParse(chunk);
      if (!validation.success) {
        throw new InvalidInputError(`Invalid chunk "${chunk.id}": ${formatIssues(validation.error)}`);
      }

      if (!this.candidatesById.has(chunk.candidateId)) {
        throw new NotFoundError(`Candidate ${chunk.candidateId} not found.`);
      }

      if (incoming.has(chunk.id) || this.chunksById.has(chunk.id)) {
        throw new InvalidInputError(`Chunk "${chunk.id}" already exists.`);
      }
      incoming.add(chunk.id);
    }

    chunks.forEach((chunk) => this.chunksById.set(chunk.id, { ...chunk }));
    this.persistStore();
  }

  async deleteCandidate(id: string): Promise<boolean> {
    if (!this.candidatesById.delete(id)) {
      return false;
    }

    for (const chunk of Array.from(this.chunksById.values())) {
      if (chunk.candidateId === id) {
        this.chunksById.delete(chunk.id);
      }
    }

    this.persistStore();
    return true;
  }
}
