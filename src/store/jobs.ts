import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { describeError } from '../errors';
import { IngestStage, IngestStep } from '../pipeline/indexing';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export type UploadJob = {
  id: string;
  status: JobStatus;
  fileName: string;
  stage?: IngestStage | 'extracting';
  failedStep?: IngestStep | 'extract';
  candidateId?: string;
  chunkCount?: number;
  error?: string;
  updatedAt: string;
};

/**
 * Upload job ledger, kept in `jobs.json` under the data directory so that
 * `/result/:id` survives a restart.
 */
export class UploadJobStore {
  private readonly jobsById = new Map<string, UploadJob>();

  private readonly storePath: string | null;

  constructor({ dataDir }: { dataDir?: string } = {}) {
    this.storePath = dataDir ? path.join(dataDir, 'jobs.json') : null;
    this.loadStoreFromDisk();
  }

  private loadStoreFromDisk(): void {
    if (!this.storePath || !fs.existsSync(this.storePath)) {
      return;
    }

    try {
      const raw = fs.readFileSync(this.storePath, 'utf-8');
      if (!raw.trim()) {
        return;
      }

      const parsed: unknown = JSON.parse(raw);
      const entries: unknown[] = Array.isArray(parsed) ? parsed : [];

      entries.forEach((entry) => {
        if (isUploadJob(entry)) {
          this.jobsById.set(entry.id, entry);
        }
      });
    } catch (error) {
      console.error(`Failed to load job store from disk: ${describeError(error)}`);
    }
  }

  private persistStore(): void {
    if (!this.storePath) {
      return;
    }

    try {
      fs.mkdirSync(path.dirname(this.storePath), { recursive: true });
      fs.writeFileSync(this.storePath, JSON.stringify(Array.from(this.jobsById.values()), null, 2));
    } catch (error) {
      console.error(`Failed to persist job store: ${describeError(error)}`);
    }
  }

  createJob(fileName: string): UploadJob {
    const job: UploadJob = {
      id: uuidv4(),
      status: 'queued',
      fileName,
      updatedAt: new Date().toISOString(),
    };

    this.jobsById.set(job.id, job);
    this.persistStore();

    return job;
  }

  updateJob(id: string, patch: Partial<Omit<UploadJob, 'id'>>): UploadJob | undefined {
    const existing = this.jobsById.get(id);
    if (!existing) {
      return undefined;
    }

    const updated: UploadJob = {
      ...existing,
      ...patch,
      updatedAt: new Date().toISOString(),
    };

    this.jobsById.set(id, updated);
    this.persistStore();

    return updated;
  }

  getJob(id: string): UploadJob | undefined {
    return this.jobsById.get(id);
  }
}

const JOB_STATUSES: readonly string[] = ['queued', 'processing', 'completed', 'failed'];

const isUploadJob = (value: unknown): value is UploadJob =>
  Boolean(value) &&
  typeof value === 'object' &&
  value !== null &&
  'id' in value &&
  typeof value.id === 'string' &&
  'status' in value &&
  typeof value.status === 'string' &&
  JOB_STATUSES.includes(value.status) &&
  'fileName' in value &&
  typeof value.fileName === 'string';
