import { IngestStage, IngestStep } from './pipeline/indexing';
import { RetrievedChunk } from './rag/schema';
import { JobStatus } from './store/jobs';

export interface UploadAccepted {
  id: string;
  status: Extract<JobStatus, 'queued'>;
}

export interface ProcessingStatus {
  id: string;
  status: Extract<JobStatus, 'queued' | 'processing'>;
  stage?: IngestStage | 'extracting';
}

export interface CompletedStatus {
  id: string;
  status: Extract<JobStatus, 'completed'>;
  candidate_id?: string;
  chunk_count?: number;
}

export interface FailedStatus {
  id: string;
  status: Extract<JobStatus, 'failed'>;
  failed_step?: IngestStep | 'extract';
  candidate_id?: string;
  error?: string;
}

export type UploadStatus = ProcessingStatus | CompletedStatus | FailedStatus;

export interface SearchResponse {
  results: RetrievedChunk[];
  total: number;
}

export interface CandidateSummary {
  id: string;
  name: string;
  email: string | null;
  skills: string[];
  createdAt: string;
}

export interface FilterResponse {
  filters: {
    skills?: string[];
    min_experience_years?: number;
    company?: string;
    limit: number;
  };
  results: CandidateSummary[];
  total: number;
}

export interface DeleteResponse {
  message: string;
  candidate_id: string;
  removed_chunks: number;
}
