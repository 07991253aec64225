import { Router } from 'express';

import { UploadJob, UploadJobStore } from '../store/jobs';
import { UploadStatus } from '../types';

export const createResultRouter = (jobs: UploadJobStore): Router => {
  const router = Router();

  router.get('/:id', (req, res) => {
    const job = jobs.getJob(req.params.id);

    if (!job) {
      return res.status(404).json({ error: { code: 'not_found', message: 'Job not found' } });
    }

    return res.json(toUploadStatus(job));
  });

  return router;
};

export const toUploadStatus = (job: UploadJob): UploadStatus => {
  switch (job.status) {
    case 'completed':
      return { id: job.id, status: job.status, candidate_id: job.candidateId, chunk_count: job.chunkCount };
    case 'failed':
      return {
        id: job.id,
        status: job.status,
        failed_step: job.failedStep,
        candidate_id: job.candidateId,
        error: job.error,
      };
    default:
      return { id: job.id, status: job.status, stage: job.stage };
  }
};
