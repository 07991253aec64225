import { Router } from 'express';
import { z } from 'zod';

import { NotFoundError } from '../errors';
import { Candidate } from '../rag/schema';
import { Services } from '../services';
import { DEFAULT_FILTER_LIMIT } from '../store/records';
import { CandidateSummary, DeleteResponse, FilterResponse } from '../types';
import { asyncHandler, formatIssues } from './http';

const filterSchema = z.object({
  skills: z.array(z.string()).optional(),
  min_experience_years: z.coerce.number().int().nonnegative().optional(),
  company: z.string().optional(),
  limit: z.coerce.number().int().positive().default(DEFAULT_FILTER_LIMIT),
});

const summarize = ({ id, name, email, skills, createdAt }: Candidate): CandidateSummary => ({
  id,
  name,
  email,
  skills,
  createdAt,
});

export const createCandidatesRouter = ({ records, index, orchestrator }: Services): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const candidates = await records.listCandidates();

      const summaries = candidates.map(summarize);

      return res.json({ candidates: summaries, total: summaries.length });
    }),
  );

  router.post(
    '/filter',
    asyncHandler(async (req, res) => {
      const validation = filterSchema.safeParse(req.body ?? {});

      if (!validation.success) {
        return res.status(400).json({ errors: formatIssues(validation.error) });
      }

      const filters = validation.data;
      const matches = await records.filterCandidates({
        skills: filters.skills,
        minExperience: filters.min_experience_years,
        company: filters.company,
        limit: filters.limit,
      });

      const response: FilterResponse = { filters, results: matches.map(summarize), total: matches.length };

      return res.json(response);
    }),
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const candidate = await records.getCandidate(req.params.id);

      if (!candidate) {
        throw new NotFoundError(`Candidate ${req.params.id} not found.`);
      }

      const [chunkIds, indexedIds] = await Promise.all([
        records.listChunkIds(candidate.id),
        index.listChunkIds(candidate.id),
      ]);
      const indexedChunks = await Promise.all(indexedIds.map((chunkId) => records.getChunk(chunkId)));
      const indexedSections = Array.from(
        new Set(indexedChunks.flatMap((chunk) => (chunk ? [chunk.section] : []))),
      );

      return res.json({ candidate, chunk_count: chunkIds.length, indexed_sections: indexedSections });
    }),
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const outcome = await orchestrator.delete(req.params.id);

      const response: DeleteResponse = {
        message: 'Candidate deleted',
        candidate_id: outcome.candidateId,
        removed_chunks: outcome.removedChunkIds.length,
      };

      return res.json(response);
    }),
  );

  return router;
};
