import { Router } from 'express';
import { z } from 'zod';

import { Services } from '../services';
import { SearchResponse } from '../types';
import { asyncHandler, formatIssues } from './http';

const querySchema = z.object({
  question: z.string().min(1, 'question is required'),
  candidate_id: z.string().nullish(),
  top_k: z.coerce.number().int('top_k must be an integer').optional(),
});

type QueryPayload = z.infer<typeof querySchema>;

export const createQueryRouter = ({ retriever, synthesizer, config }: Services): Router => {
  const router = Router();

  const retrieveFor = (payload: QueryPayload) =>
    retriever.retrieve(payload.question, payload.top_k ?? config.retrieval.defaultTopK, payload.candidate_id ?? undefined);

  router.post(
    '/query',
    asyncHandler(async (req, res) => {
      const validation = querySchema.safeParse(req.body);

      if (!validation.success) {
        return res.status(400).json({ errors: formatIssues(validation.error) });
      }

      const chunks = await retrieveFor(validation.data);
      const result = await synthesizer.answer(validation.data.question, chunks);

      return res.json(result);
    }),
  );

  router.post(
    '/search',
    asyncHandler(async (req, res) => {
      const validation = querySchema.safeParse(req.body);

      if (!validation.success) {
        return res.status(400).json({ errors: formatIssues(validation.error) });
      }

      const chunks = await retrieveFor(validation.data);

      const response: SearchResponse = { results: chunks, total: chunks.length };

      return res.json(response);
    }),
  );

  return router;
};
