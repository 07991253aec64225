import express, { Express } from 'express';

import { createCandidatesRouter } from './routes/candidates';
import { errorHandler } from './routes/http';
import { createQueryRouter } from './routes/query';
import { createResultRouter } from './routes/result';
import { createUploadRouter } from './routes/upload';
import { Services } from './services';

export const createApp = (services: Services): Express => {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/upload', createUploadRouter(services));
  app.use('/result', createResultRouter(services.jobs));
  app.use('/candidates', createCandidatesRouter(services));
  app.use('/', createQueryRouter(services));

  app.get('/health', (_req, res, next) => {
    services.index
      .stats()
      .then((stats) => res.json({ status: 'ok', index: stats }))
      .catch(next);
  });

  app.use(errorHandler);

  return app;
};
