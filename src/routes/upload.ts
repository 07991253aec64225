import { Router } from 'express';
import multer from 'multer';
import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { describeError } from '../errors';
import { isSupportedFile } from '../pipeline/extractText';
import { processUpload } from '../pipeline/upload';
import { Services } from '../services';
import { UploadAccepted } from '../types';

export const createUploadRouter = (services: Services): Router => {
  const router = Router();

  const filesDir = path.join(services.config.dataDir, 'files');
  fs.mkdirSync(filesDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, filesDir);
    },
    filename: (_req, file, cb) => {
      cb(null, `${uuidv4()}-${path.basename(file.originalname)}`);
    },
  });

  const upload = multer({
    storage,
    fileFilter: (_req, file, cb) => {
      cb(null, isSupportedFile(file.originalname));
    },
  });

  router.post('/', upload.single('file'), (req, res) => {
    const file = req.file;

    if (!file) {
      return res.status(400).json({ error: { code: 'invalid_upload', message: 'A PDF or TXT file is required.' } });
    }

    const candidateName = typeof req.body?.candidate_name === 'string' ? req.body.candidate_name : undefined;
    const job = services.jobs.createJob(file.originalname);

    setImmediate(() => {
      processUpload(services, job.id, {
        filePath: path.resolve(file.path),
        fileName: file.originalname,
        candidateName,
      }).catch((error: unknown) => {
        console.error(`Upload job ${job.id} crashed: ${describeError(error)}`);
        services.jobs.updateJob(job.id, { status: 'failed', error: describeError(error) });
      });
    });

    const accepted: UploadAccepted = { id: job.id, status: 'queued' };

    return res.status(202).json(accepted);
  });

  return router;
};
