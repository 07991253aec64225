import { InvalidInputError, describeError } from '../errors';
import { Services } from '../services';
import { extractText } from './extractText';
import { parseCv } from './parseCv';

export type UploadedFile = {
  filePath: string;
  fileName: string;
  candidateName?: string;
};

/**
 * Runs one upload job to completion: extract text, extract fields, ingest.
 * Every outcome is written to the job store; nothing is thrown.
 */
export const processUpload = async (
  { jobs, llm, orchestrator, config }: Pick<Services, 'jobs' | 'llm' | 'orchestrator' | 'config'>,
  jobId: string,
  { filePath, fileName, candidateName }: UploadedFile,
): Promise<void> => {
  jobs.updateJob(jobId, { status: 'processing', stage: 'extracting' });

  let fields: Record<string, unknown>;

  try {
    const { text } = await extractText(filePath, fileName);

    if (!text) {
      throw new InvalidInputError(`Could not extract text from ${fileName}.`);
    }

    fields = await parseCv(llm, text, { timeoutMs: config.llm.timeoutMs, nameOverride: candidateName });
  } catch (error) {
    console.error(`Upload job ${jobId} failed during extraction: ${describeError(error)}`);
    jobs.updateJob(jobId, { status: 'failed', failedStep: 'extract', error: describeError(error) });
    return;
  }

  const outcome = await orchestrator.ingest({ fields, fileName }, (stage, candidateId) => {
    jobs.updateJob(jobId, { stage, candidateId });
  });

  if (outcome.state === 'indexed') {
    jobs.updateJob(jobId, {
      status: 'completed',
      candidateId: outcome.candidateId,
      chunkCount: outcome.chunkCount,
    });
    return;
  }

  jobs.updateJob(jobId, {
    status: 'failed',
    failedStep: outcome.stage,
    candidateId: outcome.candidateId,
    error: outcome.error.message,
  });
};
