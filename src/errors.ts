type AppErrorOptions = {
  code: string;
  status: number;
  cause?: unknown;
};

export class AppError extends Error {
  readonly code: string;

  readonly status: number;

  constructor(message: string, { code, status, cause }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, code = 'invalid_input') {
    super(message, { code, status: 400 });
  }
}

export class InvalidQueryError extends InvalidInputError {
  constructor(message: string) {
    super(message, 'invalid_query');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, { code: 'not_found', status: 404 });
  }
}

export class DuplicateChunkError extends AppError {
  constructor(chunkId: string) {
    super(`Chunk "${chunkId}" is already indexed.`, { code: 'duplicate_chunk', status: 409 });
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(message: string, code = 'upstream_unavailable', cause?: unknown) {
    super(message, { code, status: 503, cause });
  }
}

export class EmbeddingUnavailableError extends UpstreamUnavailableError {
  constructor(message: string, cause?: unknown) {
    super(message, 'embedding_unavailable', cause);
  }
}

export class AnswerUnavailableError extends UpstreamUnavailableError {
  constructor(message: string, cause?: unknown) {
    super(message, 'answer_unavailable', cause);
  }
}

export class DimensionMismatchError extends AppError {
  constructor(expected: number, actual: number) {
    super(`Vector dimension ${actual} does not match index dimension ${expected}.`, {
      code: 'dimension_mismatch',
      status: 500,
    });
  }
}

export class IndexCorruptionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'index_corruption', status: 500, cause });
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
