type BackoffOptions = {
  label?: string;
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Stops further attempts once aborted; a pending delay ends early. */
  signal?: AbortSignal;
};

const wait = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };
    const timer = setTimeout(finish, signal?.aborted ? 0 : ms);
    signal?.addEventListener('abort', finish, { once: true });
  });

export const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

// Client errors other than rate limiting will not improve on retry.
export const isRetryableError = (error: unknown): boolean => {
  const status = getStatus(error);

  return !(typeof status === 'number' && status >= 400 && status < 500 && status !== 429);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const {
    label = 'Request',
    maxAttempts = 5,
    initialDelayMs = 500,
    maxDelayMs = 30_000,
    factor = 2,
    jitter = true,
    onRetry,
    shouldRetry = isRetryableError,
    signal,
  } = options;

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      const exponentialDelay = initialDelayMs * factor ** (attempt - 1);
      const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
      const delay = jitter
        ? Math.round(cappedDelay / 2 + Math.random() * (cappedDelay / 2))
        : Math.round(cappedDelay);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          console.warn(`${label} retry hook threw an error.`, hookError);
        }
      } else {
        console.warn(`${label} attempt ${attempt} failed. Retrying in ${delay}ms.`);
      }

      await wait(delay, signal);

      if (signal?.aborted) {
        throw new Error(`${label} aborted after ${attempt} attempts.`, { cause: error });
      }
    }
  }
};

export type { BackoffOptions };
