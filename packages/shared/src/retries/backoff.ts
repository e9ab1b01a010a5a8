export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 30_000,
  jitterRatio: 0.2
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));

  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random
  } = options;

  const rawDelay = baseMs * Math.pow(factor, normalizedAttempt - 1);
  const cappedDelay = clamp(rawDelay, baseMs, maxMs);

  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const randomFn = typeof random === 'function' ? random : Math.random;
  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (randomFn() * 2 - 1) * jitterSpan;
  const jittered = clamp(cappedDelay + jitter, baseMs, maxMs);

  return Math.round(jittered);
}

export type RetryOptions = BackoffOptions & {
  attempts: number;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` up to `attempts` times, waiting an exponential backoff between failures.
 * The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = options.shouldRetry ? options.shouldRetry(err, attempt) : true;
      if (attempt >= attempts || !retryable) {
        throw err;
      }
      const delayMs = computeExponentialBackoff(attempt, options);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
