import { logger } from "./logger";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 10000,
    jitterMs: 500,
  },
  context?: string,
  wait: Sleep = sleep,
  random: () => number = Math.random
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterMs } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts) break;

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const jitter = random() * jitterMs;
      const totalDelay = delay + jitter;

      logger.debug({ attempt, delay: totalDelay, context }, "Retrying after error");
      await wait(totalDelay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
