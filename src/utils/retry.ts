import { delay } from './delay';
import { logger } from './logger';

export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  maxRetries: number = 2,
  retryDelayMs: number = 5000
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries) {
        logger.warn(`${label} failed (attempt ${attempt + 1}/${maxRetries + 1}): ${errorMessage(err)}. Retrying in ${retryDelayMs}ms...`);
        await delay(retryDelayMs);
      }
    }
  }
  throw lastError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
