import type { LoggerPort } from '../ports/logger_port';
import { isTransientError } from '../../domain/errors';
import { sleep } from '../../domain/utils/time';

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Retries RPC_UNAVAILABLE / NETWORK_TIMEOUT failures with linear backoff. Only for calls
 * that have no on-chain effect.
 */
export async function retryTransient<T>(
  label: string,
  policy: RetryPolicy,
  logger: LoggerPort,
  task: () => Promise<T>
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task();
    } catch (error) {
      if (!isTransientError(error) || attempt >= policy.attempts) {
        throw error;
      }

      logger.warn('transient failure, retrying', {
        step: label,
        attempt,
        error: toErrorMessage(error)
      });
      await sleep(policy.backoffMs * attempt);
    }
  }
}
