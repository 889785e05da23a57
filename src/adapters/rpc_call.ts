import { NetworkTimeoutError, RpcUnavailableError, SwapError } from '../domain/errors';
import { withTimeout } from '../domain/utils/time';
import { formatFetchError } from './http/fetch_json';

/**
 * Runs one node call bounded by `timeoutMs`. Typed swap errors pass through, anything
 * else the client library throws becomes RpcUnavailableError.
 */
export async function callRpc<T>(label: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  try {
    return await withTimeout(
      task(),
      timeoutMs,
      () => new NetworkTimeoutError(`${label} timed out after ${timeoutMs}ms`)
    );
  } catch (error) {
    if (error instanceof SwapError) {
      throw error;
    }
    throw new RpcUnavailableError(`${label} failed: ${formatFetchError(error)}`);
  }
}
