import { NetworkTimeoutError, RpcUnavailableError } from '../../domain/errors';

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    label: string,
    readonly body: string
  ) {
    super(`${label} failed: HTTP ${status}${body ? ` ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

export interface FetchJsonOptions {
  label: string;
  timeoutMs: number;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export function formatFetchError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const causeValue: unknown = error.cause;
  let causeMessage = '';
  if (causeValue instanceof Error) {
    causeMessage = causeValue.message;
  } else if (
    typeof causeValue === 'string' ||
    typeof causeValue === 'number' ||
    typeof causeValue === 'boolean' ||
    typeof causeValue === 'bigint'
  ) {
    causeMessage = String(causeValue);
  } else if (causeValue !== undefined) {
    causeMessage = JSON.stringify(causeValue);
  }

  return causeMessage ? `${error.message} (cause=${causeMessage})` : error.message;
}

/**
 * JSON request bounded by `timeoutMs`. Transport failures surface as RpcUnavailableError,
 * timeouts and caller aborts as NetworkTimeoutError, non-2xx answers as HttpStatusError.
 */
export async function fetchJson(url: string | URL, options: FetchJsonOptions): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort();
  }, options.timeoutMs);
  const forwardAbort = (): void => {
    controller.abort();
  };
  if (options.signal?.aborted) {
    controller.abort();
  }
  options.signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? 'GET',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          ...options.headers
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new NetworkTimeoutError(`${options.label} timed out after ${options.timeoutMs}ms`);
      }
      throw new RpcUnavailableError(`${options.label} request failed: ${formatFetchError(error)}`);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new HttpStatusError(response.status, options.label, body);
    }

    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new NetworkTimeoutError(`${options.label} timed out after ${options.timeoutMs}ms`);
      }
      throw new Error(`${options.label} returned invalid JSON: ${formatFetchError(error)}`);
    }
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
