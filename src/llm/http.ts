/**
 * JSON-over-HTTP helper shared by the LLM backends
 *
 * Retries retriable statuses and network failures through
 * ErrorHandler.wrapOperationWithRetry, then fails with an HttpRequestError
 * carrying the last status.
 */

import { ErrorCategory, ErrorHandler, HypergraphRAGError, toError } from '../utils/error-handler.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetchImpl?: FetchLike;
  headers?: Record<string, string>;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

export class HttpRequestError extends HypergraphRAGError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, ErrorCategory.NETWORK, options);
    this.name = 'HttpRequestError';
    this.status = status;
  }
}

export const RETRIABLE_STATUS = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/**
 * Pull a readable message out of an error body, falling back to the raw text
 */
function errorMessageFrom(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const { error } = parsed;
      if (typeof error === 'string') return error;
      if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
      }
    }
  } catch {
    // not JSON
    return body;
  }
  return body;
}

function isRetriable(error: Error): boolean {
  return error instanceof HttpRequestError && (error.status === undefined || RETRIABLE_STATUS.has(error.status));
}

async function postOnce(url: string, body: unknown, options: HttpOptions): Promise<unknown> {
  const fetchImpl = options.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers
      },
      body: JSON.stringify(body),
      signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined
    });
  } catch (error) {
    throw new HttpRequestError(`Request to ${url} failed: ${toError(error).message}`, undefined, { cause: error });
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => '');
    throw new HttpRequestError(
      `HTTP ${response.status} from ${url}: ${errorMessageFrom(errorText) || response.statusText}`,
      response.status
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new HttpRequestError(`Invalid JSON from ${url}`, response.status, { cause: error });
  }
}

/**
 * POST a JSON body and return the parsed JSON response
 *
 * `maxRetries` counts retries after the first attempt. Only network failures
 * and RETRIABLE_STATUS responses are retried.
 */
export async function postJSON(url: string, body: unknown, options: HttpOptions = {}): Promise<unknown> {
  const result = await ErrorHandler.wrapOperationWithRetry(
    () => postOnce(url, body, options),
    ErrorCategory.NETWORK,
    `POST ${url}`,
    undefined,
    {
      maxRetries: Math.max(0, options.maxRetries ?? 2) + 1,
      baseDelayMs: Math.max(0, options.retryDelayMs ?? 250),
      shouldRetry: isRetriable
    }
  );
  return ErrorHandler.unwrap(result);
}
