// src/core/utils/http.ts
import { ErrorCode, PipelineError } from '../errors.js';
import { DEFAULT_TIMEOUT } from '../config/constants.js';

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS.has(status);
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw toNetworkError(error, url, timeoutMs);
  }
}

/** Network-level failures (DNS, reset, timeout) are worth another try */
export function toNetworkError(error: unknown, url: string, timeoutMs: number): PipelineError {
  const name = error instanceof Error ? error.name : '';
  if (name === 'TimeoutError' || name === 'AbortError') {
    return new PipelineError(
      ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
      `Request to ${describeUrl(url)} timed out after ${timeoutMs}ms`,
      true
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(
    ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
    `Request to ${describeUrl(url)} failed: ${message}`,
    true
  );
}

/** Cancels an unread body so the connection goes back to the pool */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    // the caller already has the status to report
    await response.body.cancel().catch(() => undefined);
  }
}

/** `httpError` for a response whose body will not be read */
export async function releaseAndFail(response: Response, what: string): Promise<PipelineError> {
  await discardBody(response);
  return httpError(response, what);
}

export function httpError(response: Response, what: string): PipelineError {
  const retryable = isRetryableStatus(response.status);
  return new PipelineError(
    ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
    `${what} returned HTTP ${response.status}`,
    retryable,
    response.status === 401 || response.status === 403 ? 'Check the credentials for this service' : undefined,
    { status: response.status }
  );
}

/** Host and path only, so tokens in query strings stay out of logs */
export function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.host}${parsed.pathname}`;
  } catch {
    return 'invalid url';
  }
}
