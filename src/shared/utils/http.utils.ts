/**
 * =============================================================================
 * HTTP UTILITIES - Outbound JSON requests
 * =============================================================================
 *
 * Thin wrapper around the global fetch used by every upstream client.
 * Each call carries its own timeout; there are no retries.
 * Failures come back as a tagged value so callers can map them to
 * their own error kinds.
 * =============================================================================
 */

import { Result, ok, fail } from '../types/result.types';

export type HttpFailureReason = 'network' | 'timeout' | 'status' | 'parse';

export interface HttpFailure {
  reason: HttpFailureReason;
  detail: string;
  /** HTTP status, when a response arrived */
  status?: number;
  /** Parsed body of a non-2xx response, when it was JSON */
  body?: unknown;
}

export interface JsonRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Fetch `url` and parse the body as JSON
 */
export async function requestJson(url: string, options: JsonRequestOptions): Promise<Result<unknown, HttpFailure>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      return fail({ reason: 'timeout', detail: `No response within ${options.timeoutMs}ms` });
    }
    return fail({ reason: 'network', detail: error instanceof Error ? error.message : String(error) });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    if (isTimeout(error)) {
      return fail({ reason: 'timeout', detail: `Response body not received within ${options.timeoutMs}ms` });
    }
    return fail({ reason: 'network', detail: error instanceof Error ? error.message : String(error) });
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    if (!response.ok) {
      return fail({ reason: 'status', status: response.status, detail: `HTTP ${response.status}` });
    }
    return fail({ reason: 'parse', status: response.status, detail: 'Response body is not valid JSON' });
  }

  if (!response.ok) {
    return fail({ reason: 'status', status: response.status, detail: `HTTP ${response.status}`, body });
  }

  return ok(body);
}
