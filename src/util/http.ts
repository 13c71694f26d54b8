/**
 * HTTP Utility Module
 *
 * Performs a single JSON GET with a hard timeout and maps every failure onto
 * the client error taxonomy:
 * - no response before the timeout -> TimeoutError
 * - no response at all -> NetworkError
 * - non-2xx status, or a body that is not a JSON object -> InvalidResponseError
 *
 * There is no retry here; callers decide whether to try again.
 */

import axios, { type AxiosResponse } from 'axios';
import { InvalidResponseError, NetworkError, TimeoutError, toError } from '../errors/index.js';
import { logger } from '../core/logger.js';
import { REQUEST } from '../core/constants.js';
import { isPlainObject } from './validation.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data: T; // Response body (parsed)
}

export interface HttpGetOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * axios reports an elapsed `timeout` as ECONNABORTED, or ETIMEDOUT when
 * `transitional.clarifyTimeoutError` is on
 */
function isTimeout(err: unknown): boolean {
  return axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
}

/**
 * Performs an HTTP GET and returns the decoded JSON object
 *
 * @param url - Full URL to request
 * @param options - Timeout (defaults to 30 seconds) and extra headers
 *
 * @example
 * const res = await httpGetJson('https://api-web.nhle.com/v1/score/2025-09-21');
 * res.data.games // unknown, validate before use
 */
export async function httpGetJson(
  url: string,
  options: HttpGetOptions = {}
): Promise<HttpResponse<Record<string, unknown>>> {
  const timeoutMs = options.timeoutMs ?? REQUEST.TIMEOUT_MS;

  let res: AxiosResponse<unknown>;
  try {
    res = await axios.get<unknown>(url, {
      headers: { Accept: 'application/json', 'User-Agent': REQUEST.USER_AGENT, ...options.headers },
      timeout: timeoutMs,
      validateStatus: () => true
    });
  } catch (err) {
    const error = toError(err);
    if (isTimeout(err)) {
      logger.warn({ url, timeoutMs }, 'HTTP request timed out');
      throw new TimeoutError(url, timeoutMs, error);
    }
    logger.warn({ url, err: error }, 'HTTP request failed');
    throw new NetworkError(`HTTP request failed: ${error.message}`, url, error);
  }

  if (res.status < 200 || res.status >= 300) {
    logger.warn({ url, status: res.status }, 'HTTP request returned an error status');
    throw new InvalidResponseError(`Unexpected HTTP status ${res.status}`, url, res.status);
  }

  // axios hands back the raw string when the body is not valid JSON
  if (!isPlainObject(res.data)) {
    throw new InvalidResponseError('Response body is not a JSON object', url, res.status);
  }

  return { status: res.status, data: res.data };
}
