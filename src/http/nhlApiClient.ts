/**
 * NHL API Client Module
 *
 * Builds scoreboard URLs for the public NHL web API and fetches one day's
 * scoreboard. Exactly one request per call; storage is never touched here.
 */

import { cfg } from '../core/config.js';
import { httpGetJson } from '../util/http.js';
import { isValidDateISO, isValidUrl, ValidationError } from '../util/validation.js';

/**
 * Raw scoreboard as fetched, before normalization
 */
export interface ScoreFetch {
  url: string;
  status: number;
  payload: Record<string, unknown>;
}

/**
 * What the pipeline needs from a scoreboard source
 */
export interface ScoreClient {
  scoreUrl(dateISO: string): string;
  fetchScores(dateISO: string): Promise<ScoreFetch>;
}

export interface NhlClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Validates and returns the API base URL without a trailing slash
 *
 * @throws ValidationError if the base URL is invalid
 */
function baseUrl(url: string): string {
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid NHL API base URL: ${url}`, 'baseUrl');
  }
  return url.replace(/\/+$/, '');
}

/**
 * Constructs URL for fetching the daily scoreboard
 *
 * Endpoint: /v1/score/{YYYY-MM-DD}
 *
 * @example
 * scoreUrl('2025-09-21')
 * // Returns: https://api-web.nhle.com/v1/score/2025-09-21
 */
export function scoreUrl(dateISO: string, base: string = cfg.nhlApi.baseUrl): string {
  if (!isValidDateISO(dateISO)) {
    throw new ValidationError(`Invalid date format: ${dateISO}. Expected YYYY-MM-DD`, 'dateISO');
  }
  return `${baseUrl(base)}/v1/score/${dateISO}`;
}

/**
 * Fetches the scoreboard for one date
 *
 * @throws NetworkError | TimeoutError | InvalidResponseError from the HTTP layer
 */
export async function fetchScores(dateISO: string, options: NhlClientOptions = {}): Promise<ScoreFetch> {
  const url = scoreUrl(dateISO, options.baseUrl);
  const res = await httpGetJson(url, { timeoutMs: options.timeoutMs ?? cfg.nhlApi.timeoutMs });
  return { url, status: res.status, payload: res.data };
}

/**
 * Binds the client functions to one base URL and timeout
 */
export function createNhlClient(options: NhlClientOptions = {}): ScoreClient {
  return {
    scoreUrl: (dateISO) => scoreUrl(dateISO, options.baseUrl),
    fetchScores: (dateISO) => fetchScores(dateISO, options)
  };
}
