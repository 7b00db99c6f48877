/**
 * HTTP Utility Module
 * 
 * Thin axios wrapper used for every request to the statistics source:
 * - Returns the body as text (pages are HTML and parsed later)
 * - Never throws on HTTP status (validateStatus: () => true); callers decide
 * - Wraps transport failures (DNS, reset, timeout) in ApiError
 */

import axios from 'axios';
import { ApiError, toError } from '../errors/index.js';
import { logger } from '../core/logger.js';

/**
 * HTTP response structure
 * 
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data?: T; // Response body
}

export interface HttpGetOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Performs an HTTP GET request and returns the raw body text
 * 
 * @example
 * const res = await httpGetText('https://www.basketball-reference.com/boxscores/pbp/202210180BOS.html');
 * if (res.status === 200) parse(res.data);
 */
export async function httpGetText(url: string, options: HttpGetOptions = {}): Promise<HttpResponse<string>> {
  try {
    const res = await axios.get<string>(url, {
      headers: options.headers,
      timeout: options.timeoutMs,
      responseType: 'text',
      validateStatus: () => true
    });

    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }

    return { status: res.status, data: typeof res.data === 'string' ? res.data : undefined };
  } catch (err) {
    const error = toError(err);
    throw new ApiError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}
