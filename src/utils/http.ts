import { type AxiosResponse } from 'axios';

import { HttpRequestError } from '../errors';
import { type Logger } from '../logger';

export type RetryOptions = {
  logger?: Logger;
  retryCount?: number;
  retryDelay?: number;
};

/**
 * Send a request, retrying when it fails with a temporary failure.
 * The request function must not throw on non-success statuses (`validateStatus: () => true`);
 * those are turned into {@link HttpRequestError} here.
 * @returns the response body
 */
export async function sendRequestWithRetry<T = unknown>(
  method: string,
  url: string,
  requestAsync: () => Promise<AxiosResponse<T>>,
  { logger, retryCount = 3, retryDelay = 3000 }: RetryOptions = {},
): Promise<T> {
  try {
    logger?.trace(`🌎 🠊 [${method}] ${url}`);
    const response = await requestAsync();
    logger?.trace(`🌎 🠈 [${response.status}] ${response.statusText}`);

    if (response.status < 200 || response.status > 299) {
      throw new HttpRequestError(
        `HTTP ${method} '${url}' failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    return response.data;
  } catch (e) {
    if (retryCount > 1 && isErrorTemporaryFailure(e)) {
      logger?.warn({ err: e }, `⏳ Retrying [${method}] ${url} in ${retryDelay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, retryDelay));
      return sendRequestWithRetry(method, url, requestAsync, { logger, retryCount: retryCount - 1, retryDelay });
    }
    throw e;
  }
}

export function isErrorTemporaryFailure(e: unknown): boolean {
  if (e instanceof HttpRequestError) {
    // Check for common HTTP status codes that indicate a temporary failure
    // See: https://developer.mozilla.org/en-US/docs/Web/HTTP/Status
    switch (e.code) {
      case 502: // Bad Gateway
      case 503: // Service Unavailable
      case 504: // Gateway Timeout
        return true;
      default:
        return false;
    }
  } else if (e instanceof Error && 'code' in e) {
    // Check for Node.js system errors (also carried by axios errors) that indicate a temporary failure
    // See: https://nodejs.org/api/errors.html#errors_common_system_errors
    switch (e.code) {
      case 'ETIMEDOUT': // Operation timed out
      case 'ECONNRESET': // Connection reset by peer
        return true;
      default:
        return false;
    }
  }
  return false;
}
