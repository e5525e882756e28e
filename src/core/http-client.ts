/**
 * HTTP Client for TTKIA API calls
 */

import type { HTTPClient, HTTPRequestOptions, HttpClientOptions } from "../types";
import {
  InvalidResponseError,
  NetworkError,
  createApiError,
  errorMessage,
} from "./errors";

const RESPONSE_PREVIEW_LENGTH = 200;

/**
 * Join a base URL and an endpoint path with exactly one slash.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params?: Record<string, string>
): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);

  if (params) {
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
  }

  return url.toString();
}

/**
 * Create an HTTP client for API calls.
 *
 * Non-2xx responses reject with an ApiError subclass; requests that never get
 * a response reject with a NetworkError.
 */
export function createHttpClient(
  baseUrl: string,
  clientOptions: HttpClientOptions = {}
): HTTPClient {
  const logger = clientOptions.logger;

  async function request(
    method: string,
    path: string,
    body?: unknown,
    options?: HTTPRequestOptions
  ): Promise<unknown> {
    const url = buildUrl(baseUrl, path, options?.params);
    const isMultipart = body instanceof FormData;

    // fetch sets the multipart boundary itself
    const headers: Record<string, string> = {
      ...(isMultipart ? {} : { "Content-Type": "application/json" }),
      ...clientOptions.headers,
      ...options?.headers,
    };

    let payload: BodyInit | undefined;
    if (body instanceof FormData) {
      payload = body;
    } else if (body !== undefined) {
      payload = JSON.stringify(body);
    }

    const timeoutMs = options?.timeoutMs ?? clientOptions.timeoutMs;
    const timeoutController = new AbortController();
    const timeoutId = timeoutMs
      ? setTimeout(() => timeoutController.abort(), timeoutMs)
      : null;

    // Abort on whichever fires first
    const signals: AbortSignal[] = [timeoutController.signal];
    if (options?.signal) {
      signals.push(options.signal);
    }
    const combinedSignal = AbortSignal.any(signals);

    logger?.debug(`${method} ${url}`);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: combinedSignal,
      });
      text = await response.text();
    } catch (error) {
      const timedOut = timeoutController.signal.aborted;
      const reason = timedOut
        ? `timed out after ${timeoutMs}ms`
        : options?.signal?.aborted
          ? "aborted"
          : errorMessage(error);
      logger?.error(`Request ${method} ${url} failed: ${reason}`);
      throw new NetworkError(`${method} ${path} failed: ${reason}`, {
        cause: error,
        timedOut,
      });
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }

    logger?.debug(`Response: ${response.status}`);
    if (logger?.isLevelEnabled("DEBUG")) {
      logger.debug(`Response body: ${text.slice(0, RESPONSE_PREVIEW_LENGTH)}...`);
    }

    if (!response.ok) {
      const error = createApiError(response.status, response.statusText, text);
      logger?.error(`Request ${method} ${url} failed: ${error.message}`);
      throw error;
    }

    // Bodies are JSON whatever the content-type says; only an empty one is absent
    if (!text) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new InvalidResponseError(`${method} ${path}`, errorMessage(error));
    }
  }

  return {
    get(path: string, options?: HTTPRequestOptions): Promise<unknown> {
      return request("GET", path, undefined, options);
    },

    post(
      path: string,
      body?: unknown,
      options?: HTTPRequestOptions
    ): Promise<unknown> {
      return request("POST", path, body, options);
    },
  };
}
