/**
 * HTTP helpers for the lookup services: GET with retry and exponential
 * backoff on top of axios.
 */

import axios, { type AxiosRequestConfig } from 'axios';
import { APIError } from '../services/errors';

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_BASE_RETRY_DELAY = 500;
export const DEFAULT_REQUEST_TIMEOUT = 10000;
export const DEFAULT_USER_AGENT = 'tagsmith/1.0.0';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Delay before the first retry; doubles on each further retry */
  baseRetryDelay?: number;
  requestTimeout?: number;
  userAgent?: string;
}

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: true;
  response?: { status: number };
}

export function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

function responseStatus(error: AxiosLikeError): number | null {
  const { response } = error;
  return response && typeof response.status === 'number' ? response.status : null;
}

/** 429, 5xx and network errors (no status) are worth another attempt. */
export function isRetryableStatus(status: number | null): boolean {
  return status === null || status === 429 || status >= 500;
}

export function backoffDelay(baseDelay: number, attempt: number): number {
  return baseDelay * Math.pow(2, attempt - 1);
}

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * GETs `url`, retrying retryable failures.
 *
 * @returns the response body, or null on 404
 * @throws APIError on a non-retryable status or once retries are exhausted
 */
export async function getWithRetry<T>(
  service: string,
  url: string,
  config: AxiosRequestConfig,
  options: RetryOptions = {},
): Promise<T | null> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelay = options.baseRetryDelay ?? DEFAULT_BASE_RETRY_DELAY;

  let lastError: APIError | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      await sleep(backoffDelay(baseDelay, attempt));
    }

    try {
      const response = await axios.get<T>(url, {
        timeout: options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
        ...config,
        headers: {
          'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
          ...config.headers,
        },
      });
      return response.data;
    } catch (error: unknown) {
      const status = isAxiosLikeError(error) ? responseStatus(error) : null;
      if (status === 404) {
        return null;
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      lastError = new APIError(`${service} request failed: ${cause.message}`, {
        cause,
        service,
        statusCode: status ?? undefined,
      });

      if (!isRetryableStatus(status)) {
        throw lastError;
      }
    }
  }

  throw lastError ?? new APIError(`${service} request failed`, { service });
}
