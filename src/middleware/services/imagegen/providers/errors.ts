/**
 * Error classes shared by all image providers and the job engine
 */

import { ImageErrorCode } from '../../../types';
import { AbortedWaitError } from '../utils/timer';

export class ImageProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly code: ImageErrorCode,
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ImageProviderError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ImageProviderError);
    }
  }

  toString(): string {
    return `[${this.provider}] ${this.code}: ${this.message}${
      this.cause ? ` (caused by: ${this.cause.message})` : ''
    }`;
  }
}

/**
 * The caller's request is malformed. Never retried.
 */
export class InvalidRequestError extends ImageProviderError {
  constructor(
    provider: string,
    public readonly field: string,
    message: string,
    cause?: Error
  ) {
    super(provider, 'INVALID_REQUEST', message, cause);
    this.name = 'InvalidRequestError';
  }
}

export class InvalidConfigError extends ImageProviderError {
  constructor(provider: string, message: string, cause?: Error) {
    super(provider, 'INVALID_CONFIG', message, cause);
    this.name = 'InvalidConfigError';
  }
}

/**
 * The backend has no capability for the requested operation kind.
 * Callers route such requests elsewhere instead of retrying.
 */
export class UnsupportedOperationError extends ImageProviderError {
  constructor(
    provider: string,
    public readonly operation: string,
    public readonly endpoint: string
  ) {
    super(
      provider,
      'UNSUPPORTED_OPERATION',
      `${provider} doesn't support ${operation} endpoint: ${endpoint}`
    );
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * The backend answered but signaled failure
 */
export class ProviderAPIError extends ImageProviderError {
  constructor(
    provider: string,
    public readonly statusCode: number,
    message: string,
    cause?: Error,
    code: ImageErrorCode = 'PROVIDER_API_ERROR'
  ) {
    super(provider, code, message, cause);
    this.name = 'ProviderAPIError';
  }
}

export const POLLING_TIMEOUT_MESSAGE =
  'Image generation timed out. Maximum polling attempts reached.';

export class ProviderTimeoutError extends ProviderAPIError {
  constructor(provider: string, message: string = POLLING_TIMEOUT_MESSAGE) {
    super(provider, 408, message, undefined, 'PROVIDER_TIMEOUT');
    this.name = 'ProviderTimeoutError';
  }
}

/**
 * The request never produced an HTTP response
 */
export class NetworkError extends ProviderAPIError {
  constructor(provider: string, message: string, cause?: Error) {
    super(provider, 502, message, cause, 'NETWORK_ERROR');
    this.name = 'NetworkError';
  }
}

export class CancelledError extends ImageProviderError {
  constructor(provider: string, message?: string) {
    super(provider, 'CANCELLED', message || 'Image generation was cancelled');
    this.name = 'CancelledError';
  }
}

// ============================================================
// CLASSIFICATION
// ============================================================

const NETWORK_ERROR_MARKERS = [
  'timeout',
  'etimedout',
  'econnrefused',
  'econnreset',
  'enotfound',
  'eai_again',
  'socket hang up',
  'fetch failed',
];

/**
 * Convert any thrown value into an ImageProviderError attributed to the provider
 */
export function toProviderError(
  provider: string,
  error: unknown,
  signal?: AbortSignal,
  context?: string
): ImageProviderError {
  if (error instanceof ImageProviderError) {
    return error;
  }

  if (signal?.aborted || error instanceof AbortedWaitError) {
    return new CancelledError(provider);
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message.toLowerCase();
  const suffix = context ? `: ${context}` : '';

  if (
    cause.name === 'AbortError' ||
    NETWORK_ERROR_MARKERS.some((marker) => message.includes(marker))
  ) {
    return new NetworkError(provider, `Network error${suffix}`, cause);
  }

  return new ProviderAPIError(
    provider,
    500,
    `Image generation failed${suffix}: ${cause.message}`,
    cause
  );
}
