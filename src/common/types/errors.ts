/**
 * Base error types for the SDK
 * All module errors should extend these base types
 */

/**
 * Base interface for all errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Non-2xx response (or transport failure) from the Bio-T API.
 * A statusCode of 0 means no HTTP response was received.
 */
export interface UpstreamError extends AppError {
  readonly type: 'UpstreamError';
  readonly statusCode: number;
  readonly body: unknown;
  readonly endpoint: string;
}

export const createUpstreamError = (
  endpoint: string,
  statusCode: number,
  body: unknown,
  cause?: unknown
): UpstreamError => ({
  type: 'UpstreamError',
  message:
    statusCode === 0
      ? `Request to ${endpoint} failed without a response`
      : `Request to ${endpoint} failed with status ${String(statusCode)}`,
  statusCode,
  body,
  endpoint,
  ...(cause !== undefined && { cause }),
});

/**
 * Extracts a printable message from any error-like value.
 */
export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
};
