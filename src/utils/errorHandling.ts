/**
 * Error utilities for logging and user-facing messages
 */

export interface ErrorDetails {
  message: string;
  stack?: string;
  name?: string;
  code?: string;
  status?: number;
  details?: unknown;
  timestamp: string;
}

function readProperty(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

/**
 * Serialize an error object to a plain object with all relevant details
 */
export function serializeError(error: unknown): ErrorDetails {
  const timestamp = new Date().toISOString();
  if (error instanceof Error) {
    const details: ErrorDetails = {
      message: error.message,
      name: error.name,
      timestamp,
    };

    if (error.stack) {
      details.stack = error.stack;
    }

    // Node system errors and HTTP client errors
    const code = readProperty(error, 'code');
    if (code !== undefined) {
      details.code = String(code);
    }

    const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
    if (typeof status === 'number') {
      details.status = status;
    }

    const additionalProps: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(error)) {
      if (['message', 'name', 'stack'].includes(key)) {
        continue;
      }
      const value = readProperty(error, key);
      if (typeof value !== 'function' && typeof value !== 'symbol') {
        additionalProps[key] = value;
      }
    }

    if (Object.keys(additionalProps).length > 0) {
      details.details = additionalProps;
    }

    return details;
  }

  return {
    message: String(error),
    name: 'UnknownError',
    timestamp,
    details: {
      originalType: typeof error,
      originalValue: error,
    },
  };
}

/**
 * Map a raw upstream error message to something a user can act on.
 * Rules are checked in order; the first match wins.
 */
export function translateErrorMessage(message: string): string {
  const lower = message.toLowerCase();

  if (message.includes('401') || message.includes('Unauthorized')) {
    return 'Authentication failed. Please check your API key.';
  }
  if (message.includes('403') || message.includes('Forbidden')) {
    return 'Access denied. Check your permissions.';
  }
  if (message.includes('404')) {
    return 'Resource not found.';
  }
  if (message.includes('429') || lower.includes('rate limit')) {
    return 'Rate limit exceeded. Please wait and try again.';
  }
  if (lower.includes('timeout')) {
    return 'Request timed out. Please try again.';
  }
  if (lower.includes('api key') || lower.includes('api_key')) {
    return 'Invalid or missing API key. Please check your settings.';
  }

  return 'An unexpected error occurred';
}

/**
 * True for the rejection raised by `AbortSignal.timeout`
 */
export function isTimeoutError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

/**
 * Message for a failed outbound request; timeouts name the limit that was hit
 */
export function requestFailureMessage(error: unknown, timeoutMs: number): string {
  if (isTimeoutError(error)) {
    return `Request timed out after ${timeoutMs / 1000} seconds`;
  }
  return error instanceof Error ? error.message : String(error);
}
