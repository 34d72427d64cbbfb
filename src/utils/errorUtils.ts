/**
 * Error handling utilities and the collector's error taxonomy
 */

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error occurred';
}

/**
 * Extracts error details (message, stack, name) for logging
 */
export function getErrorDetails(error: unknown): {
  message: string;
  stack?: string;
  name: string;
} {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name
    };
  }
  return {
    message: typeof error === 'string' ? error : 'Unknown error occurred',
    name: 'Error'
  };
}

export type ConnectionFailureReason = 'host_not_found' | 'connection_refused' | 'timeout' | 'network';

/**
 * The Servarr instance could not be reached (DNS, refused, timeout, other transport failure)
 */
export class StarrConnectionError extends Error {
  readonly reason: ConnectionFailureReason;

  constructor(message: string, reason: ConnectionFailureReason = 'network', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StarrConnectionError';
    this.reason = reason;
  }
}

/**
 * The Servarr instance rejected the API key (HTTP 401/403)
 */
export class StarrAuthenticationError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StarrAuthenticationError';
    this.status = status;
  }
}

/**
 * Any other failed request (non-2xx other than 401/403, unreadable response)
 */
export class StarrRequestError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StarrRequestError';
    this.status = status;
  }
}

/**
 * Connected, but the application kind could not be determined
 */
export class DetectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DetectionError';
  }
}

/**
 * Webhook POST failed
 */
export class SendError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SendError';
    this.status = status;
  }
}

/**
 * Configuration is missing, unreadable or invalid
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
