/**
 * @cubeload/sdk — Typed Errors
 */

/**
 * Base error class for all errors raised while talking to Cube.
 */
export class CubeError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly retryable: boolean;
  /** Raw response body, when the error came from an HTTP response */
  public readonly body?: string;

  constructor(message: string, status: number, code: string, retryable = false, body?: string) {
    super(message);
    this.name = 'CubeError';
    this.status = status;
    this.code = code;
    this.retryable = retryable;
    this.body = body;
  }
}

/**
 * Base class for conditions the retry policy turns into another attempt.
 */
export class RetryableError extends CubeError {
  constructor(message: string, status: number, code: string, body?: string) {
    super(message, status, code, true, body);
    this.name = 'RetryableError';
  }
}

/**
 * Thrown when Cube returns 403 Forbidden.
 */
export class AuthorizationError extends CubeError {
  constructor(body: string) {
    super(`Cube authorization error: ${body}`, 403, 'AUTHORIZATION_ERROR', false, body);
    this.name = 'AuthorizationError';
  }
}

/**
 * Thrown when Cube returns 400 Bad Request (malformed query).
 */
export class RequestError extends CubeError {
  constructor(body: string) {
    super(`Cube 400 request error: ${body}`, 400, 'REQUEST_ERROR', false, body);
    this.name = 'RequestError';
  }
}

/**
 * Thrown when Cube returns 500 Internal Server Error.
 */
export class ServerError extends CubeError {
  constructor(body: string) {
    super(`Cube server error: ${body}`, 500, 'SERVER_ERROR', false, body);
    this.name = 'ServerError';
  }
}

/**
 * Thrown for any other non-200 status, or a 200 whose body is not a valid result.
 */
export class UnexpectedResponseError extends CubeError {
  constructor(status: number, body: string) {
    super(`Cube unexpected response: ${body}`, status, 'UNEXPECTED_RESPONSE', false, body);
    this.name = 'UnexpectedResponseError';
  }
}

/**
 * Thrown when the server is unreachable or the attempt times out.
 */
export class ConnectionError extends CubeError {
  constructor(message: string, cause?: unknown) {
    super(message, 0, 'CONNECTION_ERROR');
    this.name = 'ConnectionError';
    this.cause = cause;
  }
}

/**
 * Cube accepted the query but is still computing it.
 */
export class ContinueWaitError extends RetryableError {
  constructor(status = 200, body?: string) {
    super('Cube query is not ready yet, continue waiting...', status, 'CONTINUE_WAIT', body);
    this.name = 'ContinueWaitError';
  }
}

/**
 * Cube returned 502, usually while the deployment is autoscaling.
 */
export class BadGatewayError extends RetryableError {
  constructor(body?: string) {
    super('Cube returned 502 Bad Gateway (likely scaling), retrying...', 502, 'BAD_GATEWAY', body);
    this.name = 'BadGatewayError';
  }
}

export function isRetryableError(err: unknown): err is RetryableError {
  return err instanceof RetryableError;
}
