/**
 * @cubeload/sdk — CubeClient
 *
 * Typed HTTP client for the Cube `/load` endpoint.
 * Uses the native fetch of Node.js 20.
 */

import {
  QueryValidationError,
  buildLoadPayload,
  createLogger,
  getErrorMessage,
  parseQueryResponse,
  type CubeAuth,
  type Logger,
  type QueryRequest,
  type QueryResponse,
} from '@cubeload/core';
import { classifyResponse } from './classify.js';
import { getClientConfig } from './config.js';
import { ConnectionError, UnexpectedResponseError } from './errors.js';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from './retry.js';

// ─── Types ──────────────────────────────────────────────────────────

export const LOAD_PATH = '/cubejs-api/v1/load';

export interface CubeClientOptions {
  /** Custom fetch implementation (defaults to global fetch) */
  fetch?: typeof globalThis.fetch;
  /** Per-attempt timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Retry configuration */
  retry?: RetryConfig;
  /** Logger for request tracing and retry warnings (default: JSON logger) */
  logger?: Logger;
}

// ─── Client ─────────────────────────────────────────────────────────

export class CubeClient {
  private readonly _fetch: typeof globalThis.fetch;
  private readonly timeout: number;
  private readonly retryConfig: Required<RetryConfig>;
  private readonly logger: Logger;

  /**
   * Create a client from environment variables.
   * - `CUBE_TIMEOUT_MS` → timeout
   * - `CUBE_MAX_ATTEMPTS` → retry.maxAttempts
   * - `CUBE_BACKOFF_MAX_MS` → retry.maxDelayMs
   * Explicit overrides take priority over env vars.
   */
  static fromEnv(
    overrides?: Partial<CubeClientOptions>,
    env: NodeJS.ProcessEnv = process.env,
  ): CubeClient {
    const config = getClientConfig(env);
    return new CubeClient({
      ...overrides,
      timeout: overrides?.timeout ?? config.timeout,
      retry: { ...config.retry, ...overrides?.retry },
    });
  }

  constructor(options: CubeClientOptions = {}) {
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeout = options.timeout ?? 60_000;
    this.retryConfig = {
      maxAttempts: options.retry?.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
      multiplierMs: options.retry?.multiplierMs ?? DEFAULT_RETRY_CONFIG.multiplierMs,
      minDelayMs: options.retry?.minDelayMs ?? DEFAULT_RETRY_CONFIG.minDelayMs,
      maxDelayMs: options.retry?.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
      jitter: options.retry?.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
    };
    this.logger = options.logger ?? createLogger('CubeClient');
  }

  /**
   * Run a query, retrying "Continue wait" and 502 responses with backoff.
   * Every other error is thrown on the first occurrence.
   */
  async load(auth: CubeAuth, request: QueryRequest): Promise<QueryResponse> {
    return withRetry(() => this.loadOnce(auth, request), {
      ...this.retryConfig,
      onRetry: (attempt, err, delayMs) => {
        this.logger.warn(
          `${getErrorMessage(err)} (attempt ${attempt}/${this.retryConfig.maxAttempts}, next in ${Math.round(delayMs)}ms)`,
        );
      },
    });
  }

  /**
   * Single attempt: POST the query, classify the response and parse the rows.
   */
  async loadOnce(auth: CubeAuth, request: QueryRequest): Promise<QueryResponse> {
    const host = auth.host.replace(/\/+$/, '');
    const url = `${host}${LOAD_PATH}`;
    const payload = buildLoadPayload(request);

    this.logger.debug(`Loading query from ${host}`);
    this.logger.debug('Query payload', payload);

    let status: number;
    let body: string;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);
    try {
      const response = await this._fetch(url, {
        method: 'POST',
        headers: {
          'Accept': 'application/json',
          'Content-Type': 'application/json',
          'Authorization': auth.token,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      status = response.status;
      body = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ConnectionError(`Request to ${url} timed out after ${this.timeout}ms`, err);
      }
      throw new ConnectionError(
        `Failed to connect to Cube at ${host}: ${getErrorMessage(err)}`,
        err,
      );
    } finally {
      clearTimeout(timer);
    }

    const error = classifyResponse(status, body);
    if (error) {
      this.logger.debug('Cube responded with an error', { status, code: error.code });
      throw error;
    }

    const result = this.parseBody(status, body);
    this.logger.debug('Cube response successfully received', { rows: result.data.length });
    return result;
  }

  // ─── Internal ────────────────────────────────────────────

  private parseBody(status: number, body: string): QueryResponse {
    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch {
      throw new UnexpectedResponseError(status, body);
    }
    try {
      return parseQueryResponse(decoded);
    } catch (err) {
      if (err instanceof QueryValidationError) {
        throw new UnexpectedResponseError(status, body);
      }
      throw err;
    }
  }
}

/**
 * One-off retrying load with a throwaway client.
 */
export function loadQuery(
  auth: CubeAuth,
  request: QueryRequest,
  options?: CubeClientOptions,
): Promise<QueryResponse> {
  return new CubeClient(options).load(auth, request);
}
