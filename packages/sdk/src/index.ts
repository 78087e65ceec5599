/**
 * @cubeload/sdk — Programmatic client for the Cube REST API
 */

// Client
export { CubeClient, loadQuery, LOAD_PATH } from './client.js';
export type { CubeClientOptions } from './client.js';

// Classification
export { classifyResponse, CONTINUE_WAIT_MARKER } from './classify.js';

// Retry
export { withRetry, backoffDelay, DEFAULT_RETRY_CONFIG } from './retry.js';
export type { RetryConfig, RetryOptions } from './retry.js';

// Config
export { getClientConfig, authFromEnv } from './config.js';
export type { ClientConfig } from './config.js';

// Errors
export {
  CubeError,
  RetryableError,
  AuthorizationError,
  RequestError,
  ServerError,
  UnexpectedResponseError,
  ConnectionError,
  ContinueWaitError,
  BadGatewayError,
  isRetryableError,
} from './errors.js';

// Re-export the model consumers need to build queries
export {
  createQueryRequest,
  createTimeDimension,
  createFilter,
  createLogicalOperator,
  createAuth,
  serializeQuery,
  parseQueryResponse,
  QueryValidationError,
  GRANULARITIES,
  FILTER_OPERATORS,
} from '@cubeload/core';
export type {
  CubeAuth,
  QueryRequest,
  QueryRequestInput,
  QueryResponse,
  TimeDimension,
  TimeDimensionInput,
  Filter,
  LogicalOperator,
  FilterOrLogical,
  Granularity,
  FilterOperator,
  OrderDirection,
  Row,
  RowValue,
  WireQuery,
} from '@cubeload/core';
