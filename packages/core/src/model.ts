/**
 * @cubeload/core — Query Construction & Wire Serialization
 *
 * Constructors validate eagerly and return frozen values, so a malformed
 * query fails before any request is made.
 */
import type { z } from 'zod';
import { QueryValidationError } from './errors.js';
import {
  authSchema,
  filterSchema,
  logicalOperatorSchema,
  queryRequestSchema,
  queryResponseSchema,
  timeDimensionSchema,
  type QueryRequest,
  type QueryRequestInput,
  type TimeDimension,
  type TimeDimensionInput,
} from './schemas.js';
import type {
  CubeAuth,
  Filter,
  FilterOrLogical,
  LogicalOperator,
  OrderDirection,
  QueryResponse,
} from './types.js';

// ─── Wire Types ─────────────────────────────────────────────────────

export interface WireTimeDimension {
  dimension: string;
  granularity?: string;
  dateRange?: string[] | string;
  compareDateRange?: Array<string[] | string>;
}

export interface WireFilter {
  member: string;
  operator: string;
  values?: string[];
}

export interface WireLogicalOperator {
  or?: WireFilterOrLogical[];
  and?: WireFilterOrLogical[];
}

export type WireFilterOrLogical = WireFilter | WireLogicalOperator;

/** The `query` object accepted by `/cubejs-api/v1/load` */
export interface WireQuery {
  measures: string[];
  timeDimensions?: WireTimeDimension[];
  dimensions?: string[];
  segments?: string[];
  filters: WireFilterOrLogical[];
  order?: Record<string, OrderDirection>;
  limit?: number;
  offset?: number;
}

export interface LoadPayload {
  query: WireQuery;
}

// ─── Validation ─────────────────────────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function validate<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown,
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(result.error.issues);
  }
  return deepFreeze(result.data);
}

// ─── Constructors ───────────────────────────────────────────────────

export function createTimeDimension(input: TimeDimensionInput): TimeDimension {
  return validate(timeDimensionSchema, input);
}

export function createFilter(input: Filter): Filter {
  return validate(filterSchema, input);
}

export function createLogicalOperator(input: LogicalOperator): LogicalOperator {
  return validate(logicalOperatorSchema, input);
}

/**
 * Build a validated query. Nested time dimensions and filters may be plain
 * objects; they are validated here as well.
 */
export function createQueryRequest(input: QueryRequestInput = {}): QueryRequest {
  return validate(queryRequestSchema, input);
}

export function createAuth(input: CubeAuth): CubeAuth {
  return validate(authSchema, input);
}

export function isLogicalOperator(entry: FilterOrLogical): entry is LogicalOperator {
  return !('member' in entry);
}

// ─── Serialization ──────────────────────────────────────────────────

function serializeTimeDimension(td: TimeDimension): WireTimeDimension {
  return {
    dimension: td.dimension,
    ...(td.granularity !== undefined ? { granularity: td.granularity } : {}),
    ...(td.dateRange !== undefined
      ? { dateRange: Array.isArray(td.dateRange) ? [...td.dateRange] : td.dateRange }
      : {}),
    ...(td.compareDateRange !== undefined
      ? { compareDateRange: td.compareDateRange.map((r) => (Array.isArray(r) ? [...r] : r)) }
      : {}),
  };
}

export function serializeFilter(entry: FilterOrLogical): WireFilterOrLogical {
  if (isLogicalOperator(entry)) {
    return {
      ...(entry.or !== undefined ? { or: entry.or.map(serializeFilter) } : {}),
      ...(entry.and !== undefined ? { and: entry.and.map(serializeFilter) } : {}),
    };
  }
  return {
    member: entry.member,
    operator: entry.operator,
    ...(entry.values !== undefined ? { values: [...entry.values] } : {}),
  };
}

/**
 * Convert a query to its wire form. Unset optional fields are omitted,
 * never sent as null. `order` keeps insertion order (it sets sort priority).
 */
export function serializeQuery(request: QueryRequest): WireQuery {
  return {
    measures: [...request.measures],
    ...(request.timeDimensions !== undefined
      ? { timeDimensions: request.timeDimensions.map(serializeTimeDimension) }
      : {}),
    ...(request.dimensions !== undefined ? { dimensions: [...request.dimensions] } : {}),
    ...(request.segments !== undefined ? { segments: [...request.segments] } : {}),
    filters: request.filters.map(serializeFilter),
    ...(request.order !== undefined ? { order: { ...request.order } } : {}),
    ...(request.limit !== undefined ? { limit: request.limit } : {}),
    ...(request.offset !== undefined ? { offset: request.offset } : {}),
  };
}

export function buildLoadPayload(request: QueryRequest): LoadPayload {
  return { query: serializeQuery(request) };
}

// ─── Response ───────────────────────────────────────────────────────

/**
 * Validate a decoded `/load` body. Rows are returned as-is, without coercion.
 */
export function parseQueryResponse(raw: unknown): QueryResponse {
  return validate(queryResponseSchema, raw);
}
