/**
 * @cubeload/core — Query Model Types
 *
 * Value types for Cube `/load` queries and their results.
 */

// ─── Vocabularies ───────────────────────────────────────────────────

/**
 * Granularities every Cube time dimension supports out of the box.
 * Custom granularities defined in the data model are plain strings.
 */
export const GRANULARITIES = [
  'year',
  'quarter',
  'month',
  'week',
  'day',
  'hour',
  'minute',
  'second',
] as const;

export type Granularity = (typeof GRANULARITIES)[number];

/**
 * Filter operators recognized by Cube.
 *
 * Measures: equals, notEquals, gt, gte, lt, lte, set, notSet, measureFilter.
 * String dimensions: equals, notEquals, contains, notContains, startsWith,
 *   notStartsWith, endsWith, notEndsWith, set, notSet.
 * Number dimensions: equals, notEquals, gt, gte, lt, lte, set, notSet.
 * Time dimensions: equals, notEquals, inDateRange, notInDateRange,
 *   beforeDate, afterDate, set, notSet.
 *
 * `Filter.operator` stays a plain string so operators added server-side pass through.
 */
export const FILTER_OPERATORS = [
  'equals',
  'notEquals',
  'contains',
  'notContains',
  'startsWith',
  'notStartsWith',
  'endsWith',
  'notEndsWith',
  'gt',
  'gte',
  'lt',
  'lte',
  'set',
  'notSet',
  'inDateRange',
  'notInDateRange',
  'beforeDate',
  'afterDate',
  'measureFilter',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const ORDER_DIRECTIONS = ['asc', 'desc'] as const;

/**
 * Sort direction for a member in `QueryRequest.order`.
 *
 * Without an explicit order Cube sorts by the first time dimension with a
 * granularity (asc), else the first measure (desc), else the first dimension (asc).
 */
export type OrderDirection = (typeof ORDER_DIRECTIONS)[number];

// ─── Filters ────────────────────────────────────────────────────────

/**
 * Leaf filter on a dimension (applied before aggregation) or a measure
 * (applied after).
 */
export interface Filter {
  /** Member to filter by, e.g. "stories.isDraft" */
  member: string;
  operator: FilterOperator | (string & {});
  /** Omitted for `set` / `notSet`. Dates use YYYY-MM-DD. */
  values?: string[];
}

/**
 * Boolean combination of filters. Only one of `or` / `and` is meant to be
 * set, and dimension and measure filters must not be mixed in one node.
 */
export interface LogicalOperator {
  or?: FilterOrLogical[];
  and?: FilterOrLogical[];
}

export type FilterOrLogical = Filter | LogicalOperator;

// ─── Auth ───────────────────────────────────────────────────────────

export interface CubeAuth {
  /** Sent verbatim as the Authorization header */
  readonly token: string;
  /** Deployment base URL, e.g. "https://example.cubecloud.dev" */
  readonly host: string;
}

// ─── Response ───────────────────────────────────────────────────────

export type RowValue = string | number | null;

/** One result row keyed by member name, e.g. "orders.count" */
export type Row = Record<string, RowValue>;

export interface QueryResponse {
  data: Row[];
}
