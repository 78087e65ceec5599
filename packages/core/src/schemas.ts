/**
 * @cubeload/core — Zod Validation Schemas
 *
 * Runtime validation for query inputs and `/load` responses.
 */
import { z } from 'zod';
import {
  FILTER_OPERATORS,
  GRANULARITIES,
  ORDER_DIRECTIONS,
  type FilterOrLogical,
  type LogicalOperator,
} from './types.js';

export const granularitySchema = z.enum(GRANULARITIES);

export const filterOperatorSchema = z.enum(FILTER_OPERATORS);

export const orderDirectionSchema = z.enum(ORDER_DIRECTIONS);

// ─── Time Dimensions ────────────────────────────────────────────────

/**
 * Either a list of YYYY-MM-DD / YYYY-MM-DDTHH:mm:ss.SSS dates
 * or a relative phrase such as "last quarter".
 */
const dateRangeSchema = z.union([z.array(z.string()), z.string()]);

export const timeDimensionSchema = z
  .object({
    dimension: z.string().min(1, 'dimension is required'),
    /** A default granularity or a custom one from the data model */
    granularity: z.union([granularitySchema, z.string().min(1)]).optional(),
    dateRange: dateRangeSchema.optional(),
    compareDateRange: z.array(dateRangeSchema).optional(),
  })
  .superRefine((data, ctx) => {
    if (data.dateRange !== undefined && data.compareDateRange !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Cannot provide both dateRange and compareDateRange',
      });
    }
    data.compareDateRange?.forEach((range, i) => {
      if (Array.isArray(range) && range.length !== 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Each compareDateRange entry must contain exactly 2 dates',
          path: ['compareDateRange', i],
        });
      }
    });
  });

// ─── Filters ────────────────────────────────────────────────────────

export const filterSchema = z.object({
  member: z.string({ required_error: 'member is required' }).min(1, 'member is required'),
  operator: z.string({ required_error: 'operator is required' }).min(1, 'operator is required'),
  values: z.array(z.string()).optional(),
});

// Strict so a stray key is reported instead of being dropped
export const logicalOperatorSchema: z.ZodType<LogicalOperator> = z
  .object({
    or: z.lazy(() => z.array(filterOrLogicalSchema)).optional(),
    and: z.lazy(() => z.array(filterOrLogicalSchema)).optional(),
  })
  .strict();

/**
 * Entries carrying `member` are leaf filters, everything else is a logical
 * node. Picking the branch up front keeps the issues of the matching schema.
 */
export const filterOrLogicalSchema: z.ZodType<FilterOrLogical> = z
  .custom<FilterOrLogical>()
  .transform((value: unknown, ctx) => {
    const isLeaf = typeof value === 'object' && value !== null && 'member' in value;
    const result = isLeaf ? filterSchema.safeParse(value) : logicalOperatorSchema.safeParse(value);
    if (result.success) return result.data;
    for (const issue of result.error.issues) {
      ctx.addIssue(issue);
    }
    return z.NEVER;
  });

// ─── Query ──────────────────────────────────────────────────────────

export const queryRequestSchema = z.object({
  measures: z.array(z.string()).default([]),
  timeDimensions: z.array(timeDimensionSchema).optional(),
  dimensions: z.array(z.string()).optional(),
  segments: z.array(z.string()).optional(),
  filters: z.array(filterOrLogicalSchema).default([]),
  order: z.record(z.string(), orderDirectionSchema).optional(),
  limit: z.number().int().optional(),
  offset: z.number().int().optional(),
});

export type TimeDimension = z.infer<typeof timeDimensionSchema>;
export type TimeDimensionInput = z.input<typeof timeDimensionSchema>;
export type QueryRequest = z.infer<typeof queryRequestSchema>;
export type QueryRequestInput = z.input<typeof queryRequestSchema>;

// ─── Auth & Response ────────────────────────────────────────────────

export const authSchema = z.object({
  token: z.string().min(1, 'token is required'),
  host: z.string().url('host must be an absolute URL'),
});

export const rowValueSchema = z.union([z.string(), z.number(), z.null()]);

/**
 * `/load` success body. Other top-level keys (query, annotation,
 * lastRefreshTime, ...) are stripped.
 */
export const queryResponseSchema = z.object({
  data: z.array(z.record(z.string(), rowValueSchema)),
});
