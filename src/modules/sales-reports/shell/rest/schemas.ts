/**
 * Sales Reports REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 * Range checks on parameters happen in the core so that GraphQL and REST
 * report the same messages; these schemas only fix the types.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Report URL params schema.
 */
export const ReportParamsSchema = Type.Object(
  {
    reportId: Type.String({
      minLength: 1,
      maxLength: 64,
      description: 'Report identifier, e.g. sales-by-year',
    }),
  },
  { additionalProperties: false }
);

export type ReportParams = Static<typeof ReportParamsSchema>;

/**
 * Report query string schema. Reports ignore parameters they do not accept.
 */
export const ReportQuerySchema = Type.Object({
  year: Type.Optional(Type.Integer({ description: 'Target calendar year' })),
  fromYear: Type.Optional(Type.Integer({ description: 'First year (inclusive)' })),
  toYear: Type.Optional(Type.Integer({ description: 'Last year (inclusive)' })),
  referenceDate: Type.Optional(
    Type.String({ description: 'End of the recent-sales window, YYYY-MM-DD' })
  ),
  windowDays: Type.Optional(Type.Integer({ description: 'Length of the recent-sales window' })),
  limit: Type.Optional(Type.Integer({ description: 'Rows for top-N reports' })),
});

export type ReportQuery = Static<typeof ReportQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const ReportCellSchema = Type.Union([Type.String(), Type.Number(), Type.Null()]);

const ReportColumnSchema = Type.Object({
  name: Type.String(),
  type: Type.Union([Type.Literal('integer'), Type.Literal('decimal'), Type.Literal('string')]),
});

const ReportDefinitionSchema = Type.Object({
  id: Type.String(),
  number: Type.Integer(),
  title: Type.String(),
  description: Type.String(),
  note: Type.String(),
  parameters: Type.Array(Type.String()),
  columns: Type.Array(ReportColumnSchema),
});

const ReportTableSchema = Type.Object({
  report: Type.String(),
  parameters: Type.Record(Type.String(), ReportCellSchema),
  columns: Type.Array(ReportColumnSchema),
  rows: Type.Array(Type.Record(Type.String(), ReportCellSchema)),
});

/**
 * Success response with the catalogue.
 */
export const ReportCatalogueResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(ReportDefinitionSchema),
});

/**
 * Success response with one report table.
 */
export const ReportTableResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: ReportTableSchema,
});

/**
 * Success response with every report table, in catalogue order.
 */
export const ReportTablesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(ReportTableSchema),
});

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
