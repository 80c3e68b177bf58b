/**
 * Weather Module REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const StationIdParam = Type.String({
  description: "Filter by station id (e.g. 'USC00110072')",
});

const PageParam = Type.Integer({ description: 'Page number, starting at 1 (max 1000000)' });

const PageSizeParam = Type.Integer({ description: 'Records per page (max 1000)' });

/**
 * Observation query string schema.
 */
export const ObservationQuerySchema = Type.Object(
  {
    station_id: Type.Optional(StationIdParam),
    date: Type.Optional(Type.String({ description: 'Filter by date (YYYY-MM-DD)' })),
    page: Type.Optional(PageParam),
    pageSize: Type.Optional(PageSizeParam),
  },
  { additionalProperties: false }
);

export type ObservationQuery = Static<typeof ObservationQuerySchema>;

/**
 * Annual statistics query string schema.
 */
export const AnnualStatQuerySchema = Type.Object(
  {
    station_id: Type.Optional(StationIdParam),
    year: Type.Optional(Type.Integer({ description: 'Filter by year (e.g. 1990)' })),
    page: Type.Optional(PageParam),
    pageSize: Type.Optional(PageSizeParam),
  },
  { additionalProperties: false }
);

export type AnnualStatQuery = Static<typeof AnnualStatQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

export const ObservationItemSchema = Type.Object({
  station_id: Type.String(),
  date: Type.String({ description: 'YYYY-MM-DD' }),
  max_temp: Type.Integer({ description: 'Tenths of a degree Celsius, -9999 when missing' }),
  min_temp: Type.Integer({ description: 'Tenths of a degree Celsius, -9999 when missing' }),
  precipitation: Type.Integer({ description: 'Tenths of a millimeter, -9999 when missing' }),
});

export type ObservationItem = Static<typeof ObservationItemSchema>;

export const AnnualStatItemSchema = Type.Object({
  station_id: Type.String(),
  year: Type.Integer(),
  avg_max_temp: NullableNumber,
  avg_min_temp: NullableNumber,
  total_precipitation: NullableNumber,
});

export type AnnualStatItem = Static<typeof AnnualStatItemSchema>;

const PaginationSchema = Type.Object({
  page: Type.Integer(),
  pageSize: Type.Integer(),
  totalPages: Type.Integer(),
  totalRecords: Type.Integer(),
});

export const ObservationListResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(ObservationItemSchema),
  pagination: PaginationSchema,
  queryTime: Type.Number({ description: 'Milliseconds spent serving the request' }),
});

export type ObservationListResponse = Static<typeof ObservationListResponseSchema>;

export const AnnualStatListResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(AnnualStatItemSchema),
  pagination: PaginationSchema,
  queryTime: Type.Number({ description: 'Milliseconds spent serving the request' }),
});

export type AnnualStatListResponse = Static<typeof AnnualStatListResponseSchema>;

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
