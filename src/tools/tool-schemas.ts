/**
 * MCP Tool Schemas
 *
 * Zod schemas for tool inputs and outputs.
 * Used for validation and type inference.
 */

import { z } from 'zod';

// Unknown diameters, distances and velocities are NaN
const measure = z.union([z.number(), z.nan()]);

const calendarDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD form');

const bound = z.number().nonnegative();

// ============================================================================
// Shared Row Schemas
// ============================================================================

/** NEO fields as serialized by NearEarthObject.serialize() */
export const NeoViewSchema = z.object({
  designation: z.string(),
  /** Empty string when the NEO has no name */
  name: z.string(),
  diameter_km: measure,
  potentially_hazardous: z.boolean(),
});

/** Close-approach fields plus a one-line description */
export const ApproachSummarySchema = z.object({
  datetime_utc: z.string(),
  distance_au: measure,
  velocity_km_s: measure,
  description: z.string(),
});

export type ApproachSummary = z.infer<typeof ApproachSummarySchema>;

/** A query result row: approach fields with the NEO nested */
export const QueryResultSchema = ApproachSummarySchema.extend({
  neo: NeoViewSchema,
});

export type QueryResult = z.infer<typeof QueryResultSchema>;

// ============================================================================
// neo_inspect
// ============================================================================

export const NeoInspectInputSchema = z.object({
  /** Primary designation, matched case-insensitively (e.g. "433") */
  designation: z.string().min(1).optional(),
  /** IAU name; the first letter is capitalized before matching (e.g. "eros") */
  name: z.string().min(1).optional(),
  /** Include every close approach of the NEO */
  verbose: z.boolean().default(false),
});

export type NeoInspectInput = z.infer<typeof NeoInspectInputSchema>;

export const NeoInspectOutputSchema = z.object({
  found: z.boolean(),
  description: z.string().optional(),
  neo: NeoViewSchema.optional(),
  approaches: z.array(ApproachSummarySchema).optional(),
});

export type NeoInspectOutput = z.infer<typeof NeoInspectOutputSchema>;

// ============================================================================
// neo_query
// ============================================================================

export const NeoQueryInputSchema = z.object({
  /** Only approaches on this date */
  date: calendarDate.optional(),
  /** Only approaches on or after this date */
  start_date: calendarDate.optional(),
  /** Only approaches on or before this date */
  end_date: calendarDate.optional(),
  /** Minimum nominal approach distance, au */
  distance_min: bound.optional(),
  /** Maximum nominal approach distance, au */
  distance_max: bound.optional(),
  /** Minimum relative approach velocity, km/s */
  velocity_min: bound.optional(),
  /** Maximum relative approach velocity, km/s */
  velocity_max: bound.optional(),
  /** Minimum NEO diameter, km */
  diameter_min: bound.optional(),
  /** Maximum NEO diameter, km */
  diameter_max: bound.optional(),
  /** Only (non-)hazardous NEOs */
  hazardous: z.boolean().optional(),
  /** Maximum number of results; 0 means no limit */
  limit: z.number().int().nonnegative().default(10),
  /** Write results to this .csv or .json file instead of returning them */
  outfile: z.string().min(1).optional(),
});

export type NeoQueryInput = z.infer<typeof NeoQueryInputSchema>;

export const NeoQueryOutputSchema = z.object({
  count: z.number().int(),
  results: z.array(QueryResultSchema).optional(),
  outfile: z.string().optional(),
});

export type NeoQueryOutput = z.infer<typeof NeoQueryOutputSchema>;
