/**
 * Source Data Schemas
 *
 * Zod schemas for the close-approach JSON document and the column names
 * both loaders depend on.
 */

import { z } from 'zod';

/**
 * Close-approach data: a column list plus rows of cells in that order
 */
export const CadDocumentSchema = z.object({
  /** Optional signature block written by the data source */
  signature: z.object({ version: z.string(), source: z.string() }).partial().optional(),
  /** Reported row count; informational only */
  count: z.union([z.string(), z.number()]).optional(),
  fields: z.array(z.string()).min(1),
  data: z.array(z.array(z.union([z.string(), z.number(), z.null()]))),
});

export type CadDocument = z.infer<typeof CadDocumentSchema>;

/** Columns read from the NEO CSV file */
export const NEO_CSV_COLUMNS = ['pdes', 'name', 'diameter', 'pha'] as const;

/** Columns read from the close-approach JSON file */
export const CAD_FIELDS = ['des', 'cd', 'dist', 'v_rel'] as const;
