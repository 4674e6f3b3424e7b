/**
 * Result Writers
 *
 * Write a stream of close approaches to CSV or JSON. Each output row merges
 * the approach's fields with those of its NEO.
 */

import { writeFile } from 'fs/promises';
import { extname } from 'path';
import type { CloseApproach } from '../models/close-approach.js';
import type { ApproachView, NeoView } from '../models/models.types.js';
import { formatCsvRow } from '../lib/csv.js';
import { ErrorCode, ErrorSeverity, McpError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

/** CSV column order */
export const CSV_FIELDNAMES = [
  'datetime_utc',
  'distance_au',
  'velocity_km_s',
  'designation',
  'name',
  'diameter_km',
  'potentially_hazardous',
] as const;

/**
 * One close approach with its NEO nested, as written to JSON
 */
export type ResultRow = ApproachView & { neo: NeoView };

/**
 * NEO fields for an approach, with a placeholder for unlinked approaches
 */
export function neoViewOf(approach: CloseApproach): NeoView {
  if (approach.neo) {
    return approach.neo.serialize();
  }
  return {
    designation: approach.designation,
    name: '',
    diameter_km: Number.NaN,
    potentially_hazardous: false,
  };
}

export function toResultRow(approach: CloseApproach): ResultRow {
  return { ...approach.serialize(), neo: neoViewOf(approach) };
}

function toCsvFields(approach: CloseApproach): string[] {
  const merged: Record<(typeof CSV_FIELDNAMES)[number], string | number | boolean> = {
    ...approach.serialize(),
    ...neoViewOf(approach),
  };
  return CSV_FIELDNAMES.map((field) => String(merged[field]));
}

async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf8');
  } catch (error) {
    throw new McpError(
      `Cannot write output file: ${path}`,
      ErrorCode.WRITE_FAILED,
      ErrorSeverity.ERROR,
      { path },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Write close approaches as CSV with a header row.
 * Unknown numbers are written as `NaN`.
 *
 * @returns Number of data rows written
 */
export async function writeToCsv(results: Iterable<CloseApproach>, path: string): Promise<number> {
  const lines = [formatCsvRow(CSV_FIELDNAMES)];
  for (const approach of results) {
    lines.push(formatCsvRow(toCsvFields(approach)));
  }
  await writeOutput(path, lines.join(''));

  const count = lines.length - 1;
  getLogger().info('Wrote CSV results', { path, count });
  return count;
}

/**
 * Write close approaches as a JSON array, NEO fields nested under `neo`.
 * JSON has no NaN, so unknown numbers are written as null.
 *
 * @returns Number of rows written
 */
export async function writeToJson(results: Iterable<CloseApproach>, path: string): Promise<number> {
  const rows: ResultRow[] = [];
  for (const approach of results) {
    rows.push(toResultRow(approach));
  }
  await writeOutput(path, `${JSON.stringify(rows, null, 2)}\n`);

  getLogger().info('Wrote JSON results', { path, count: rows.length });
  return rows.length;
}

/**
 * Pick the writer from the file extension (.csv or .json)
 *
 * @throws McpError with code UNSUPPORTED_OUTPUT_FORMAT for any other extension
 */
export async function writeResults(results: Iterable<CloseApproach>, path: string): Promise<number> {
  const extension = extname(path).toLowerCase();
  switch (extension) {
    case '.csv':
      return writeToCsv(results, path);
    case '.json':
      return writeToJson(results, path);
    default:
      throw new McpError(
        `Unsupported output format "${extension || path}", use .csv or .json`,
        ErrorCode.UNSUPPORTED_OUTPUT_FORMAT,
        ErrorSeverity.WARNING,
        { path },
      );
  }
}
