/**
 * Data Loaders
 *
 * Read NEOs from the CSV export and close approaches from the JSON export
 * into unlinked model instances. Any malformed record aborts the load with
 * a DataLoadError naming the file and row.
 */

import { readFile } from 'fs/promises';
import { parseCsvRecords } from '../lib/csv.js';
import { NearEarthObject } from '../models/near-earth-object.js';
import { CloseApproach } from '../models/close-approach.js';
import { DataLoadError, ErrorCode, McpError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';
import { CadDocumentSchema, CAD_FIELDS, NEO_CSV_COLUMNS } from './extract.schemas.js';

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new DataLoadError(
      `Cannot read data file: ${path}`,
      ErrorCode.DATA_LOAD_FAILED,
      { path },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Parse an optional numeric cell. Empty and null cells are unknown (null).
 */
function parseNumber(value: string | number | null | undefined, column: string): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (Number.isNaN(parsed)) {
    throw McpError.invalidArgument(`Column ${column} is not a number: "${value}"`, { column, value });
  }
  return parsed;
}

/**
 * Re-raise a per-row failure as a DataLoadError that names the file and row
 */
function rowError(path: string, row: number, error: unknown): DataLoadError {
  if (error instanceof McpError) {
    const code = error.code === ErrorCode.INVALID_TIMESTAMP ? error.code : ErrorCode.DATA_LOAD_FAILED;
    return new DataLoadError(`${path} row ${row}: ${error.message}`, code, { path, row, ...error.details }, error);
  }
  return new DataLoadError(
    `${path} row ${row}: ${String(error)}`,
    ErrorCode.DATA_LOAD_FAILED,
    { path, row },
    error instanceof Error ? error : undefined,
  );
}

/**
 * Read near-Earth objects from a CSV file with a header row.
 *
 * Uses the `pdes`, `name`, `diameter` and `pha` columns; `pha` of `Y`
 * marks a potentially hazardous object.
 */
export async function loadNeos(csvPath: string): Promise<NearEarthObject[]> {
  const { header, records } = parseCsvRecords(await readText(csvPath));

  const missing = NEO_CSV_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new DataLoadError(`${csvPath} is missing columns: ${missing.join(', ')}`, ErrorCode.DATA_LOAD_FAILED, {
      path: csvPath,
      missing,
    });
  }

  const neos = records.map((record, index) => {
    // Header is row 1
    const row = index + 2;
    try {
      return new NearEarthObject({
        designation: record.pdes,
        name: record.name || null,
        diameter: parseNumber(record.diameter, 'diameter'),
        hazardous: record.pha === 'Y',
      });
    } catch (error) {
      throw rowError(csvPath, row, error);
    }
  });

  getLogger().info('Loaded near-Earth objects', { path: csvPath, count: neos.length });
  return neos;
}

/**
 * Read close approaches from a JSON document of `fields` and `data` rows.
 *
 * Uses the `des`, `cd`, `dist` and `v_rel` fields.
 */
export async function loadApproaches(cadJsonPath: string): Promise<CloseApproach[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readText(cadJsonPath));
  } catch (error) {
    if (error instanceof DataLoadError) {
      throw error;
    }
    throw new DataLoadError(
      `${cadJsonPath} is not valid JSON`,
      ErrorCode.DATA_LOAD_FAILED,
      { path: cadJsonPath },
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = CadDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataLoadError(`${cadJsonPath} has an unexpected shape`, ErrorCode.DATA_LOAD_FAILED, {
      path: cadJsonPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { fields, data } = parsed.data;
  const missing = CAD_FIELDS.filter((field) => !fields.includes(field));
  if (missing.length > 0) {
    throw new DataLoadError(`${cadJsonPath} is missing fields: ${missing.join(', ')}`, ErrorCode.DATA_LOAD_FAILED, {
      path: cadJsonPath,
      missing,
    });
  }

  const columnOf = (field: (typeof CAD_FIELDS)[number]): number => fields.indexOf(field);
  const des = columnOf('des');
  const cd = columnOf('cd');
  const dist = columnOf('dist');
  const vRel = columnOf('v_rel');

  const approaches = data.map((cells, index) => {
    try {
      return new CloseApproach({
        designation: String(cells[des] ?? ''),
        time: String(cells[cd] ?? ''),
        distance: parseNumber(cells[dist], 'dist'),
        velocity: parseNumber(cells[vRel], 'v_rel'),
      });
    } catch (error) {
      throw rowError(cadJsonPath, index, error);
    }
  });

  getLogger().info('Loaded close approaches', { path: cadJsonPath, count: approaches.length });
  return approaches;
}
