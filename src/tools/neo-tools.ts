/**
 * NEO Tools
 *
 * MCP tool handlers for inspecting NEOs and querying close approaches.
 */

import type { z } from 'zod';
import type { CloseApproach } from '../models/close-approach.js';
import type { NearEarthObject } from '../models/near-earth-object.js';
import { createFilters, limit } from '../query/index.js';
import { toResultRow, writeResults } from '../write/index.js';
import { ensureDatabaseForTools } from '../server/server-config.js';
import { McpError } from '../shared/errors/index.js';
import {
  NeoInspectInputSchema,
  NeoQueryInputSchema,
  type ApproachSummary,
  type NeoInspectOutput,
  type NeoQueryOutput,
  type QueryResult,
} from './tool-schemas.js';

/**
 * Validate raw tool input, reporting problems as INVALID_ARGUMENT
 */
function parseInput<T extends z.ZodTypeAny>(schema: T, rawInput: unknown): z.output<T> {
  const result = schema.safeParse(rawInput ?? {});
  if (!result.success) {
    throw McpError.invalidArgument('Invalid tool input', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}

function summarizeApproach(approach: CloseApproach): ApproachSummary {
  return { ...approach.serialize(), description: approach.toString() };
}

function toQueryResult(approach: CloseApproach): QueryResult {
  return { ...toResultRow(approach), description: approach.toString() };
}

/**
 * neo_inspect: look up one NEO by designation or by name
 */
export async function inspectNeo(rawInput: unknown): Promise<NeoInspectOutput> {
  const input = parseInput(NeoInspectInputSchema, rawInput);

  if ((input.designation === undefined) === (input.name === undefined)) {
    throw McpError.invalidArgument('Provide exactly one of designation or name');
  }

  const database = await ensureDatabaseForTools();
  let neo: NearEarthObject | undefined;
  if (input.designation !== undefined) {
    neo = database.getNeoByDesignation(input.designation);
  } else if (input.name !== undefined) {
    neo = database.getNeoByName(input.name);
  }

  if (!neo) {
    return { found: false };
  }

  return {
    found: true,
    description: neo.toString(),
    neo: neo.serialize(),
    approaches: input.verbose ? neo.approaches.map(summarizeApproach) : undefined,
  };
}

/**
 * neo_query: filter close approaches, then return them or write them to a file
 */
export async function queryApproaches(rawInput: unknown): Promise<NeoQueryOutput> {
  const input = parseInput(NeoQueryInputSchema, rawInput);

  const filters = createFilters({
    date: input.date,
    startDate: input.start_date,
    endDate: input.end_date,
    distanceMin: input.distance_min,
    distanceMax: input.distance_max,
    velocityMin: input.velocity_min,
    velocityMax: input.velocity_max,
    diameterMin: input.diameter_min,
    diameterMax: input.diameter_max,
    hazardous: input.hazardous,
  });

  const database = await ensureDatabaseForTools();
  const results = limit(database.query(filters), input.limit);

  if (input.outfile) {
    const count = await writeResults(results, input.outfile);
    return { count, outfile: input.outfile };
  }

  const rows = Array.from(results, toQueryResult);
  return { count: rows.length, results: rows };
}
