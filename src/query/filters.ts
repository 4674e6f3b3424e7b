/**
 * Close-Approach Filters
 *
 * Evaluates tagged filters against close approaches and builds the filter
 * list for a set of query criteria.
 *
 * NEO-derived filters (diameter, hazardous) never match an approach that
 * has no linked NEO. Any comparison against NaN is false, so approaches
 * with an unknown distance, velocity or diameter drop out of range filters
 * on that attribute.
 */

import type { CloseApproach } from '../models/close-approach.js';
import { UnsupportedCriterionError } from '../shared/errors/index.js';
import { parseCalendarDate } from '../lib/time.js';
import type {
  CloseApproachFilter,
  Comparator,
  FilterCriteria,
  FilterKind,
} from './types/filter.types.js';

const OPERATOR_SYMBOLS: Record<Comparator, string> = {
  eq: '==',
  le: '<=',
  ge: '>=',
};

function kindOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return String(value);
}

/**
 * Reached only when untyped input carries a kind or operator with no handler
 */
function unsupported(value: never, what: string): never {
  throw new UnsupportedCriterionError(`${what} ${kindOf(value)}`.trim());
}

function compareNumbers(actual: number, op: Comparator, expected: number): boolean {
  switch (op) {
    case 'eq':
      return actual === expected;
    case 'le':
      return actual <= expected;
    case 'ge':
      return actual >= expected;
    default:
      return unsupported(op, 'operator');
  }
}

// `YYYY-MM-DD` strings order the same way the dates do
function compareDates(actual: string, op: Comparator, expected: string): boolean {
  switch (op) {
    case 'eq':
      return actual === expected;
    case 'le':
      return actual <= expected;
    case 'ge':
      return actual >= expected;
    default:
      return unsupported(op, 'operator');
  }
}

/**
 * Check whether a close approach satisfies a single filter
 *
 * @throws UnsupportedCriterionError for a filter kind or operator with no handler
 */
export function matchesFilter(filter: CloseApproachFilter, approach: CloseApproach): boolean {
  switch (filter.kind) {
    case 'distance':
      return compareNumbers(approach.distance, filter.op, filter.value);
    case 'velocity':
      return compareNumbers(approach.velocity, filter.op, filter.value);
    case 'diameter':
      return approach.neo !== null && compareNumbers(approach.neo.diameter, filter.op, filter.value);
    case 'hazardous':
      return (
        approach.neo !== null &&
        compareNumbers(Number(approach.neo.hazardous), filter.op, Number(filter.value))
      );
    case 'date':
      return compareDates(approach.date, filter.op, filter.value);
    default:
      return unsupported(filter, '');
  }
}

/**
 * Check whether a close approach satisfies every filter (empty list: always)
 */
export function matchesAll(filters: readonly CloseApproachFilter[], approach: CloseApproach): boolean {
  return filters.every((filter) => matchesFilter(filter, approach));
}

/**
 * Render a filter for logs, e.g. `distance <= 0.5`
 */
export function describeFilter(filter: CloseApproachFilter): string {
  return `${filter.kind} ${OPERATOR_SYMBOLS[filter.op]} ${String(filter.value)}`;
}

function rangeFilter(
  kind: Exclude<FilterKind, 'hazardous' | 'date'>,
  op: Comparator,
  value: number | undefined,
): CloseApproachFilter[] {
  return value === undefined ? [] : [{ kind, op, value }];
}

function dateFilter(op: Comparator, value: string | undefined): CloseApproachFilter[] {
  return value === undefined ? [] : [{ kind: 'date', op, value: parseCalendarDate(value) }];
}

/**
 * Build one filter per criterion that is set.
 *
 * Order is fixed: dates, velocity, distance, hazardous, diameter.
 * A bound of zero is a real bound.
 *
 * @throws McpError with code INVALID_ARGUMENT for a malformed date
 */
export function createFilters(criteria: FilterCriteria = {}): CloseApproachFilter[] {
  const hazardous: CloseApproachFilter[] =
    criteria.hazardous === undefined ? [] : [{ kind: 'hazardous', op: 'eq', value: criteria.hazardous }];

  return [
    ...dateFilter('eq', criteria.date),
    ...dateFilter('ge', criteria.startDate),
    ...dateFilter('le', criteria.endDate),
    ...rangeFilter('velocity', 'ge', criteria.velocityMin),
    ...rangeFilter('velocity', 'le', criteria.velocityMax),
    ...rangeFilter('distance', 'ge', criteria.distanceMin),
    ...rangeFilter('distance', 'le', criteria.distanceMax),
    ...hazardous,
    ...rangeFilter('diameter', 'ge', criteria.diameterMin),
    ...rangeFilter('diameter', 'le', criteria.diameterMax),
  ];
}
