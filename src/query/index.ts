/**
 * Query Module
 *
 * Filter predicates and result limiting for close-approach queries.
 */

export * from './types/filter.types.js';
export { matchesFilter, matchesAll, describeFilter, createFilters } from './filters.js';
export { limit } from './limit.js';
