/**
 * NEO Database
 *
 * Holds the loaded NEOs and close approaches, links them once at
 * construction, and answers lookups and filtered queries by linear scan.
 * Nothing is added or removed after construction.
 */

import type { NearEarthObject } from '../models/near-earth-object.js';
import type { CloseApproach } from '../models/close-approach.js';
import type { CloseApproachFilter } from '../query/types/filter.types.js';
import { matchesAll, describeFilter } from '../query/filters.js';
import { DuplicateDesignationError } from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

/**
 * Database options
 */
export interface NeoDatabaseOptions {
  /** Logger for linkage and query diagnostics (default: global logger) */
  logger?: Logger;
}

/**
 * Counts describing a linked database
 */
export interface NeoDatabaseStats {
  neoCount: number;
  approachCount: number;
  /** Approaches attached to a loaded NEO */
  linkedCount: number;
  /** Approaches whose designation matched no loaded NEO */
  orphanCount: number;
}

function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export class NeoDatabase {
  private readonly neos: readonly NearEarthObject[];
  private readonly approaches: readonly CloseApproach[];
  private readonly logger: Logger;
  private readonly linkedCount: number;

  /**
   * Link every approach to the NEO with the same designation.
   *
   * @throws DuplicateDesignationError if two NEOs share a designation
   * @throws LinkageError if an approach was already linked by another database
   */
  constructor(
    neos: readonly NearEarthObject[],
    approaches: readonly CloseApproach[],
    options: NeoDatabaseOptions = {},
  ) {
    this.neos = neos;
    this.approaches = approaches;
    this.logger = options.logger ?? getLogger();

    const byDesignation = new Map<string, NearEarthObject>();
    for (const neo of neos) {
      if (byDesignation.has(neo.designation)) {
        throw new DuplicateDesignationError(neo.designation);
      }
      byDesignation.set(neo.designation, neo);
    }

    let linked = 0;
    for (const approach of approaches) {
      const neo = byDesignation.get(approach.designation);
      if (neo) {
        approach.linkTo(neo);
        neo.addApproach(approach);
        linked++;
      }
    }
    this.linkedCount = linked;

    this.logger.info('NEO database linked', { ...this.getStats() });
  }

  /**
   * Find a NEO by primary designation. Input is upper-cased before the
   * exact comparison.
   */
  getNeoByDesignation(designation: string): NearEarthObject | undefined {
    const wanted = designation.toUpperCase();
    return this.neos.find((neo) => neo.designation === wanted);
  }

  /**
   * Find a NEO by name. The first character of the input is upper-cased,
   * the rest is compared as given.
   */
  getNeoByName(name: string): NearEarthObject | undefined {
    const wanted = capitalize(name);
    return this.neos.find((neo) => neo.name === wanted);
  }

  /**
   * Yield, in input order, every close approach that matches all filters.
   * Each call starts a fresh scan.
   */
  *query(filters: readonly CloseApproachFilter[] = []): Generator<CloseApproach> {
    if (filters.length > 0) {
      this.logger.debug('Querying close approaches', { filters: filters.map(describeFilter) });
    }
    for (const approach of this.approaches) {
      if (matchesAll(filters, approach)) {
        yield approach;
      }
    }
  }

  getStats(): NeoDatabaseStats {
    return {
      neoCount: this.neos.length,
      approachCount: this.approaches.length,
      linkedCount: this.linkedCount,
      orphanCount: this.approaches.length - this.linkedCount,
    };
  }
}
