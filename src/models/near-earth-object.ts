/**
 * Near-Earth Object
 *
 * A NEO owns the close approaches linked to it. The list starts empty and
 * is filled once, in input order, when a NeoDatabase is built.
 */

import { McpError } from '../shared/errors/index.js';
import type { CloseApproach } from './close-approach.js';
import type { NeoRecord, NeoView } from './models.types.js';

export class NearEarthObject {
  readonly designation: string;
  readonly name: string | undefined;
  /** Kilometers, NaN when unknown */
  readonly diameter: number;
  readonly hazardous: boolean;

  private readonly linkedApproaches: CloseApproach[] = [];

  constructor(record: NeoRecord) {
    if (record.designation === '') {
      throw McpError.invalidArgument('NEO designation must not be empty');
    }
    this.designation = record.designation;
    this.name = record.name || undefined;
    this.diameter = record.diameter || Number.NaN;
    this.hazardous = record.hazardous;
  }

  /**
   * Close approaches linked to this object, in input order
   */
  get approaches(): readonly CloseApproach[] {
    return this.linkedApproaches;
  }

  /**
   * Designation followed by the name, when there is one
   */
  get fullname(): string {
    return this.name ? `${this.designation} ${this.name}` : this.designation;
  }

  /**
   * Record a linked approach. Only NeoDatabase calls this, once per approach.
   */
  addApproach(approach: CloseApproach): void {
    this.linkedApproaches.push(approach);
  }

  serialize(): NeoView {
    return {
      designation: this.designation,
      name: this.name ?? '',
      diameter_km: this.diameter,
      potentially_hazardous: this.hazardous,
    };
  }

  toString(): string {
    const size = Number.isNaN(this.diameter)
      ? 'has an unknown diameter'
      : `has a diameter of ${this.diameter.toFixed(3)} km`;
    return `NEO ${this.fullname} ${size} and is ${this.hazardous ? '' : 'not '}potentially hazardous.`;
  }
}
