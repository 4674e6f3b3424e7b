/**
 * Close Approach
 *
 * One pass of a NEO near Earth. Holds a back-reference to its NEO once
 * linked; approaches whose designation matches no loaded NEO stay unlinked.
 */

import { LinkageError } from '../shared/errors/index.js';
import { formatDate, formatDateTime, parseApproachTime } from '../lib/time.js';
import type { NearEarthObject } from './near-earth-object.js';
import type { ApproachRecord, ApproachView } from './models.types.js';

export class CloseApproach {
  readonly designation: string;
  /** UTC */
  readonly time: Date;
  /** Astronomical units, NaN when unknown */
  readonly distance: number;
  /** km/s, NaN when unknown */
  readonly velocity: number;

  private linkedNeo: NearEarthObject | null = null;

  constructor(record: ApproachRecord) {
    this.designation = record.designation;
    this.time = typeof record.time === 'string' ? parseApproachTime(record.time) : new Date(record.time);
    this.distance = record.distance || Number.NaN;
    this.velocity = record.velocity || Number.NaN;
  }

  /**
   * The NEO this approach belongs to, or null when unlinked
   */
  get neo(): NearEarthObject | null {
    return this.linkedNeo;
  }

  /** `YYYY-MM-DD hh:mm` */
  get timeStr(): string {
    return formatDateTime(this.time);
  }

  /** Calendar date of the approach, `YYYY-MM-DD` */
  get date(): string {
    return formatDate(this.time);
  }

  /**
   * Set the back-reference. Only NeoDatabase calls this.
   *
   * @throws LinkageError if the approach is already linked
   */
  linkTo(neo: NearEarthObject): void {
    if (this.linkedNeo) {
      throw new LinkageError(
        `Close approach at ${this.timeStr} is already linked to ${this.linkedNeo.designation}`,
        undefined,
        { designation: this.designation, time: this.timeStr },
      );
    }
    this.linkedNeo = neo;
  }

  serialize(): ApproachView {
    return {
      datetime_utc: this.timeStr,
      distance_au: this.distance,
      velocity_km_s: this.velocity,
    };
  }

  toString(): string {
    const who = this.linkedNeo ? this.linkedNeo.fullname : this.designation;
    return (
      `At ${this.timeStr}, '${who}' approaches Earth at a distance of ` +
      `${this.distance.toFixed(2)} au and a velocity of ${this.velocity.toFixed(2)} km/s.`
    );
  }
}
