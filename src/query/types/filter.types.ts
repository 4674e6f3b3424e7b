/**
 * Filter Types
 *
 * A filter compares one attribute of a close approach (or of its NEO)
 * against a reference value. A list of filters is a conjunctive query.
 */

/**
 * Comparison applied as `extracted OP value`
 */
export type Comparator = 'eq' | 'le' | 'ge';

interface AttributeFilter<K extends string, V> {
  kind: K;
  op: Comparator;
  value: V;
}

/** Nominal approach distance, au */
export type DistanceFilter = AttributeFilter<'distance', number>;

/** Relative approach velocity, km/s */
export type VelocityFilter = AttributeFilter<'velocity', number>;

/** Diameter of the linked NEO, km */
export type DiameterFilter = AttributeFilter<'diameter', number>;

/** Hazard flag of the linked NEO */
export type HazardousFilter = AttributeFilter<'hazardous', boolean>;

/** Calendar date of the approach, `YYYY-MM-DD` */
export type DateFilter = AttributeFilter<'date', string>;

export type CloseApproachFilter =
  | DistanceFilter
  | VelocityFilter
  | DiameterFilter
  | HazardousFilter
  | DateFilter;

export type FilterKind = CloseApproachFilter['kind'];

/**
 * User-facing query criteria. Every field is optional; each one that is
 * set becomes exactly one filter.
 */
export interface FilterCriteria {
  /** Approach on this date */
  date?: string;
  /** Approach on or after this date */
  startDate?: string;
  /** Approach on or before this date */
  endDate?: string;
  distanceMin?: number;
  distanceMax?: number;
  velocityMin?: number;
  velocityMax?: number;
  diameterMin?: number;
  diameterMax?: number;
  hazardous?: boolean;
}
