/**
 * Entity Model Types
 *
 * Input records as produced by the loaders, and the flat views written
 * by the CSV and JSON writers.
 */

/**
 * NEO record as read from the source data
 */
export interface NeoRecord {
  /** Primary designation; the unique key */
  designation: string;
  /** IAU name, absent for most objects */
  name?: string | null;
  /** Estimated diameter in km; zero or absent means unknown */
  diameter?: number | null;
  /** Potentially hazardous object flag */
  hazardous: boolean;
}

/**
 * Close-approach record as read from the source data
 */
export interface ApproachRecord {
  /** Designation of the approaching NEO */
  designation: string;
  /** `YYYY-MMM-DD hh:mm` in UTC, or an already parsed date */
  time: string | Date;
  /** Nominal approach distance in au; zero or absent means unknown */
  distance?: number | null;
  /** Relative approach velocity in km/s; zero or absent means unknown */
  velocity?: number | null;
}

/**
 * Serialized NEO fields
 */
export type NeoView = {
  designation: string;
  /** Empty string when the NEO has no name */
  name: string;
  /** NaN when the diameter is unknown */
  diameter_km: number;
  potentially_hazardous: boolean;
};

/**
 * Serialized close-approach fields
 */
export type ApproachView = {
  /** `YYYY-MM-DD hh:mm` */
  datetime_utc: string;
  distance_au: number;
  velocity_km_s: number;
};
