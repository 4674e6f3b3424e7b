/**
 * Entity Model
 */

export * from './models.types.js';
export { NearEarthObject } from './near-earth-object.js';
export { CloseApproach } from './close-approach.js';
