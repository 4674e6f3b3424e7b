/**
 * Database Module
 */

export { NeoDatabase } from './neo-database.js';
export type { NeoDatabaseOptions, NeoDatabaseStats } from './neo-database.js';
