/**
 * Result Writers Module
 */

export {
  writeToCsv,
  writeToJson,
  writeResults,
  toResultRow,
  neoViewOf,
  CSV_FIELDNAMES,
  type ResultRow,
} from './write.js';
