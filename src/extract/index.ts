/**
 * Data Loaders Module
 */

export { loadNeos, loadApproaches } from './extract.js';
export { CadDocumentSchema, type CadDocument } from './extract.schemas.js';
