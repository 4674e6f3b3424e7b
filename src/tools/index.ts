/**
 * MCP Tools Module
 *
 * NEO tools exposed via MCP protocol.
 */

export { inspectNeo, queryApproaches } from './neo-tools.js';

// Server config - lazy database loading
export { ensureDatabaseForTools } from '../server/server-config.js';

export {
  NeoInspectInputSchema,
  NeoInspectOutputSchema,
  type NeoInspectInput,
  type NeoInspectOutput,
  NeoQueryInputSchema,
  NeoQueryOutputSchema,
  type NeoQueryInput,
  type NeoQueryOutput,
  type QueryResult,
  type ApproachSummary,
} from './tool-schemas.js';
