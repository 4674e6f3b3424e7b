/**
 * Server Types
 *
 * Core types for server orchestration
 */

/**
 * MCP Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  capabilities: {
    tools?: Record<string, unknown>;
    logging?: Record<string, unknown>;
  };
}

/**
 * Tool handler collection, injected so tests can substitute fakes
 */
export interface ToolHandlers {
  inspect: (rawInput: unknown) => Promise<Record<string, unknown>>;
  query: (rawInput: unknown) => Promise<Record<string, unknown>>;
}
