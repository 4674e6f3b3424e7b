/**
 * MCP Server
 *
 * Registers the NEO tools on an MCP server over stdio, routes log entries
 * to the client as notifications, and wraps every tool call with logging
 * and structured error responses.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig, ToolHandlers } from './types.js';
import {
  NeoInspectInputSchema,
  NeoInspectOutputSchema,
  NeoQueryInputSchema,
  NeoQueryOutputSchema,
} from '../tools/tool-schemas.js';
import {
  createSuccessResponse,
  createErrorResponse,
  McpError,
  type McpToolResponse,
} from '../shared/errors/index.js';
import {
  getLogger,
  isLogLevel,
  type LogLevel,
  type McpNotificationSender,
} from '../shared/services/logging.service.js';

/**
 * Run a tool handler, logging its duration and converting failures
 * into error responses
 */
export async function executeWithLogging(
  toolName: string,
  handler: () => Promise<Record<string, unknown>>,
): Promise<McpToolResponse> {
  const logger = getLogger();
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await handler();
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return createSuccessResponse(result);
  } catch (error) {
    const executionTime = Date.now() - startTime;
    if (error instanceof McpError) {
      logger.logAtSeverity(error.severity, `Tool ${toolName} failed after ${executionTime}ms`, error, {
        toolName,
        code: error.code,
      });
    } else {
      logger.error(
        `Tool ${toolName} failed after ${executionTime}ms`,
        error instanceof Error ? error : undefined,
        { toolName },
      );
    }
    return createErrorResponse(error);
  }
}

/**
 * NEO Query MCP Server
 */
export class NeoQueryServer implements McpNotificationSender {
  private readonly server: McpServer;
  private readonly transport: StdioServerTransport;

  constructor(
    private readonly config: ServerConfig,
    private readonly handlers: ToolHandlers,
  ) {
    this.server = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: config.capabilities,
      },
    );

    this.transport = new StdioServerTransport();

    this.registerLoggingHandlers();
    this.registerTools();
  }

  /**
   * Send logging message notification via MCP protocol
   */
  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  /**
   * Handle logging/setLevel requests
   */
  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const logger = getLogger();
      const { level } = request.params;
      if (isLogLevel(level)) {
        logger.setMinLevel(level);
        logger.info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerTools(): void {
    this.server.registerTool(
      'neo_inspect',
      {
        title: 'Inspect NEO',
        description: `Look up a near-Earth object by primary designation or by name.

Provide exactly one of designation or name. Designations are matched
case-insensitively; names have their first letter capitalized before matching.
Set verbose to list every close approach of the object.

Examples:
{designation: "433"}
{name: "eros", verbose: true}`,
        inputSchema: NeoInspectInputSchema.shape,
        outputSchema: NeoInspectOutputSchema.shape,
      },
      async (input) => executeWithLogging('neo_inspect', () => this.handlers.inspect(input)),
    );

    this.server.registerTool(
      'neo_query',
      {
        title: 'Query Close Approaches',
        description: `Find close approaches matching every given criterion.

Dates are YYYY-MM-DD and inclusive. Distances are in au, velocities in km/s,
diameters in km. Results come back in data-file order, at most "limit" of them
(default 10, 0 for all). Set outfile to a .csv or .json path to write the
results to disk instead.

Examples:
{date: "2020-01-01"}
{start_date: "2020-01-01", end_date: "2020-12-31", distance_max: 0.1, hazardous: true}
{velocity_min: 30, limit: 0, outfile: "fast.csv"}`,
        inputSchema: NeoQueryInputSchema.shape,
        outputSchema: NeoQueryOutputSchema.shape,
      },
      async (input) => executeWithLogging('neo_query', () => this.handlers.query(input)),
    );
  }

  /**
   * Start the MCP server and route log entries to the client
   */
  async start(): Promise<void> {
    await this.server.connect(this.transport);
    getLogger().setMcpServer(this);

    console.error(`${this.config.name} v${this.config.version} started`);
  }

  /**
   * Stop the MCP server
   */
  async stop(): Promise<void> {
    getLogger().setMcpServer(null);
    await this.server.close();
  }
}
