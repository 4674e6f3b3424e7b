/**
 * Server Configuration
 *
 * Global server configuration combining CLI args and environment variables.
 * Provides ensureDatabaseForTools, which tool handlers call to get the
 * loaded database.
 */

import { parseArgs, DEFAULT_CAD_FILE, DEFAULT_NEO_FILE, type ServerArgs } from '../cli/args.js';
import { NeoDatabase } from '../database/index.js';
import { loadApproaches, loadNeos } from '../extract/index.js';
import { ErrorCode, ErrorSeverity, McpError } from '../shared/errors/index.js';
import { getLogger, isLogLevel } from '../shared/services/logging.service.js';

// Singleton instances
let serverConfig: ServerArgs | null = null;
let databaseLoad: Promise<NeoDatabase> | null = null;

/**
 * Initialize server configuration from CLI arguments and environment variables.
 *
 * NEO_FILE and CAD_FILE apply only where the matching flag was not given;
 * LOG_LEVEL applies when --logLevel was not given.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function initServerConfig(argv: string[]): ServerArgs {
  const args = parseArgs(argv);

  if (args.neoFile === DEFAULT_NEO_FILE && process.env.NEO_FILE) {
    args.neoFile = process.env.NEO_FILE;
  }
  if (args.cadFile === DEFAULT_CAD_FILE && process.env.CAD_FILE) {
    args.cadFile = process.env.CAD_FILE;
  }
  const envLevel = process.env.LOG_LEVEL;
  if (!args.logLevel && isLogLevel(envLevel)) {
    args.logLevel = envLevel;
  }

  if (args.logLevel) {
    getLogger().setMinLevel(args.logLevel);
  }

  serverConfig = args;
  return args;
}

/**
 * Get the current server configuration.
 * Throws if not initialized.
 */
export function getServerConfig(): ServerArgs {
  if (!serverConfig) {
    throw new McpError(
      'Server config not initialized. Call initServerConfig() first.',
      ErrorCode.CONFIG_NOT_INITIALIZED,
      ErrorSeverity.CRITICAL,
    );
  }
  return serverConfig;
}

async function loadDatabase(config: ServerArgs): Promise<NeoDatabase> {
  const logger = getLogger();
  const startTime = Date.now();

  const [neos, approaches] = await Promise.all([loadNeos(config.neoFile), loadApproaches(config.cadFile)]);
  const database = new NeoDatabase(neos, approaches);

  logger.info(`Database ready in ${Date.now() - startTime}ms`, {
    neoFile: config.neoFile,
    cadFile: config.cadFile,
  });
  return database;
}

/**
 * Ensure the database is loaded for tool execution.
 *
 * Loads both data files on first call and shares that load with every
 * later caller. A failed load is forgotten so the next call retries.
 */
export async function ensureDatabaseForTools(): Promise<NeoDatabase> {
  const config = getServerConfig();

  if (!databaseLoad) {
    const load = loadDatabase(config);
    databaseLoad = load;
    void load.catch(() => {
      if (databaseLoad === load) {
        databaseLoad = null;
      }
    });
  }
  return databaseLoad;
}

/**
 * Reset server state (for testing).
 */
export function resetServerState(): void {
  serverConfig = null;
  databaseLoad = null;
}
