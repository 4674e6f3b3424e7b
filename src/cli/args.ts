/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for server configuration.
 */

import { isLogLevel, type LogLevel } from '../shared/services/logging.service.js';

/** Default NEO CSV path, relative to the working directory */
export const DEFAULT_NEO_FILE = 'data/neos.csv';

/** Default close-approach JSON path, relative to the working directory */
export const DEFAULT_CAD_FILE = 'data/cad.json';

/**
 * Server configuration from CLI arguments
 */
export interface ServerArgs {
  /** Path to the NEO CSV file */
  neoFile: string;

  /** Path to the close-approach JSON file */
  cadFile: string;

  /** Minimum log level; unset leaves the LOG_LEVEL default in place */
  logLevel?: LogLevel;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set(['neofile', 'cadfile', 'logLevel']);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const baseName = arg.slice(2).split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

/**
 * Split `--name=value` into its parts; `--name` alone yields no value.
 */
function splitInlineValue(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Parse command-line arguments into ServerArgs.
 *
 * Accepts `--neofile <path>`, `--cadfile <path>` and `--logLevel <level>`,
 * each also in `--name=value` form.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @returns Parsed server configuration
 */
export function parseArgs(argv: string[]): ServerArgs {
  const args: ServerArgs = {
    neoFile: DEFAULT_NEO_FILE,
    cadFile: DEFAULT_CAD_FILE,
  };

  for (let i = 0; i < argv.length; i++) {
    const [name, inline] = splitInlineValue(argv[i]);
    const takeValue = (): string | undefined => inline ?? (argv[i + 1] !== undefined ? argv[++i] : undefined);

    if (name === '--neofile') {
      args.neoFile = takeValue() ?? args.neoFile;
    } else if (name === '--cadfile') {
      args.cadFile = takeValue() ?? args.cadFile;
    } else if (name === '--logLevel') {
      const level = takeValue();
      if (isLogLevel(level)) {
        args.logLevel = level;
      } else {
        console.warn(`Warning: Unknown log level "${level}" - ignored`);
      }
    } else if (!isKnownArg(argv[i])) {
      // Warn about unknown arguments to catch typos like --neofle
      console.warn(`Warning: Unknown argument "${argv[i]}" - ignored`);
    }
  }

  return args;
}
