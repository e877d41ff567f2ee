import { parseArgs } from 'util';
import { DEFAULT_CONFIG_FILE, loadConfig, type InfobloxConnection } from './config.js';
import { InfobloxAdapter } from './adapters/providers/infoblox/infoblox.adapter.js';
import { NameserverOrchestrator, type RunResult } from './domain/services/nameserver.orchestrator.js';
import type { IZoneSource } from './domain/ports/zone-source.port.js';
import { errorMessage } from './domain/errors.js';
import { createLogger, toVerbosity, type Logger } from './utils/logger.js';

export const USAGE = `Usage: infoblox-nsconf [options] [${DEFAULT_CONFIG_FILE}]

Options:
  -h, --help       brief help message
  -v, --verbose    enable verbose output (may be used multiple times)
  -n, --dry-run    print generated configuration instead of writing files
`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  createSource: (connection: InfobloxConnection, logger: Logger) => IZoneSource;
}

export const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (line) => console.error(line),
  env: process.env,
  createSource: (connection, logger) => new InfobloxAdapter(connection, logger),
};

const CLI_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  'dry-run': { type: 'boolean', short: 'n' },
} as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
}

function summarize(result: RunResult, logger: Logger): void {
  for (const ns of result.nameservers) {
    const status = ns.error ? `failed: ${ns.error}` : `${ns.included} zones`;
    logger.info(`${ns.key} (${ns.hostname}) -> ${ns.outputFile}: ${status}`);
  }
  if (result.unnamedZones.length > 0) {
    logger.info(`${result.unnamedZones.length} zones skipped: name could not be canonicalized`);
  }
}

/**
 * Run the tool and return the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${errorMessage(error)}\n\n${USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (positionals.length > 1) {
    io.stderr(USAGE);
    return 2;
  }

  const logger = createLogger(toVerbosity(values.verbose?.length ?? 0), io.stderr);
  const dryRun = values['dry-run'] ?? false;

  try {
    const config = loadConfig(positionals[0] ?? DEFAULT_CONFIG_FILE, io.env);
    const source = io.createSource(config.infoblox, logger);
    const orchestrator = new NameserverOrchestrator(source, { logger, dryRun });

    const result = await orchestrator.run({
      view: config.infoblox.view,
      nameservers: config.nameservers,
    });

    if (dryRun) {
      for (const ns of result.nameservers) {
        if (ns.output !== undefined) {
          io.stdout(`### ${ns.outputFile}\n${ns.output}`);
        }
      }
    }

    summarize(result, logger);
    return result.nameservers.some((ns) => ns.error) ? 1 : 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }
}
