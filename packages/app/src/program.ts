/**
 * Command-line program: `barvault data <list|check|fetch|import>`
 */

import { Command as CommanderCommand, CommanderError, Option } from 'commander';
import chalk from 'chalk';
import type { RemoteDataClient } from '@barvault/contracts';
import { attachGlobalHandlers, createLogger, withCorrelation } from '@barvault/logger';
import type { Logger } from '@barvault/logger';
import { loadConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { createDataServices } from './services/data-services.js';
import { createDataCommands, formatCommandError } from './commands/index.js';
import type { CommandOptions, OutputFormat } from './commands/index.js';

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  output?: CliOutput;

  /** Used instead of a logger built from configuration */
  logger?: Logger;

  /** Overrides the client chosen by PROVIDER_TYPE */
  client?: RemoteDataClient | null;

  /** Limiter and retry delays */
  sleep?: (ms: number) => Promise<void>;

  /** Install process-level error handlers (the bin entry does) */
  attachGlobalHandlers?: boolean;
}

interface GlobalOptions {
  format: OutputFormat;
  verbose: boolean;
  catalog?: string;
  provider?: string;
}

const consoleOutput: CliOutput = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function createConfiguredLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * Parses `argv` (without the node and script entries), runs the command and
 * resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  let exitCode = 0;

  const program = new CommanderCommand();
  program
    .name('barvault')
    .description('Historical bar catalog: inspect, fetch and import cached market data')
    .version('0.1.0')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json', 'table']).default('text'))
    .option('-v, --verbose', 'Show error context and stack traces', false)
    .option('-c, --catalog <path>', 'Catalog root (overrides CATALOG_PATH)')
    .option('-p, --provider <type>', 'Remote provider: none or fixture (overrides PROVIDER_TYPE)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.stdout(text.trimEnd()),
      writeErr: (text) => output.stderr(text.trimEnd()),
    });

  const run = async (name: string, args: string[], commandOptions: CommandOptions): Promise<void> => {
    exitCode = await execute(name, args, commandOptions, program.opts<GlobalOptions>(), deps, output);
  };

  const data = program.command('data').description('Catalog data commands');

  data
    .command('list')
    .description('List cached ranges and descriptor presence')
    .argument('[instrument]', 'Only show this SYMBOL.VENUE')
    .action(async (instrument: string | undefined) => {
      await run('data-list', instrument ? [instrument] : [], {});
    });

  data
    .command('check')
    .description('Report whether a range is covered by the catalog')
    .argument('<instrument>', 'SYMBOL.VENUE')
    .argument('<start>', 'Range start (date or timestamp)')
    .argument('[end]', 'Range end, defaults to start')
    .option('-t, --timeframe <spec>', 'Timeframe spec or alias, e.g. 1-MINUTE-LAST or 1D')
    .action(async (instrument: string, start: string, end: string | undefined, options: { timeframe?: string }) => {
      await run('data-check', end ? [instrument, start, end] : [instrument, start], options);
    });

  data
    .command('fetch')
    .description('Load a range from the catalog, fetching it remotely when missing')
    .argument('<instrument>', 'SYMBOL.VENUE')
    .argument('<start>', 'Range start (date or timestamp)')
    .argument('[end]', 'Range end, defaults to start')
    .option('-t, --timeframe <spec>', 'Timeframe spec or alias, e.g. 1-MINUTE-LAST or 1D')
    .action(async (instrument: string, start: string, end: string | undefined, options: { timeframe?: string }) => {
      await run('data-fetch', end ? [instrument, start, end] : [instrument, start], options);
    });

  data
    .command('import')
    .description('Import bars for one instrument from a CSV file')
    .argument('<file>', 'CSV with timestamp,open,high,low,close,volume columns')
    .requiredOption('-s, --symbol <symbol>', 'Instrument symbol')
    .requiredOption('--venue <venue>', 'Instrument venue')
    .option('-t, --timeframe <spec>', 'Timeframe of the rows (default: intraday timeframe)')
    .option('--policy <policy>', 'Existing-data policy: skip, overwrite or merge')
    .action(
      async (file: string, options: { symbol: string; venue: string; timeframe?: string; policy?: string }) => {
        await run('data-import', [file], options);
      }
    );

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

async function execute(
  name: string,
  args: string[],
  commandOptions: CommandOptions,
  globals: GlobalOptions,
  deps: CliDependencies,
  output: CliOutput
): Promise<number> {
  const env: NodeJS.ProcessEnv = { ...(deps.env ?? process.env) };
  if (globals.catalog) env['CATALOG_PATH'] = globals.catalog;
  if (globals.provider) env['PROVIDER_TYPE'] = globals.provider;

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    output.stderr(chalk.red(formatCommandError(error, globals.verbose)));
    return 1;
  }

  const logger = deps.logger ?? createConfiguredLogger(config);
  if (deps.attachGlobalHandlers) {
    attachGlobalHandlers(logger);
  }

  return withCorrelation(
    async () => {
      const services = createDataServices(config, { logger, client: deps.client, sleep: deps.sleep });
      try {
        await services.initialize();
      } catch (error) {
        logger.error('Catalog scan failed', { error });
        output.stderr(chalk.red(formatCommandError(error, globals.verbose)));
        return 1;
      }

      const command = createDataCommands(services, logger).get(name);
      if (!command) {
        output.stderr(chalk.red(`Unknown command: ${name}`));
        return 1;
      }

      const result = await command.execute(args, { ...commandOptions, format: globals.format, verbose: globals.verbose });
      logger.debug('Command finished', { command: name, success: result.success, duration_ms: result.duration });

      if (result.output !== null) {
        output.stdout(result.output);
      }
      if (result.success) {
        return 0;
      }
      if (result.error) {
        output.stderr(chalk.red(formatCommandError(result.error, globals.verbose)));
      } else {
        output.stderr(chalk.yellow(`${name} finished with problems, see above`));
      }
      return 1;
    },
    undefined,
    { command: name }
  );
}
