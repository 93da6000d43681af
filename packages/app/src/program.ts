/**
 * Command-line program definition
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from '@tseries/logger';
import {
  TwelveDataProvider,
  type TwelveDataProviderOptions,
} from '@tseries/provider-twelvedata';
import { toProviderOptions, type Config } from './config/index.js';
import {
  TimeSeriesCommand,
  describeFailure,
  type TimeSeriesCommandOptions,
} from './commands/time-series.command.js';
import type { SeriesSource } from './commands/types.js';

export const PROGRAM_NAME = 'tseries';
export const PROGRAM_VERSION = '0.1.0';

export interface ProgramDependencies {
  config: Config;
  logger: Logger;
  createSource?: (options: TwelveDataProviderOptions) => SeriesSource;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  setExitCode?: (code: number) => void;
}

interface CliOptions extends TimeSeriesCommandOptions {
  fixtures?: string;
}

/**
 * Builds the `tseries` program
 *
 * @example
 * ```typescript
 * const program = createProgram({ config: loadConfig(), logger });
 * await program.parseAsync(process.argv);
 * ```
 */
export function createProgram(deps: ProgramDependencies): Command {
  const createSource: (options: TwelveDataProviderOptions) => SeriesSource =
    deps.createSource ?? ((options) => new TwelveDataProvider(options));
  const stdout: (text: string) => void =
    deps.stdout ?? ((text) => process.stdout.write(`${text}\n`));
  const stderr: (text: string) => void =
    deps.stderr ?? ((text) => process.stderr.write(`${text}\n`));
  const setExitCode: (code: number) => void =
    deps.setExitCode ??
    ((code) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Fetch financial time series from the Twelve Data API')
    .version(PROGRAM_VERSION)
    .argument('<symbol>', 'Instrument symbol, e.g. AAPL or EUR/USD')
    .option('-i, --interval <interval>', 'Sampling interval (1min ... 1month)', '1day')
    .option('-n, --outputsize <count>', 'Number of data points, 1 to 5000')
    .option('--exchange <exchange>', 'Exchange name or MIC code')
    .option('--country <country>', 'Country of the exchange')
    .option('--type <type>', 'Security type: Stock, Index, ETF or REIT')
    .option('--dp <places>', 'Decimal places, 0 to 11')
    .option('--order <order>', 'Sort order: ASC or DESC')
    .option('--timezone <zone>', 'Exchange, UTC or an IANA zone name')
    .option('--start <date>', 'Start date or date-time (ISO 8601)')
    .option('--end <date>', 'End date or date-time (ISO 8601)')
    .option('--previous-close', 'Include the previous close column', false)
    .option('--apikey <key>', 'API key for this request')
    .option('-f, --format <format>', 'tabular, time-indexed or raw', 'tabular')
    .option('-o, --output <style>', 'table, csv or json', 'table')
    .option('--meta', 'Print the metadata block before the data', false)
    .option('--fixtures <dir>', 'Answer from <symbol>-<interval>.json files in <dir>')
    .option('-v, --verbose', 'Enable debug logging', false)
    .action(async (symbol: string, options: CliOptions) => {
      const providerOptions = toProviderOptions(deps.config, deps.logger);
      if (options.fixtures) {
        providerOptions.fixturePath = options.fixtures;
      }

      let source: SeriesSource;
      try {
        source = createSource(providerOptions);
      } catch (error) {
        stderr(chalk.red(describeFailure(error).text));
        setExitCode(1);
        return;
      }

      const command = new TimeSeriesCommand({
        source,
        logger: deps.logger.child({ component: 'cli' }),
      });

      const result = await command.execute([symbol], options);

      if (result.success) {
        stdout(result.output);
      } else {
        stderr(chalk.red(result.output));
        setExitCode(1);
      }
    });

  return program;
}
