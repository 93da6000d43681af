/**
 * Application entry point
 * Loads configuration, wires logging and runs the command-line program
 */

// Load environment variables from .env file
import 'dotenv/config';

import chalk from 'chalk';
import { createLogger, attachGlobalHandlers } from '@tseries/logger';
import { loadConfig } from './config/index.js';
import { createProgram } from './program.js';
import { describeFailure } from './commands/time-series.command.js';

/**
 * Main startup function
 */
async function start(argv: string[]): Promise<void> {
  const verbose = argv.includes('--verbose') || argv.includes('-v');
  const config = loadConfig();

  const logger = createLogger({
    level: verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });

  attachGlobalHandlers(logger);

  await createProgram({ config, logger }).parseAsync(argv);
}

// Start the application
start(process.argv).catch((error: unknown) => {
  process.stderr.write(`${chalk.red(describeFailure(error).text)}\n`);
  process.exit(1);
});
