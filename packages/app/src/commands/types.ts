/**
 * Command types and interfaces
 */

import type { TimeSeriesInput, TimeSeriesResult } from '@tseries/contracts';

/**
 * Base command interface
 */
export interface Command<TOptions> {
  name: string;
  description: string;
  execute(args: string[], options: TOptions): Promise<CommandResult>;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  output: string;
  error?: Error;
  duration?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Anything that answers time-series requests; TwelveDataProvider in production
 */
export interface SeriesSource {
  timeSeries(input: TimeSeriesInput): Promise<TimeSeriesResult>;
}
