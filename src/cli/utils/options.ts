/**
 * Option parsing shared by `watch` and `list`
 */

import { InvalidArgumentError } from 'commander';
import type { Config } from '../../core/types.js';

export interface SourceOptions {
  qstat?: string;
  user?: string;
}

export interface WatchOptions extends SourceOptions {
  interval?: number;
  logFile?: string;
  mine?: boolean;
  auto?: boolean;
}

/**
 * commander argument parser for `--interval <seconds>`
 */
export function parseInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Interval must be a positive number of seconds.');
  }
  return seconds;
}

/**
 * Apply command-line overrides on top of the loaded config
 */
export function applyOptions(config: Config, opts: WatchOptions): Config {
  const result: Config = {
    ...config,
    qstat: opts.qstat ? { ...config.qstat, command: opts.qstat } : config.qstat,
    user: opts.user ?? config.user,
  };
  if (opts.interval !== undefined) {
    result.refreshIntervalMs = Math.round(opts.interval * 1000);
  }
  if (opts.logFile) {
    result.logFile = opts.logFile;
  }
  return result;
}
