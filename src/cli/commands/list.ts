/**
 * `qwatch list` — Print the queue once
 */

import type { Command } from 'commander';
import { handleError } from '../utils/errors.js';
import { applyOptions, type SourceOptions } from '../utils/options.js';
import { info, printTable } from '../utils/output.js';
import { loadConfig } from '../../core/config.js';
import { COLUMNS, PLACEHOLDER } from '../../core/controller.js';
import { FormatError, LookupError } from '../../core/errors.js';
import { filterOwnJobs } from '../../core/filter.js';
import { JobView } from '../../core/job-view.js';
import { parseJobRecords } from '../../core/parser.js';
import { createQstatSource } from '../../core/qstat.js';
import type { StatusSource } from '../../core/types.js';

interface ListOptions extends SourceOptions {
  json?: boolean;
  mine?: boolean;
}

/**
 * Table rows for `jobs`, one cell per dashboard column
 */
export function jobRows(jobs: readonly JobView[]): string[][] {
  return jobs.map((job) =>
    COLUMNS.map((column) => {
      try {
        return column.value(job);
      } catch (err) {
        if (err instanceof FormatError || err instanceof LookupError) return PLACEHOLDER;
        throw err;
      }
    })
  );
}

/**
 * Poll `source` once and return the jobs to print
 */
export async function fetchJobs(source: StatusSource, user: string, onlyMine: boolean): Promise<JobView[]> {
  const output = await source.fetch();
  const jobs = parseJobRecords(output).map((record) => new JobView(record));
  return onlyMine ? filterOwnJobs(jobs, user) : jobs;
}

export function register(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('Print the current queue once')
    .option('--mine', "Only show the current user's jobs")
    .option('--json', 'Output the raw job records as JSON')
    .option('--qstat <path>', 'Status command to run')
    .option('--user <name>', 'User matched by --mine')
    .action(async (opts: ListOptions) => {
      try {
        const config = applyOptions(loadConfig(), opts);
        const jobs = await fetchJobs(createQstatSource(config.qstat), config.user, opts.mine ?? false);

        if (opts.json) {
          console.log(JSON.stringify(jobs, null, 2));
          return;
        }

        if (jobs.length === 0) {
          info('Currently no jobs in the queue.');
          return;
        }

        printTable(COLUMNS.map((column) => column.label.toUpperCase()), jobRows(jobs));
      } catch (err) {
        handleError(err);
      }
    });
}
