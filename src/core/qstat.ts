/**
 * qstat invocation layer
 */

import { execa } from 'execa';
import { SubprocessError, describeError } from './errors.js';
import type { QstatConfig, StatusSource } from './types.js';

/**
 * Status source that runs `qstat -x` (or the configured command) and
 * returns its complete standard output. Standard error is discarded.
 */
export function createQstatSource(qstat: QstatConfig): StatusSource {
  const description = [qstat.command, ...qstat.args].join(' ');

  return {
    description,
    async fetch(): Promise<string> {
      try {
        const { stdout } = await execa(qstat.command, qstat.args, {
          stdin: 'ignore',
          stderr: 'ignore',
          stripFinalNewline: false,
        });
        return stdout;
      } catch (err) {
        throw new SubprocessError(description, describeError(err), { cause: err });
      }
    },
  };
}
