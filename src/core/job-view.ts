/**
 * Read-only view over one parsed <Job> record
 */

import { FormatError, LookupError } from './errors.js';
import type { JobRecord } from './types.js';

const KB_PER_MB = 1024;
const KB_PER_GB = 1024 * 1024;

/**
 * Format a qstat memory value such as "2048kb" as "2.0 MB".
 * The last two characters are a unit suffix; the number is in kilobytes.
 */
export function formatMemory(raw: string): string {
  const digits = raw.slice(0, -2).trim();
  if (!/^\d+$/.test(digits)) {
    throw new FormatError(raw, `Invalid memory value: '${raw}'`);
  }

  const kb = Number(digits);
  if (kb >= KB_PER_GB) return `${(kb / KB_PER_GB).toFixed(1)} GB`;
  if (kb >= KB_PER_MB) return `${(kb / KB_PER_MB).toFixed(1)} MB`;
  return `${kb.toFixed(1)} kB`;
}

/**
 * Drop the "@host" part of a PBS owner ("alice@node03" -> "alice")
 */
export function stripHost(owner: string): string {
  const at = owner.indexOf('@');
  return at === -1 ? owner : owner.slice(0, at);
}

export class JobView {
  constructor(private readonly record: JobRecord) {}

  /**
   * Resolve a dotted path such as "resources_used.walltime" to a leaf value
   */
  field(path: string): string {
    let current: JobRecord | string = this.record;
    for (const segment of path.split('.')) {
      if (typeof current === 'string' || !Object.hasOwn(current, segment)) {
        throw new LookupError(path);
      }
      current = current[segment];
    }
    if (typeof current !== 'string') {
      throw new LookupError(path, `Field '${path}' is not a leaf value`);
    }
    return current;
  }

  get name(): string {
    return this.field('job_name');
  }

  get id(): string {
    return this.field('job_id');
  }

  /** Owner without the submit host */
  get owner(): string {
    return stripHost(this.field('job_owner'));
  }

  /** Wall time used so far */
  get time(): string {
    return this.field('resources_used.walltime');
  }

  /** Memory used, scaled to kB/MB/GB */
  get memory(): string {
    return formatMemory(this.field('resources_used.mem'));
  }

  get queue(): string {
    return this.field('queue');
  }

  get host(): string {
    return this.field('exec_host');
  }

  /** The underlying record, for JSON output */
  toJSON(): JobRecord {
    return this.record;
  }
}
