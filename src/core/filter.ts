import { LookupError } from './errors.js';
import type { JobView } from './job-view.js';

/**
 * Jobs owned by `user`, in their original order. Jobs without an owner
 * field never match.
 */
export function filterOwnJobs(jobs: readonly JobView[], user: string): JobView[] {
  return jobs.filter((job) => {
    try {
      return job.owner === user;
    } catch (err) {
      if (err instanceof LookupError) return false;
      throw err;
    }
  });
}
