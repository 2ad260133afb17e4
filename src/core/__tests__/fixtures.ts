/**
 * Shared test fixtures for the qwatch test suite.
 */

import { vi } from 'vitest';
import type { StatusSource } from '../types.js';

export interface JobFixture {
  id: string;
  name: string;
  owner: string;
  queue?: string;
  host?: string;
  walltime?: string;
  mem?: string;
}

/** One <Job> element in the shape `qstat -x` prints */
export function jobXml(job: JobFixture): string {
  const parts = [
    `<Job_Id>${job.id}</Job_Id>`,
    `<Job_Name>${job.name}</Job_Name>`,
    `<Job_Owner>${job.owner}</Job_Owner>`,
  ];
  if (job.walltime !== undefined || job.mem !== undefined) {
    parts.push('<resources_used>');
    if (job.mem !== undefined) parts.push(`<mem>${job.mem}</mem>`);
    if (job.walltime !== undefined) parts.push(`<walltime>${job.walltime}</walltime>`);
    parts.push('</resources_used>');
  }
  if (job.queue !== undefined) parts.push(`<queue>${job.queue}</queue>`);
  if (job.host !== undefined) parts.push(`<exec_host>${job.host}</exec_host>`);
  return `<Job>${parts.join('')}</Job>`;
}

export function qstatXml(jobs: JobFixture[]): string {
  return `<?xml version="1.0"?><Data>${jobs.map(jobXml).join('')}</Data>`;
}

export const ALICE_JOB: JobFixture = {
  id: '101.pbs',
  name: 'sim-alpha',
  owner: 'alice@n1',
  queue: 'batch',
  host: 'n1/0',
  walltime: '00:10:00',
  mem: '2048kb',
};

export const BOB_JOB: JobFixture = {
  id: '102.pbs',
  name: 'sim-beta',
  owner: 'bob@n2',
  queue: 'long',
  host: 'n2/3',
  walltime: '01:00:00',
  mem: '512kb',
};

export function makeSource(description = 'qstat -x') {
  const fetch = vi.fn<() => Promise<string>>();
  const source: StatusSource = { description, fetch };
  return { source, fetch };
}

/** A promise whose settlement the test controls */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
