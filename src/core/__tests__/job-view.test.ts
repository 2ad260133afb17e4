import { JobView, formatMemory, stripHost } from '../job-view.js';
import { FormatError, LookupError } from '../errors.js';

// ─── formatMemory ───────────────────────────────────────────

describe('formatMemory', () => {
  it.each([
    ['0kb', '0.0 kB'],
    ['512kb', '512.0 kB'],
    ['1023kb', '1023.0 kB'],
    ['1024kb', '1.0 MB'],
    ['1536kb', '1.5 MB'],
    ['2048kb', '2.0 MB'],
    ['1048576kb', '1.0 GB'],
    ['3145728kb', '3.0 GB'],
  ])('formats %s as %s', (raw, expected) => {
    expect(formatMemory(raw)).toBe(expected);
  });

  it('ignores the unit suffix text', () => {
    expect(formatMemory('2048KB')).toBe('2.0 MB');
  });

  it('throws FormatError for a non-numeric prefix', () => {
    expect(() => formatMemory('lotskb')).toThrow(FormatError);
  });

  it('throws FormatError when there is no number', () => {
    expect(() => formatMemory('kb')).toThrow(FormatError);
  });

  it('keeps the raw value on the error', () => {
    let caught: unknown;
    try {
      formatMemory('1.5gb');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FormatError);
    expect(caught).toMatchObject({ value: '1.5gb' });
  });
});

// ─── stripHost ──────────────────────────────────────────────

describe('stripHost', () => {
  it('removes the host suffix', () => {
    expect(stripHost('alice@node03')).toBe('alice');
  });

  it('returns names without @ unchanged', () => {
    expect(stripHost('bob')).toBe('bob');
  });

  it('cuts at the first @', () => {
    expect(stripHost('carol@a@b')).toBe('carol');
  });
});

// ─── JobView ────────────────────────────────────────────────

describe('JobView', () => {
  const job = new JobView({
    job_id: '101.pbs',
    job_name: 'sim-alpha',
    job_owner: 'alice@n1',
    queue: 'batch',
    exec_host: 'n1/0',
    resources_used: { walltime: '00:10:00', mem: '3145728kb' },
  });

  it('exposes the plain fields', () => {
    expect(job.id).toBe('101.pbs');
    expect(job.name).toBe('sim-alpha');
    expect(job.queue).toBe('batch');
    expect(job.host).toBe('n1/0');
    expect(job.time).toBe('00:10:00');
  });

  it('derives owner and memory', () => {
    expect(job.owner).toBe('alice');
    expect(job.memory).toBe('3.0 GB');
  });

  it('resolves dotted paths', () => {
    expect(job.field('resources_used.mem')).toBe('3145728kb');
  });

  it('throws LookupError for a missing field', () => {
    expect(() => job.field('job_state')).toThrow(LookupError);
  });

  it('throws LookupError for a path through a leaf', () => {
    expect(() => job.field('queue.name')).toThrow(LookupError);
  });

  it('throws LookupError for a path ending on a nested record', () => {
    expect(() => job.field('resources_used')).toThrow("Field 'resources_used' is not a leaf value");
  });

  it('does not resolve inherited object properties', () => {
    expect(() => job.field('constructor')).toThrow(LookupError);
  });

  it('throws LookupError for a queued job without resource usage', () => {
    const queued = new JobView({ job_id: '9.pbs', job_owner: 'dave@n4' });
    expect(() => queued.time).toThrow(LookupError);
    expect(() => queued.memory).toThrow(LookupError);
  });

  it('serialises to its record', () => {
    const record = { job_id: '1', job_owner: 'x@y' };
    expect(JSON.parse(JSON.stringify(new JobView(record)))).toEqual(record);
  });
});
