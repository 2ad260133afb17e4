/**
 * Dashboard controller
 *
 * Owns the view state (auto refresh, user's jobs) and the poller, turns
 * keypresses into state changes, and paints header and job table onto a
 * TerminalSurface.
 */

import { FormatError, LookupError, describeError } from './errors.js';
import { filterOwnJobs } from './filter.js';
import type { JobView } from './job-view.js';
import { Poller } from './poller.js';
import type { TerminalSurface } from './terminal.js';
import type { Logger, StatusSource, ViewState } from './types.js';

interface Column {
  label: string;
  col: number;
  width: number;
  value: (job: JobView) => string;
}

export const COLUMNS: readonly Column[] = [
  { label: 'Owner', col: 0, width: 15, value: (job) => job.owner },
  { label: 'Job ID', col: 15, width: 20, value: (job) => job.id },
  { label: 'Job Name', col: 35, width: 20, value: (job) => job.name },
  { label: 'Queue', col: 55, width: 10, value: (job) => job.queue },
  { label: 'Node', col: 65, width: 10, value: (job) => job.host },
  { label: 'Time', col: 75, width: 10, value: (job) => job.time },
  { label: 'Memory', col: 85, width: 10, value: (job) => job.memory },
];

export const HEADER_ROW = 0;
export const COLUMN_ROW = 1;
export const BODY_ROW = 2;
export const STATUS_COL = 72;
export const NO_JOBS_MESSAGE = 'Currently no jobs in the queue.';

/** Shown for cells whose value is missing or malformed */
export const PLACEHOLDER = '-';

const AUTO_REFRESH_MARK_COL = 1;
const ONLY_MINE_MARK_COL = 25;

export interface DashboardOptions {
  terminal: TerminalSurface;
  source: StatusSource;
  /** Owner matched by the "user's jobs" filter */
  user: string;
  intervalMs?: number;
  logger?: Logger;
  initialState?: Partial<ViewState>;
}

export class DashboardController {
  private readonly terminal: TerminalSurface;
  private readonly user: string;
  private readonly poller: Poller;
  private readonly state: ViewState;
  private status: string | null = null;

  constructor(options: DashboardOptions) {
    this.terminal = options.terminal;
    this.user = options.user;
    this.state = {
      autoRefresh: options.initialState?.autoRefresh ?? true,
      onlyMine: options.initialState?.onlyMine ?? false,
    };
    this.poller = new Poller({
      source: options.source,
      intervalMs: options.intervalMs,
      logger: options.logger,
      onUpdate: () => this.handleUpdate(),
      onError: (err) => this.handleFailure(err),
    });
    this.poller.setAutoRefresh(this.state.autoRefresh);
  }

  getState(): Readonly<ViewState> {
    return { ...this.state };
  }

  /** Jobs currently shown, after the "user's jobs" filter */
  visibleJobs(): JobView[] {
    const snapshot = this.poller.getSnapshot();
    return this.state.onlyMine ? filterOwnJobs(snapshot, this.user) : [...snapshot];
  }

  isRefreshScheduled(): boolean {
    return this.poller.isScheduled();
  }

  /** Resolves once the latest refresh has been drawn */
  idle(): Promise<void> {
    return this.poller.idle();
  }

  /** Draw the header and start the first refresh */
  start(): void {
    this.drawHeader();
    this.terminal.refresh();
    this.requestRefresh();
  }

  /** Cancel the pending refresh; later completions draw nothing */
  stop(): void {
    this.poller.stop();
  }

  /** Start, then handle keys until `q` */
  async run(): Promise<void> {
    this.start();
    for (;;) {
      const key = await this.terminal.readKey();
      if (!this.handleKey(key)) return;
    }
  }

  /**
   * Apply one keypress. Returns false when the dashboard should exit.
   */
  handleKey(key: string): boolean {
    switch (key) {
      case 'a':
        this.state.autoRefresh = !this.state.autoRefresh;
        this.poller.setAutoRefresh(this.state.autoRefresh);
        this.drawHeader();
        this.terminal.refresh();
        if (this.state.autoRefresh) {
          this.requestRefresh();
        }
        return true;

      case 'u':
        this.state.onlyMine = !this.state.onlyMine;
        this.drawHeader();
        this.drawBody();
        this.terminal.refresh();
        return true;

      case 'r':
        this.drawHeader();
        this.terminal.refresh();
        this.requestRefresh();
        return true;

      case 'q':
        this.stop();
        return false;

      default:
        return true;
    }
  }

  private requestRefresh(): void {
    void this.poller.refresh();
  }

  private handleUpdate(): void {
    this.status = null;
    this.drawStatus();
    this.drawBody();
    this.terminal.refresh();
  }

  private handleFailure(err: unknown): void {
    this.status = describeError(err);
    this.drawStatus();
    this.drawBody();
    this.terminal.refresh();
  }

  private drawHeader(): void {
    const t = this.terminal;

    t.move(HEADER_ROW, 0);
    t.clearToEol();
    t.move(COLUMN_ROW, 0);
    t.clearToEol();

    t.move(HEADER_ROW, 0);
    t.write('[ ] ');
    t.write('a', { underline: true });
    t.write('uto refresh        [ ] ');
    t.write('u', { underline: true });
    t.write("ser's jobs        ");
    t.write('r', { underline: true });
    t.write('efresh        ');
    t.write('q', { underline: true });
    t.write('uit');

    t.writeAt(HEADER_ROW, AUTO_REFRESH_MARK_COL, checkMark(this.state.autoRefresh));
    t.writeAt(HEADER_ROW, ONLY_MINE_MARK_COL, checkMark(this.state.onlyMine));

    for (const column of COLUMNS) {
      t.writeAt(COLUMN_ROW, column.col, column.label.padEnd(column.width), undefined, { standout: true });
    }

    this.drawStatus();
  }

  private drawStatus(): void {
    const t = this.terminal;
    t.move(HEADER_ROW, STATUS_COL);
    t.clearToEol();
    if (this.status) {
      t.writeAt(HEADER_ROW, STATUS_COL, this.status, t.columns - STATUS_COL, { standout: true });
    }
  }

  /** Repaint the job table from the current snapshot */
  private drawBody(): void {
    const t = this.terminal;
    t.move(BODY_ROW, 0);
    t.clearToBottom();

    const jobs = this.visibleJobs();
    if (jobs.length === 0) {
      t.writeAt(BODY_ROW, 20, NO_JOBS_MESSAGE);
      return;
    }

    jobs.forEach((job, i) => {
      for (const column of COLUMNS) {
        t.writeAt(BODY_ROW + i, column.col, cellValue(job, column), column.width - 1);
      }
    });
  }
}

function checkMark(enabled: boolean): string {
  return enabled ? 'x' : ' ';
}

function cellValue(job: JobView, column: Column): string {
  try {
    return column.value(job);
  } catch (err) {
    if (err instanceof FormatError || err instanceof LookupError) {
      return PLACEHOLDER;
    }
    throw err;
  }
}
