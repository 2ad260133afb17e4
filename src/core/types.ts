/**
 * Core type definitions for qwatch
 */

/** A leaf string or a nested mapping, mirroring one element of a <Job> fragment */
export type JobField = string | JobRecord;

/** Fields of one <Job> element, keyed by lower-cased tag name */
export interface JobRecord {
  readonly [field: string]: JobField;
}

/** Command used to read the queue */
export interface QstatConfig {
  /** Executable name or path (default: "qstat") */
  command: string;
  /** Arguments requesting XML output (default: ["-x"]) */
  args: string[];
}

/** Main configuration */
export interface Config {
  qstat: QstatConfig;
  /** Delay between the end of one auto-refresh and the start of the next */
  refreshIntervalMs: number;
  /** User name the "user's jobs" filter matches against */
  user: string;
  /** Optional file for diagnostic log lines */
  logFile?: string;
}

/** Anything that can produce the raw queue document */
export interface StatusSource {
  /** Human-readable command line, used in messages */
  readonly description: string;
  fetch(): Promise<string>;
}

/** The two user-togglable display flags */
export interface ViewState {
  autoRefresh: boolean;
  onlyMine: boolean;
}

/** Minimal leveled logger */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
