/**
 * Timestamped file logging.
 * The TUI owns stdout, so log lines only go to a file when one is configured.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from './types.js';

type Level = 'INFO' | 'WARN' | 'ERROR';

export function formatLogLine(level: Level, message: string, now = new Date()): string {
  const ts = now.toISOString().replace('T', ' ').slice(0, 19);
  return `[${ts}] ${level} ${message}\n`;
}

/**
 * Create a logger appending to `file`, or a silent one without a file
 */
export function createLogger(file?: string): Logger {
  if (!file) {
    return { info: () => {}, warn: () => {}, error: () => {} };
  }

  let dirReady = false;
  const append = (level: Level, message: string): void => {
    try {
      if (!dirReady) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        dirReady = true;
      }
      fs.appendFileSync(file, formatLogLine(level, message));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`qwatch: cannot write log ${file}: ${msg}\n`);
    }
  };

  return {
    info: (message) => append('INFO', message),
    warn: (message) => append('WARN', message),
    error: (message) => append('ERROR', message),
  };
}
