/**
 * Configuration management for qwatch
 * Follows XDG Base Directory Specification
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { Config, QstatConfig } from './types.js';
import { DEFAULT_REFRESH_INTERVAL_MS } from './poller.js';

/** Default status command */
const DEFAULT_QSTAT: QstatConfig = {
  command: 'qstat',
  args: ['-x'],
};

/** Environment variables consulted for the login name, in order */
const USER_ENV_VARS = ['LOGNAME', 'USER', 'LNAME', 'USERNAME'] as const;

/**
 * Name of the user running qwatch
 */
export function getCurrentUser(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of USER_ENV_VARS) {
    const value = env[name];
    if (value) return value;
  }
  return os.userInfo().username;
}

/**
 * Get the XDG config directory
 */
export function getConfigDir(): string {
  const xdgConfig = process.env.XDG_CONFIG_HOME;
  if (xdgConfig) {
    return path.join(xdgConfig, 'qwatch');
  }
  return path.join(os.homedir(), '.config', 'qwatch');
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

type SavedConfig = Partial<Omit<Config, 'qstat'>> & { qstat?: Partial<QstatConfig> };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Keep only the recognised, well-typed keys of a parsed config file
 */
function readSavedConfig(raw: unknown): SavedConfig {
  if (!isRecord(raw)) return {};

  const saved: SavedConfig = {};
  if (isRecord(raw.qstat)) {
    saved.qstat = {};
    if (typeof raw.qstat.command === 'string') saved.qstat.command = raw.qstat.command;
    if (isStringArray(raw.qstat.args)) saved.qstat.args = raw.qstat.args;
  }
  if (typeof raw.refreshIntervalMs === 'number' && raw.refreshIntervalMs > 0) {
    saved.refreshIntervalMs = raw.refreshIntervalMs;
  }
  if (typeof raw.user === 'string' && raw.user) saved.user = raw.user;
  if (typeof raw.logFile === 'string' && raw.logFile) saved.logFile = raw.logFile;
  return saved;
}

/**
 * Load configuration from disk, merged over defaults
 */
export function loadConfig(): Config {
  const configPath = getConfigPath();

  let savedConfig: SavedConfig = {};

  if (fs.existsSync(configPath)) {
    try {
      const content = fs.readFileSync(configPath, 'utf-8');
      savedConfig = readSavedConfig(JSON.parse(content));
    } catch (err) {
      console.error(`Warning: Failed to parse config at ${configPath}:`, err);
    }
  }

  const config: Config = {
    qstat: { ...DEFAULT_QSTAT, ...savedConfig.qstat },
    refreshIntervalMs: savedConfig.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
    user: savedConfig.user ?? getCurrentUser(),
  };
  if (savedConfig.logFile) {
    config.logFile = savedConfig.logFile;
  }

  const override = process.env.QWATCH_QSTAT;
  if (override) {
    config.qstat = { ...config.qstat, command: override };
  }

  return config;
}

