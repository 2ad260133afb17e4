#!/usr/bin/env node
/**
 * qwatch CLI Entry Point
 *
 * Launches the live queue view, or routes to commander subcommands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { applyOptions, parseInterval, type WatchOptions } from './cli/utils/options.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json') as { version: string };

// If no arguments, skip commander entirely and launch TUI directly
if (process.argv.length <= 2) {
  await launchTUI({});
} else {
  const program = new Command();

  program
    .name('qwatch')
    .description('Live view of the PBS job queue')
    .version(version);

  const commandModules = [
    () => import('./cli/commands/list.js'),
  ];

  for (const load of commandModules) {
    const mod = await load();
    mod.register(program);
  }

  // `qwatch watch` — TUI with overrides
  program
    .command('watch', { isDefault: true })
    .description('Show the queue and keep it up to date')
    .option('--interval <seconds>', 'Auto refresh interval', parseInterval)
    .option('--qstat <path>', 'Status command to run')
    .option('--user <name>', "User matched by the user's jobs filter")
    .option('--mine', "Start with only the current user's jobs shown")
    .option('--no-auto', 'Start with auto refresh off')
    .option('--log-file <path>', 'Append diagnostic messages to a file')
    .action(async (opts: WatchOptions) => {
      await launchTUI(opts);
    });

  await program.parseAsync();
}

async function launchTUI(opts: WatchOptions): Promise<void> {
  const React = (await import('react')).default;
  const { render } = await import('ink');
  const { App } = await import('./tui/App.js');
  const { loadConfig } = await import('./core/config.js');
  const { createLogger } = await import('./core/logger.js');
  const { createQstatSource } = await import('./core/qstat.js');
  const { DashboardController } = await import('./core/controller.js');
  const { VirtualTerminal } = await import('./core/terminal.js');

  const config = applyOptions(loadConfig(), opts);
  const logger = createLogger(config.logFile);
  const terminal = new VirtualTerminal(process.stdout.rows || 24, process.stdout.columns || 100);
  const controller = new DashboardController({
    terminal,
    source: createQstatSource(config.qstat),
    user: config.user,
    intervalMs: config.refreshIntervalMs,
    logger,
    initialState: { autoRefresh: opts.auto ?? true, onlyMine: opts.mine ?? false },
  });

  logger.info(`Watching ${config.qstat.command} as ${config.user}`);
  // Ctrl+C goes through the App's quit path so the refresh timer is cancelled
  const { waitUntilExit } = render(<App terminal={terminal} controller={controller} />, {
    exitOnCtrlC: false,
  });
  await waitUntilExit();
}
