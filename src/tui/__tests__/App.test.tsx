import { EventEmitter } from 'node:events';
import React from 'react';
import { render } from 'ink';
import { DashboardController } from '../../core/controller.js';
import { VirtualTerminal } from '../../core/terminal.js';
import { ALICE_JOB, BOB_JOB, makeSource, qstatXml } from '../../core/__tests__/fixtures.js';
import { App } from '../App.js';

const HEADER_ON = "[x] auto refresh        [ ] user's jobs        refresh        quit";
const HEADER_MINE = "[x] auto refresh        [x] user's jobs        refresh        quit";
const COLUMN_HEADINGS = 'Owner          Job ID              Job Name            Queue     Node      Time      Memory';
const ALICE_ROW = 'alice          101.pbs             sim-alpha           batch     n1/0      00:10:00  2.0 MB';
const BOB_ROW = 'bob            102.pbs             sim-beta            long      n2/3      01:00:00  512.0 kB';

const ANSI_ESCAPE = /\u001b\[[0-9;]*m/g;

/** Raw-mode keyboard that hands each write to ink as one chunk */
class FakeStdin extends EventEmitter {
  readonly isTTY = true;
  private pending: string | null = null;

  write(data: string): void {
    this.pending = data;
    this.emit('readable');
  }

  read(): string | null {
    const data = this.pending;
    this.pending = null;
    return data;
  }

  setEncoding(): void {}
  setRawMode(): void {}
  resume(): void {}
  pause(): void {}
  ref(): void {}
  unref(): void {}
}

/** Screen that keeps the last frame ink wrote */
class FakeStdout extends EventEmitter {
  readonly isTTY = true;
  readonly columns = 120;
  readonly rows = 24;
  private frame = '';

  write(frame: string): boolean {
    this.frame = frame;
    return true;
  }

  /** Painted rows, without colour codes or trailing blanks */
  screen(): string[] {
    return this.frame
      .replace(ANSI_ESCAPE, '')
      .split('\n')
      .map((line) => line.trimEnd());
  }
}

function renderDashboard() {
  const terminal = new VirtualTerminal(24, 100);
  const { source, fetch } = makeSource();
  fetch.mockResolvedValue(qstatXml([ALICE_JOB, BOB_JOB]));
  const controller = new DashboardController({ terminal, source, user: 'alice', intervalMs: 60_000 });
  const stdin = new FakeStdin();
  const stdout = new FakeStdout();

  const instance = render(<App terminal={terminal} controller={controller} />, {
    stdin: stdin as unknown as NodeJS.ReadStream,
    stdout: stdout as unknown as NodeJS.WriteStream,
    debug: true,
    exitOnCtrlC: false,
    patchConsole: false,
  });
  return { ...instance, controller, fetch, stdin, stdout };
}

describe('App', () => {
  it('paints the header and one row per job', async () => {
    const { stdout, controller, unmount } = renderDashboard();

    await vi.waitFor(() => expect(stdout.screen()).toContain(BOB_ROW));

    expect(stdout.screen().slice(0, 4)).toEqual([HEADER_ON, COLUMN_HEADINGS, ALICE_ROW, BOB_ROW]);
    unmount();
    expect(controller.isRefreshScheduled()).toBe(false);
  });

  it("forwards u to the dashboard to show only the user's jobs", async () => {
    const { stdin, stdout, unmount } = renderDashboard();
    await vi.waitFor(() => expect(stdout.screen()).toContain(BOB_ROW));

    stdin.write('u');

    await vi.waitFor(() => expect(stdout.screen()[0]).toBe(HEADER_MINE));
    expect(stdout.screen().slice(0, 3)).toEqual([HEADER_MINE, COLUMN_HEADINGS, ALICE_ROW]);
    expect(stdout.screen()).not.toContain(BOB_ROW);
    unmount();
  });

  it('quits on Ctrl+C with the refresh timer cancelled', async () => {
    const { stdin, stdout, controller, fetch, waitUntilExit } = renderDashboard();
    await vi.waitFor(() => expect(stdout.screen()).toContain(BOB_ROW));
    await controller.idle();
    expect(controller.isRefreshScheduled()).toBe(true);

    stdin.write('\u0003');
    await waitUntilExit();

    expect(controller.isRefreshScheduled()).toBe(false);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('quits on q', async () => {
    const { stdin, stdout, controller, waitUntilExit } = renderDashboard();
    await vi.waitFor(() => expect(stdout.screen()).toContain(BOB_ROW));

    stdin.write('q');
    await waitUntilExit();

    expect(controller.isRefreshScheduled()).toBe(false);
  });
});
