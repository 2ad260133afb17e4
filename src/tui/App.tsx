import React, { useEffect, useState } from 'react';
import { Box, useApp, useInput } from 'ink';
import type { DashboardController } from '../core/controller.js';
import type { VirtualTerminal } from '../core/terminal.js';
import { ScreenView } from './components/ScreenView.js';

interface AppProps {
  terminal: VirtualTerminal;
  controller: DashboardController;
}

export function App({ terminal, controller }: AppProps) {
  const { exit } = useApp();
  const [, setFrame] = useState(0);

  // Repaint whenever the controller publishes a frame
  useEffect(() => terminal.onRefresh(() => setFrame((n) => n + 1)), [terminal]);

  // Run the key loop; it returns on 'q'. Unmounting stops the poller.
  useEffect(() => {
    controller.run().then(
      () => exit(),
      (err: unknown) => exit(err instanceof Error ? err : new Error(String(err))),
    );
    return () => controller.stop();
  }, [controller, exit]);

  useInput((input, key) => {
    // Ctrl+C quits like 'q' so the timer is cancelled first
    if (key.ctrl && input === 'c') {
      terminal.pushKey('q');
      return;
    }
    if (input) {
      terminal.pushKey(input);
    }
  });

  return (
    <Box flexDirection="column">
      <ScreenView terminal={terminal} />
    </Box>
  );
}
