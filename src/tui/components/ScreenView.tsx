import React from 'react';
import { Box, Text } from 'ink';
import type { VirtualTerminal } from '../../core/terminal.js';

interface ScreenViewProps {
  terminal: VirtualTerminal;
}

/**
 * Paints every non-blank row of the virtual terminal
 */
export function ScreenView({ terminal }: ScreenViewProps) {
  const rowCount = terminal.lines().length;

  return (
    <Box flexDirection="column">
      {Array.from({ length: rowCount }, (_, row) => (
        <ScreenRow key={row} terminal={terminal} row={row} />
      ))}
    </Box>
  );
}

function ScreenRow({ terminal, row }: { terminal: VirtualTerminal; row: number }) {
  const segments = terminal.segments(row);
  const last = segments.length - 1;

  return (
    <Text wrap="truncate">
      {segments.map((segment, i) => (
        <Text key={i} underline={segment.underline} inverse={segment.standout}>
          {i === last && !segment.underline && !segment.standout ? segment.text.trimEnd() || ' ' : segment.text}
        </Text>
      ))}
    </Text>
  );
}
