import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import React from 'react';

import type { LiveSessionRow } from '~/types.js';
import { truncateStart } from '~/utils/format.js';
import { STATUS_LABELS } from '~/utils/rows.js';

interface SessionTableProps {
  sessions: LiveSessionRow[];
}

function getColumnWidths() {
  const termWidth = process.stdout.columns || 80;
  return {
    pid: 8,
    directory: Math.max(30, termWidth - 8 - 12 - 10 - 12),
    terminal: 12,
    uptime: 10,
    status: 12,
  };
}

function StatusCell({ status }: { status: string }) {
  if (status === STATUS_LABELS.running) {
    return (
      <Text color="green">
        <Spinner type="dots" /> {status}
      </Text>
    );
  }
  return <Text color="yellow">{status}</Text>;
}

function pad(str: string, width: number): string {
  return str.padEnd(width);
}

export function SessionTable({ sessions }: SessionTableProps) {
  if (sessions.length === 0) {
    return <Text dimColor italic>No active sessions</Text>;
  }

  const cols = getColumnWidths();

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold>{pad('PID', cols.pid)}</Text>
        <Text bold>{pad('Directory', cols.directory)}</Text>
        <Text bold>{pad('Terminal', cols.terminal)}</Text>
        <Text bold>{pad('Uptime', cols.uptime)}</Text>
        <Text bold>{pad('Status', cols.status)}</Text>
      </Box>
      <Box>
        <Text dimColor>
          {'─'.repeat(
            cols.pid + cols.directory + cols.terminal + cols.uptime + cols.status,
          )}
        </Text>
      </Box>
      {sessions.map((session) => (
        <Box key={session.pid}>
          <Text color="cyan">{pad(String(session.pid), cols.pid)}</Text>
          <Text>
            {pad(truncateStart(session.directory, cols.directory - 1), cols.directory)}
          </Text>
          <Text color="magenta">{pad(session.terminal, cols.terminal)}</Text>
          <Text color="green">{pad(session.uptime, cols.uptime)}</Text>
          <Box width={cols.status}>
            <StatusCell status={session.status} />
          </Box>
        </Box>
      ))}
    </Box>
  );
}
