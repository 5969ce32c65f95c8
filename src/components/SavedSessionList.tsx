import { Box, Text } from 'ink';
import React from 'react';

import type { SavedSessionRow } from '~/types.js';
import { truncate, truncateStart } from '~/utils/format.js';

interface SavedSessionListProps {
  sessions: SavedSessionRow[];
  selected: number;
  /** Rows shown around the selection. */
  pageSize: number;
}

const ID_WIDTH = 10;
const ACTIVITY_WIDTH = 18;

export function SavedSessionList({ sessions, selected, pageSize }: SavedSessionListProps) {
  if (sessions.length === 0) {
    return <Text dimColor italic>No saved sessions</Text>;
  }

  const termWidth = process.stdout.columns || 80;
  const directoryWidth = Math.max(20, Math.floor(termWidth * 0.3));
  const summaryWidth = Math.max(10, termWidth - 6 - ID_WIDTH - ACTIVITY_WIDTH - directoryWidth);
  const start = Math.max(0, Math.min(selected - Math.floor(pageSize / 2), sessions.length - pageSize));
  const visible = sessions.slice(start, start + pageSize);

  return (
    <Box flexDirection="column">
      {visible.map((session) => {
        const isSelected = session.ordinal - 1 === selected;
        return (
          <Box key={session.id}>
            <Text color={isSelected ? 'cyan' : undefined} bold={isSelected}>
              {isSelected ? '› ' : '  '}
              {String(session.ordinal).padEnd(4)}
            </Text>
            <Text color="cyan">{session.id.slice(0, ID_WIDTH - 2).padEnd(ID_WIDTH)}</Text>
            <Text color="green">{session.lastActivity.padEnd(ACTIVITY_WIDTH)}</Text>
            <Text>
              {truncateStart(session.directory, directoryWidth - 1).padEnd(directoryWidth)}
            </Text>
            <Text dimColor>{truncate(session.summary, summaryWidth)}</Text>
          </Box>
        );
      })}
      {sessions.length > visible.length && (
        <Text dimColor>
          {selected + 1}/{sessions.length}
        </Text>
      )}
    </Box>
  );
}
