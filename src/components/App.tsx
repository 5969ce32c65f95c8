import { format } from 'date-fns';
import { Box, Text, useApp, useInput } from 'ink';
import React, { useEffect, useMemo, useState } from 'react';

import type { SavedSession } from '~/types.js';
import { SavedSessionList } from '~/components/SavedSessionList.js';
import { SessionTable } from '~/components/SessionTable.js';
import { useSessions } from '~/hooks/useSessions.js';
import type { SessionSources } from '~/monitor.js';
import { toMonitorView } from '~/utils/rows.js';

type View = 'live' | 'saved';

const PAGE_SIZE = 15;

export interface AppProps {
  sources: SessionSources;
  homeDir: string;
  periodMs: number;
  maxConsecutiveFailures: number;
  onResume: (session: SavedSession) => void;
  onFatal: (error: Error) => void;
}

export const App = ({
  sources,
  homeDir,
  periodMs,
  maxConsecutiveFailures,
  onResume,
  onFatal,
}: AppProps) => {
  const { exit } = useApp();
  const { snapshot, loopState, fatal } = useSessions({ sources, periodMs, maxConsecutiveFailures });
  const [view, setView] = useState<View>('live');
  const [selected, setSelected] = useState(0);

  const monitorView = useMemo(
    () => (snapshot ? toMonitorView(snapshot, homeDir) : undefined),
    [snapshot, homeDir],
  );
  const savedCount = snapshot?.saved.length ?? 0;

  useEffect(() => {
    if (selected >= savedCount && savedCount > 0) setSelected(savedCount - 1);
  }, [selected, savedCount]);

  useEffect(() => {
    if (!fatal) return;
    onFatal(fatal);
    exit(fatal);
  }, [fatal, exit, onFatal]);

  useEffect(() => {
    const onResize = () => {
      process.stdout.write('\x1b[2J\x1b[H');
    };
    process.stdout.on('resize', onResize);
    return () => {
      process.stdout.off('resize', onResize);
    };
  }, []);

  useInput((input, key) => {
    if (input === 'q') {
      exit();
    }
    if (key.tab) {
      setView((prev) => (prev === 'live' ? 'saved' : 'live'));
    }
    if (view !== 'saved') return;
    if (key.upArrow) {
      setSelected((prev) => Math.max(0, prev - 1));
    }
    if (key.downArrow) {
      setSelected((prev) => Math.min(Math.max(0, savedCount - 1), prev + 1));
    }
    // the selection indexes the snapshot on screen, so no stale ordinal
    const session = snapshot?.saved[selected];
    if (key.return && session) {
      onResume(session);
      exit();
    }
  });

  if (!monitorView) {
    return <Text dimColor>Scanning sessions...</Text>;
  }

  const title =
    view === 'live'
      ? `Session Monitor (${monitorView.liveCount} active)`
      : `Saved Sessions (${monitorView.savedCount})`;

  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text bold color="blue">
          {title}
        </Text>
      </Box>
      {view === 'live' ? (
        <SessionTable sessions={monitorView.live} />
      ) : (
        <SavedSessionList sessions={monitorView.saved} selected={selected} pageSize={PAGE_SIZE} />
      )}
      {monitorView.error && (
        <Box marginTop={1}>
          <Text color="red">Refresh failed: {monitorView.error}</Text>
        </Box>
      )}
      <Box marginTop={1}>
        <Text dimColor>
          {loopState === 'scanning' ? 'Refreshing...' : `Updated: ${format(monitorView.updatedAt, 'HH:mm:ss')}`}{' '}
          | 'q' quit | tab{' '}
          {view === 'live' ? 'saved' : 'live'} sessions
          {view === 'saved' ? ' | ↑/↓ select | enter resume' : ''}
        </Text>
      </Box>
    </Box>
  );
};
