import { useEffect, useState } from 'react';

import type { MonitorSnapshot } from '~/types.js';
import { type LoopState, RefreshLoop } from '~/loop/refreshLoop.js';
import type { SessionSources } from '~/monitor.js';

export interface SessionsState {
  snapshot: MonitorSnapshot | undefined;
  loopState: LoopState;
  fatal: Error | undefined;
}

export interface UseSessionsOptions {
  sources: SessionSources;
  periodMs: number;
  maxConsecutiveFailures: number;
}

export function useSessions({
  sources,
  periodMs,
  maxConsecutiveFailures,
}: UseSessionsOptions): SessionsState {
  const [snapshot, setSnapshot] = useState<MonitorSnapshot>();
  const [loopState, setLoopState] = useState<LoopState>('idle');
  const [fatal, setFatal] = useState<Error>();

  useEffect(() => {
    const controller = new AbortController();
    const loop = new RefreshLoop({
      scanLive: sources.scanLive,
      listSaved: sources.listSaved,
      render: setSnapshot,
      periodMs,
      maxConsecutiveFailures,
      onStateChange: setLoopState,
    });

    loop.run(controller.signal).catch((error: unknown) => {
      setFatal(error instanceof Error ? error : new Error(String(error)));
    });

    return () => {
      controller.abort();
    };
  }, [sources, periodMs, maxConsecutiveFailures]);

  return { snapshot, loopState, fatal };
}
