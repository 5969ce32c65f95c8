import type { LiveSession, SavedSession } from '~/types.js';
import { createCpuClassifier } from '~/scanner/activityClassifier.js';
import { ProcessScanner } from '~/scanner/processScanner.js';
import { type ProcessSource, SystemProcessSource } from '~/scanner/processTable.js';
import { listSessions } from '~/store/sessionStore.js';
import type { MonitorConfig } from '~/utils/config.js';

export interface SessionSources {
  scanLive: (signal?: AbortSignal) => Promise<LiveSession[]>;
  listSaved: (signal?: AbortSignal) => Promise<SavedSession[]>;
  dispose: () => void;
}

/** Wires the scanner and the store reader to one configuration. */
export function createSessionSources(
  config: MonitorConfig,
  source: ProcessSource = new SystemProcessSource(),
): SessionSources {
  const scanner = new ProcessScanner({
    source,
    executableName: config.executableName,
    classifier: createCpuClassifier({ threshold: config.idleCpuPercent }),
    itemTimeoutMs: config.itemTimeoutMs,
  });

  return {
    scanLive: (signal) => scanner.scan(signal),
    listSaved: (signal) =>
      listSessions(config.storeRoot, {
        summaryLength: config.summaryLength,
        itemTimeoutMs: config.itemTimeoutMs,
        signal,
      }),
    dispose: () => source.dispose?.(),
  };
}
