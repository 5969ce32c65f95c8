import type { LiveSession, MonitorSnapshot, SavedSession } from '~/types.js';
import { abortable, sleep as abortableSleep } from '~/utils/abort.js';
import {
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
} from '~/utils/config.js';
import { RefreshLoopFatalError, errorMessage } from '~/utils/errors.js';
import { logger } from '~/utils/logger.js';

export type LoopState =
  | 'idle'
  | 'scanning'
  | 'rendering'
  | 'sleeping'
  | 'cancelled'
  | 'failed';

export interface RefreshLoopOptions {
  scanLive: (signal: AbortSignal) => Promise<LiveSession[]>;
  /** Omit to leave saved sessions out of every snapshot. */
  listSaved?: (signal: AbortSignal) => Promise<SavedSession[]>;
  render: (snapshot: MonitorSnapshot) => void;
  periodMs?: number;
  maxConsecutiveFailures?: number;
  onStateChange?: (state: LoopState) => void;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Polls the scanners, hands each snapshot to `render` and waits out the rest
 * of the period. A cycle that overruns the period starts the next one
 * straight away. Cancellation interrupts both the wait and any pending scan.
 */
export class RefreshLoop {
  private state: LoopState = 'idle';
  private readonly periodMs: number;
  private readonly maxConsecutiveFailures: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly options: RefreshLoopOptions) {
    this.periodMs = options.periodMs ?? DEFAULT_INTERVAL_SECONDS * 1000;
    this.maxConsecutiveFailures =
      options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  getState(): LoopState {
    return this.state;
  }

  /**
   * Resolves once `signal` aborts. Rejects with RefreshLoopFatalError after
   * too many failed live scans in a row. A failed store read keeps the last
   * saved rows and is reported on the snapshot.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`RefreshLoop cannot start from state "${this.state}"`);
    }

    let failures = 0;
    let previous: MonitorSnapshot | undefined;

    while (!signal.aborted) {
      const startedAt = this.now();
      this.transition('scanning');

      let results: [PromiseSettledResult<LiveSession[]>, PromiseSettledResult<SavedSession[]>];
      try {
        results = await abortable(this.scanOnce(signal), signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
      const [liveResult, savedResult] = results;
      const errors: string[] = [];

      let live: LiveSession[];
      if (liveResult.status === 'fulfilled') {
        failures = 0;
        live = liveResult.value;
      } else {
        failures++;
        logger.debug(
          `Live scan failed (${failures}/${this.maxConsecutiveFailures}):`,
          errorMessage(liveResult.reason),
        );
        if (failures >= this.maxConsecutiveFailures) {
          this.transition('failed');
          throw new RefreshLoopFatalError(failures, liveResult.reason);
        }
        live = previous?.live ?? [];
        errors.push(errorMessage(liveResult.reason));
      }

      // the store is optional: its failures are shown but never fatal
      let saved: SavedSession[];
      if (savedResult.status === 'fulfilled') {
        saved = savedResult.value;
      } else {
        logger.debug('Saved session read failed:', errorMessage(savedResult.reason));
        saved = previous?.saved ?? [];
        errors.push(errorMessage(savedResult.reason));
      }

      const snapshot: MonitorSnapshot = {
        live,
        saved,
        updatedAt: new Date(this.now()),
        error: errors.length > 0 ? errors.join('; ') : undefined,
      };
      previous = snapshot;

      this.transition('rendering');
      this.options.render(snapshot);

      this.transition('sleeping');
      const remaining = this.periodMs - (this.now() - startedAt);
      if (remaining <= 0) continue;
      try {
        await this.sleep(remaining, signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }

    this.transition('cancelled');
  }

  private scanOnce(
    signal: AbortSignal,
  ): Promise<[PromiseSettledResult<LiveSession[]>, PromiseSettledResult<SavedSession[]>]> {
    const { scanLive, listSaved } = this.options;
    return Promise.allSettled([
      scanLive(signal),
      listSaved ? listSaved(signal) : Promise.resolve<SavedSession[]>([]),
    ]);
  }

  private transition(next: LoopState): void {
    this.state = next;
    this.options.onStateChange?.(next);
  }
}
