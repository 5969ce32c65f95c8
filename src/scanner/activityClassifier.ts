import type { LiveSessionFacts, SessionStatus } from '~/types.js';

export type ActivityClassifier = (facts: LiveSessionFacts) => SessionStatus;

export interface CpuClassifierOptions {
  /** CPU percentage at or above which a session counts as running. */
  threshold: number;
}

/**
 * Running while the last CPU sample is at or above the threshold. A process
 * without a sample is idle: the heuristic never turns missing data into an
 * error.
 */
export function createCpuClassifier({
  threshold,
}: CpuClassifierOptions): ActivityClassifier {
  return ({ cpu }) => {
    if (cpu === undefined || Number.isNaN(cpu)) return 'idle';
    return cpu >= threshold ? 'running' : 'idle';
  };
}
