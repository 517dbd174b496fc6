import type { CyclePhase, PollCycleResult } from '../types/Download';

// Simple in-memory poll cycle tracker
export interface CycleProgress {
  isRunning: boolean;
  phase: CyclePhase;
  jobId: string | null;
  currentShow: string | null;
  processed: number;
  total: number;
  startTime?: Date;
  endTime?: Date;
}

const DEFAULT_CAPACITY = 20;

export function createCycleProgress(capacity: number = DEFAULT_CAPACITY) {
  let current: CycleProgress = { isRunning: false, phase: 'idle', jobId: null, currentShow: null, processed: 0, total: 0 };
  const recent: PollCycleResult[] = [];

  return {
    start: (jobId: string, total: number) => {
      current = {
        isRunning: true,
        phase: 'fetching',
        jobId,
        currentShow: null,
        processed: 0,
        total,
        startTime: new Date(),
      };
    },

    phase: (phase: CyclePhase, showTitle?: string) => {
      current.phase = phase;
      if (showTitle !== undefined) {
        current.currentShow = showTitle;
      }
    },

    showDone: () => {
      current.processed += 1;
    },

    complete: (result: PollCycleResult) => {
      current.isRunning = false;
      current.phase = 'idle';
      current.currentShow = null;
      current.endTime = new Date();
      recent.unshift(result);
      if (recent.length > capacity) {
        recent.length = capacity;
      }
    },

    get: (): CycleProgress => ({ ...current }),

    /** Newest first. */
    history: (): PollCycleResult[] => [...recent],
  };
}

export type CycleProgressTracker = ReturnType<typeof createCycleProgress>;
