export type DownloadOutcome = 'success' | 'failed';

export interface DownloadRecord {
  id: number;
  showId: number;
  episode: number;
  contentId: string;
  downloadUrl: string;
  title: string;
  outcome: DownloadOutcome;
  error: string | null;
  createdAt: string;
}

export type NewDownloadRecord = Omit<DownloadRecord, 'id' | 'createdAt'>;

export type CyclePhase = 'idle' | 'fetching' | 'parsing' | 'filtering' | 'selecting' | 'dispatching';

export type CycleTrigger = 'startup' | 'scheduled' | 'manual';

export type ShowStage = Exclude<CyclePhase, 'idle'>;

/** Per-show failures carry the show; a failed cycle setup has stage 'cycle' and no show. */
export interface CycleDiagnostic {
  showId: number | null;
  showTitle: string | null;
  stage: ShowStage | 'cycle';
  kind: string;
  message: string;
  episode?: number;
}

export interface PollCycleResult {
  jobId: string;
  trigger: CycleTrigger;
  startedAt: string;
  finishedAt?: string;
  aborted: boolean;
  showsProcessed: number;
  itemsSeen: number;
  itemsSkipped: number;
  accepted: number;
  downloaded: number;
  deferred: number;
  diagnostics: CycleDiagnostic[];
}
