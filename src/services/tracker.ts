import pLimit from 'p-limit';
import type { FeedCache, FeedFetcher } from '../rss/fetchFeeds';
import { toCandidate } from '../rss/parseRelease';
import { FilterEngine } from '../scoring/filterEngine';
import type { CycleDiagnostic, CyclePhase, CycleTrigger, PollCycleResult, ShowStage } from '../types/Download';
import type { RawItem, ReleaseCandidate } from '../types/Release';
import type { TrackerSettings } from '../types/Settings';
import type { TrackedShow } from '../types/Show';
import type { FilterStore, HistoryStore, SettingsStore, ShowStore } from '../types/Stores';
import {
  DuplicateDownloadError,
  NoCandidateError,
  ParseError,
  TrackerError,
  errorMessage,
} from '../utils/errors';
import { createCycleProgress, CycleProgress, CycleProgressTracker } from './cycleProgress';
import type { DownloadDispatcher } from './downloadDispatcher';
import { select, Selection } from './matchSelector';
import { formatDelay, nextRun, NextRun } from './schedule';
import { logger } from './structuredLogging';

export interface TrackerDependencies {
  shows: ShowStore;
  filters: FilterStore;
  history: HistoryStore;
  settings: SettingsStore;
  feeds: Pick<FeedFetcher, 'fetch'>;
  dispatcher: Pick<DownloadDispatcher, 'submit'>;
  progress?: CycleProgressTracker;
}

export interface TrackerStatus {
  running: boolean;
  phase: CyclePhase;
  progress: CycleProgress;
  nextRun: NextRun | null;
  settings: TrackerSettings;
}

export interface ManualRun {
  started: boolean;
  result: Promise<PollCycleResult>;
}

interface CycleContext {
  result: PollCycleResult;
  engine: FilterEngine;
  cache: FeedCache;
  signal: AbortSignal;
  settings: TrackerSettings;
}

function newJobId(trigger: CycleTrigger): string {
  return `poll-${trigger}-${Date.now()}-${Math.random().toString(36).substring(7)}`;
}

export class Tracker {
  private readonly progress: CycleProgressTracker;
  private settings: TrackerSettings;
  private timer: NodeJS.Timeout | null = null;
  private scheduled: NextRun | null = null;
  private inFlight: Promise<PollCycleResult> | null = null;
  private abort: AbortController | null = null;
  private stopped = true;

  constructor(private readonly deps: TrackerDependencies) {
    this.progress = deps.progress || createCycleProgress();
    this.settings = deps.settings.getTrackerSettings();
  }

  /** Runs the startup cycle, then keeps polling on the configured cadence. */
  async start(): Promise<PollCycleResult> {
    this.stopped = false;
    this.settings = this.deps.settings.getTrackerSettings();
    logger.info('tracker', `Tracker starting (${this.deps.shows.getTracked().length} tracked shows)`);
    return this.runCycle('startup');
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.clearTimer();
    this.abort?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
    logger.info('tracker', 'Tracker stopped');
  }

  reload(): TrackerSettings {
    this.settings = this.deps.settings.getTrackerSettings();
    logger.info('tracker', 'Tracker settings reloaded', { details: this.settings });
    if (!this.stopped && !this.inFlight) {
      this.schedule();
    }
    return this.settings;
  }

  runNow(): ManualRun {
    if (this.inFlight) {
      return { started: false, result: this.inFlight };
    }
    return { started: true, result: this.runCycle('manual') };
  }

  status(): TrackerStatus {
    const progress = this.progress.get();
    return {
      running: progress.isRunning,
      phase: progress.phase,
      progress,
      nextRun: this.scheduled,
      settings: this.settings,
    };
  }

  recentCycles(): PollCycleResult[] {
    return this.progress.history();
  }

  runCycle(trigger: CycleTrigger): Promise<PollCycleResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.clearTimer();
    const cycle = this.executeCycle(trigger).finally(() => {
      this.inFlight = null;
      this.abort = null;
      if (!this.stopped) {
        this.schedule();
      }
    });
    this.inFlight = cycle;
    return cycle;
  }

  private schedule(): void {
    this.clearTimer();
    const next = nextRun(this.settings);
    this.scheduled = next;
    logger.info('tracker', `Next poll in ${formatDelay(next.delayMs)} (${next.mode} mode)`);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runCycle('scheduled').catch((error) => {
        logger.error('tracker', `Scheduled poll failed: ${errorMessage(error)}`, { error });
      });
    }, next.delayMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.scheduled = null;
  }

  private async executeCycle(trigger: CycleTrigger): Promise<PollCycleResult> {
    const abort = new AbortController();
    this.abort = abort;

    const jobId = newJobId(trigger);
    const result: PollCycleResult = {
      jobId,
      trigger,
      startedAt: new Date().toISOString(),
      aborted: false,
      showsProcessed: 0,
      itemsSeen: 0,
      itemsSkipped: 0,
      accepted: 0,
      downloaded: 0,
      deferred: 0,
      diagnostics: [],
    };

    try {
      const settings = this.deps.settings.getTrackerSettings();
      this.settings = settings;
      const shows = this.deps.shows.getTracked();
      this.progress.start(jobId, shows.length);
      logger.info('tracker', `Poll cycle started (${trigger}) for ${shows.length} shows`, { jobId });

      const engine = FilterEngine.fromStore(this.deps.filters);
      for (const invalid of engine.invalidRules) {
        logger.warn('filter-engine', invalid.message, { jobId });
      }

      const context: CycleContext = { result, engine, cache: new Map(), signal: abort.signal, settings };
      const limit = pLimit(Math.max(1, settings.concurrency));

      await Promise.all(
        shows.map((show) =>
          limit(async () => {
            if (abort.signal.aborted) return;
            try {
              await this.processShow(show, context);
            } finally {
              result.showsProcessed += 1;
              this.progress.showDone();
            }
          })
        )
      );
    } catch (error) {
      // Cycle setup failed: settings, shows or rules could not be read
      result.diagnostics.push({
        showId: null,
        showTitle: null,
        stage: 'cycle',
        kind: error instanceof Error ? error.name : 'Error',
        message: errorMessage(error),
      });
      logger.error('tracker', `Poll cycle failed: ${errorMessage(error)}`, { jobId, error });
    } finally {
      result.aborted = abort.signal.aborted;
      result.finishedAt = new Date().toISOString();
      try {
        this.deps.settings.setLastPollTime(new Date(result.finishedAt));
      } catch (error) {
        logger.error('tracker', `Failed to record last poll time: ${errorMessage(error)}`, { jobId, error });
      }
      this.progress.complete(result);
    }

    logger.info(
      'tracker',
      `Poll cycle finished: ${result.downloaded} downloaded, ${result.accepted} accepted, ${result.itemsSkipped} skipped` +
        (result.aborted ? ' (stopped early)' : ''),
      { jobId, details: { diagnostics: result.diagnostics.length } }
    );
    return result;
  }

  private async processShow(show: TrackedShow, context: CycleContext): Promise<void> {
    const stage: { current: ShowStage } = { current: 'fetching' };
    try {
      await this.trackShow(show, context, stage);
    } catch (error) {
      this.diagnose(context, show, stage.current, error);
    }
  }

  private enter(stage: { current: ShowStage }, phase: ShowStage, showTitle?: string): void {
    stage.current = phase;
    this.progress.phase(phase, showTitle);
  }

  private async trackShow(
    show: TrackedShow,
    context: CycleContext,
    stage: { current: ShowStage }
  ): Promise<void> {
    const { result, signal } = context;
    const jobId = result.jobId;

    this.enter(stage, 'fetching', show.title);
    const items: RawItem[] = [];
    for (const source of show.sources) {
      try {
        const fetched = await this.deps.feeds.fetch(source, show, context.cache);
        items.push(...fetched.items);
        result.itemsSkipped += fetched.skipped;
      } catch (error) {
        this.diagnose(context, show, 'fetching', error);
      }
    }
    result.itemsSeen += items.length;

    this.enter(stage, 'parsing');
    const candidates: ReleaseCandidate[] = [];
    const seen = new Set<string>();
    items.forEach((item, index) => {
      try {
        const candidate = toCandidate(item, index);
        if (seen.has(candidate.contentId)) return;
        seen.add(candidate.contentId);
        candidates.push(candidate);
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        result.itemsSkipped += 1;
        logger.debug('parser', `Skipped (${error.kind}): ${item.title}`, { jobId, releaseTitle: item.title });
      }
    });

    this.enter(stage, 'filtering');
    const byEpisode = new Map<number, ReleaseCandidate[]>();
    for (const candidate of candidates) {
      const decision = context.engine.evaluate(candidate, show);
      if (decision.verdict === 'reject') {
        logger.debug('filter-engine', `Rejected (${decision.reason}): ${candidate.title}`, {
          jobId,
          releaseTitle: candidate.title,
        });
        continue;
      }
      result.accepted += 1;
      const group = byEpisode.get(candidate.episode) || [];
      group.push({ ...candidate, preference: decision.score });
      byEpisode.set(candidate.episode, group);
    }

    const pending = [...byEpisode.keys()]
      .filter((episode) => episode > show.lastDownloadedEpisode)
      .filter((episode) => !this.deps.history.findSuccess(show.id, episode))
      .sort((a, b) => a - b);

    for (const episode of pending) {
      if (signal.aborted) return;

      this.enter(stage, 'selecting');
      const accepted = byEpisode.get(episode) || [];
      let selection: Selection;
      try {
        selection = select(accepted, show, context.settings);
      } catch (error) {
        if (error instanceof NoCandidateError) continue;
        throw error;
      }

      if (selection.deferred) {
        result.deferred += 1;
        result.diagnostics.push({
          showId: show.id,
          showTitle: show.title,
          stage: 'selecting',
          kind: 'Deferred',
          message: `Low confidence (${selection.confidence}, decided by ${selection.decidedBy})`,
          episode,
        });
        logger.info('match-selector', `Deferred ${show.title} episode ${episode}: confidence ${selection.confidence}`, {
          jobId,
          releaseTitle: selection.candidate.title,
        });
        continue;
      }

      this.enter(stage, 'dispatching');
      try {
        await this.deps.dispatcher.submit(show, selection.candidate, jobId);
        result.downloaded += 1;
      } catch (error) {
        if (error instanceof DuplicateDownloadError) {
          logger.debug('dispatcher', error.message, { jobId });
          continue;
        }
        this.diagnose(context, show, 'dispatching', error, episode);
        // Later episodes wait so the watermark cannot pass the failed one
        return;
      }
    }
  }

  private diagnose(
    context: CycleContext,
    show: TrackedShow,
    stage: ShowStage,
    error: unknown,
    episode?: number
  ): void {
    const diagnostic: CycleDiagnostic = {
      showId: show.id,
      showTitle: show.title,
      stage,
      kind: error instanceof Error ? error.name : 'Error',
      message: errorMessage(error),
      episode,
    };
    context.result.diagnostics.push(diagnostic);
    if (!(error instanceof TrackerError)) {
      logger.error('tracker', `Unexpected error for ${show.title}: ${diagnostic.message}`, {
        jobId: context.result.jobId,
        error,
      });
    } else if (stage === 'fetching') {
      logger.warn('feeds', `${show.title}: ${diagnostic.message}`, { jobId: context.result.jobId });
    }
  }
}
