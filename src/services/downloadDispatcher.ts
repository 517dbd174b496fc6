import pLimit from 'p-limit';
import { config } from '../config';
import type { DownloadRecord } from '../types/Download';
import type { ReleaseCandidate } from '../types/Release';
import type { TrackedShow } from '../types/Show';
import type { HistoryStore } from '../types/Stores';
import type { TorrentClient } from '../transmission/types';
import { DispatchError, DuplicateDownloadError, errorMessage } from '../utils/errors';
import { logger } from './structuredLogging';

type Limit = ReturnType<typeof pLimit>;

export function downloadDirFor(show: TrackedShow, downloadRoot: string = config.transmission.downloadRoot): string {
  if (show.downloadPath) {
    return show.downloadPath;
  }
  const root = downloadRoot.replace(/\/+$/, '');
  const folder = show.title.replace(/[\\/]+/g, ' ').trim();
  return `${root}/${folder}/Season ${show.season}/`;
}

/**
 * Hands selected releases to the torrent client and records the outcome.
 * Submissions for the same show run one at a time.
 */
export class DownloadDispatcher {
  private readonly queues = new Map<number, Limit>();

  constructor(
    private readonly client: TorrentClient,
    private readonly history: HistoryStore,
    private readonly downloadRoot: string = config.transmission.downloadRoot
  ) {}

  submit(show: TrackedShow, candidate: ReleaseCandidate, jobId?: string): Promise<DownloadRecord> {
    let queue = this.queues.get(show.id);
    if (!queue) {
      queue = pLimit(1);
      this.queues.set(show.id, queue);
    }
    return queue(() => this.dispatch(show, candidate, jobId));
  }

  private async dispatch(show: TrackedShow, candidate: ReleaseCandidate, jobId?: string): Promise<DownloadRecord> {
    const existing =
      this.history.findSuccess(show.id, candidate.episode) || this.history.findSuccessByContentId(candidate.contentId);
    if (existing) {
      throw new DuplicateDownloadError(
        `${show.title} episode ${candidate.episode} already downloaded as "${existing.title}"`,
        show.id,
        candidate.episode
      );
    }

    const downloadDir = downloadDirFor(show, this.downloadRoot);
    const record = {
      showId: show.id,
      episode: candidate.episode,
      contentId: candidate.contentId,
      downloadUrl: candidate.downloadUrl,
      title: candidate.title,
    };

    try {
      const added = await this.client.addTorrent(candidate.downloadUrl, downloadDir);
      logger.info(
        'dispatcher',
        `${added.duplicate ? 'Already in client' : 'Queued'}: ${show.title} episode ${candidate.episode} -> ${downloadDir}`,
        { releaseTitle: candidate.title, jobId, details: { contentId: candidate.contentId, group: candidate.group } }
      );
    } catch (error) {
      const failure =
        error instanceof DispatchError
          ? error
          : new DispatchError(`Download client failed: ${errorMessage(error)}`, 'network', error);
      this.history.recordFailure({ ...record, error: failure.message });
      logger.error('dispatcher', `Failed to queue ${show.title} episode ${candidate.episode}: ${failure.message}`, {
        releaseTitle: candidate.title,
        jobId,
        error: failure,
        details: { reason: failure.reason },
      });
      throw failure;
    }

    return this.history.recordSuccess(record);
  }
}
