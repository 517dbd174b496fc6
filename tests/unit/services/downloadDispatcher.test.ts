import { describe, it, expect, beforeEach, vi } from 'vitest';
import db from '../../../src/db';
import { historyModel } from '../../../src/models/history';
import { showsModel } from '../../../src/models/shows';
import { DownloadDispatcher, downloadDirFor } from '../../../src/services/downloadDispatcher';
import type { AddedTorrent } from '../../../src/transmission/types';
import type { TrackedShow } from '../../../src/types/Show';
import { DispatchError, DuplicateDownloadError } from '../../../src/utils/errors';
import { makeCandidate, makeShow } from '../../helpers/fixtures';

const HASH_A = 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const HASH_B = 'bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

function createShow(overrides: Partial<TrackedShow> = {}): TrackedShow {
  const { id: _id, lastDownloadedHash: _hash, ...fields } = makeShow(overrides);
  return showsModel.create(fields);
}

function episode(n: number, infoHash: string) {
  const label = String(n).padStart(2, '0');
  return makeCandidate(`[SubsPlease] Sousou no Frieren - ${label} (1080p)`, { infoHash });
}

describe('DownloadDispatcher', () => {
  const addTorrent = vi.fn(async (_url: string, _dir: string): Promise<AddedTorrent> => ({ torrent: null, duplicate: false }));
  let dispatcher: DownloadDispatcher;

  beforeEach(() => {
    db.exec('DELETE FROM download_history; DELETE FROM shows;');
    addTorrent.mockReset();
    addTorrent.mockImplementation(async () => ({ torrent: null, duplicate: false }));
    dispatcher = new DownloadDispatcher({ addTorrent }, historyModel, '/data/Anime');
  });

  it('should queue the release and advance the watermark', async () => {
    const show = createShow();
    const record = await dispatcher.submit(show, episode(5, HASH_A));

    expect(addTorrent).toHaveBeenCalledWith(
      `magnet:?xt=urn:btih:${HASH_A}&dn=${encodeURIComponent('[SubsPlease] Sousou no Frieren - 05 (1080p)')}`,
      '/data/Anime/Sousou no Frieren/Season 1/'
    );
    expect(record).toMatchObject({ showId: show.id, episode: 5, contentId: HASH_A, outcome: 'success', error: null });
    expect(showsModel.getById(show.id)).toMatchObject({ lastDownloadedEpisode: 5, lastDownloadedHash: HASH_A });
  });

  it('should not call the client twice for the same episode', async () => {
    const show = createShow();
    await dispatcher.submit(show, episode(5, HASH_A));

    await expect(dispatcher.submit(show, episode(5, HASH_B))).rejects.toBeInstanceOf(DuplicateDownloadError);
    expect(addTorrent).toHaveBeenCalledTimes(1);
    expect(historyModel.getByShow(show.id)).toHaveLength(1);
  });

  it('should not download the same content twice', async () => {
    const show = createShow();
    await dispatcher.submit(show, episode(5, HASH_A));

    await expect(dispatcher.submit(show, episode(6, HASH_A))).rejects.toBeInstanceOf(DuplicateDownloadError);
    expect(addTorrent).toHaveBeenCalledTimes(1);
  });

  it('should serialize concurrent submissions for one show', async () => {
    const show = createShow();
    const results = await Promise.allSettled([
      dispatcher.submit(show, episode(5, HASH_A)),
      dispatcher.submit(show, episode(5, HASH_B)),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(addTorrent).toHaveBeenCalledTimes(1);
    expect(historyModel.findSuccess(show.id, 5)?.contentId).toBe(HASH_A);
  });

  it('should record a failure and keep the watermark when the client fails', async () => {
    const show = createShow({ lastDownloadedEpisode: 4 });
    addTorrent.mockRejectedValueOnce(new DispatchError('Transmission torrent-add failed: duplicate name', 'rejected'));

    const error = await dispatcher.submit(show, episode(5, HASH_A)).catch((e) => e);

    expect(error).toBeInstanceOf(DispatchError);
    expect(error.reason).toBe('rejected');
    expect(historyModel.getByShow(show.id)).toMatchObject([
      { episode: 5, outcome: 'failed', error: 'Transmission torrent-add failed: duplicate name' },
    ]);
    expect(showsModel.getById(show.id)?.lastDownloadedEpisode).toBe(4);

    // A failed attempt does not block a later retry
    await dispatcher.submit(show, episode(5, HASH_A));
    expect(showsModel.getById(show.id)?.lastDownloadedEpisode).toBe(5);
  });

  it('should wrap unexpected client errors as network failures', async () => {
    const show = createShow();
    addTorrent.mockRejectedValueOnce(new Error('socket hang up'));

    const error = await dispatcher.submit(show, episode(5, HASH_A)).catch((e) => e);
    expect(error).toBeInstanceOf(DispatchError);
    expect(error.reason).toBe('network');
    expect(error.message).toBe('Download client failed: socket hang up');
  });

  it('should count a torrent already in the client as downloaded', async () => {
    const show = createShow();
    addTorrent.mockResolvedValueOnce({ torrent: { id: 3, name: 'x', hashString: HASH_A }, duplicate: true });

    const record = await dispatcher.submit(show, episode(5, HASH_A));
    expect(record.outcome).toBe('success');
  });

  it('should never move the watermark backwards', async () => {
    const show = createShow();
    await dispatcher.submit(show, episode(7, HASH_A));
    await dispatcher.submit(show, episode(6, HASH_B));

    expect(showsModel.getById(show.id)).toMatchObject({ lastDownloadedEpisode: 7, lastDownloadedHash: HASH_A });
  });
});

describe('historyModel', () => {
  beforeEach(() => {
    db.exec('DELETE FROM download_history; DELETE FROM shows;');
  });

  it('should refuse a second success for the same episode', () => {
    const show = createShow();
    const record = { showId: show.id, episode: 2, contentId: HASH_A, downloadUrl: 'magnet:', title: 'ep 2' };
    historyModel.recordSuccess(record);

    expect(() => historyModel.recordSuccess({ ...record, contentId: HASH_B })).toThrow(DuplicateDownloadError);
  });
});

describe('downloadDirFor', () => {
  it('should prefer the show override', () => {
    expect(downloadDirFor(makeShow({ downloadPath: '/mnt/frieren' }), '/data/Anime')).toBe('/mnt/frieren');
  });

  it('should build the season folder under the root', () => {
    expect(downloadDirFor(makeShow({ title: 'Fate/Zero', season: 2 }), '/data/Anime/')).toBe('/data/Anime/Fate Zero/Season 2/');
  });
});
