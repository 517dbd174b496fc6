import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/app';
import db from '../../src/db';
import { filtersModel } from '../../src/models/filters';
import { historyModel } from '../../src/models/history';
import { settingsModel } from '../../src/models/settings';
import { showsModel } from '../../src/models/shows';
import type { ManualRun, TrackerStatus } from '../../src/services/tracker';
import type { PollCycleResult } from '../../src/types/Download';

/**
 * Smoke tests for the JSON API.
 * Models run against the in-memory database; the tracker is a stand-in.
 */

const cycle: PollCycleResult = {
  jobId: 'poll-manual-1',
  trigger: 'manual',
  startedAt: '2026-10-18T05:00:00.000Z',
  finishedAt: '2026-10-18T05:00:02.000Z',
  aborted: false,
  showsProcessed: 1,
  itemsSeen: 4,
  itemsSkipped: 1,
  accepted: 2,
  downloaded: 1,
  deferred: 0,
  diagnostics: [],
};

function createTracker() {
  return {
    status: vi.fn(
      (): TrackerStatus => ({
        running: false,
        phase: 'idle',
        progress: { isRunning: false, phase: 'idle', jobId: null, currentShow: null, processed: 0, total: 0 },
        nextRun: null,
        settings: settingsModel.getTrackerSettings(),
      })
    ),
    recentCycles: vi.fn(() => [cycle]),
    runNow: vi.fn((): ManualRun => ({ started: true, result: Promise.resolve(cycle) })),
    reload: vi.fn(() => settingsModel.getTrackerSettings()),
  };
}

describe('API', () => {
  let tracker: ReturnType<typeof createTracker>;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    db.exec('DELETE FROM download_history; DELETE FROM show_rule_overrides; DELETE FROM filter_rules; DELETE FROM shows; DELETE FROM app_settings;');
    tracker = createTracker();
    app = createApp(tracker);
  });

  describe('/api/shows', () => {
    it('should create a show with defaults', async () => {
      const response = await request(app).post('/api/shows').send({ title: 'Dandadan', quality: '720p' });

      expect(response.status).toBe(201);
      expect(response.body.show).toMatchObject({
        title: 'Dandadan',
        aliases: [],
        season: 1,
        sources: [{ kind: 'nyaa_rss', uploader: 'subsplease' }],
        quality: '720p',
        preferredGroup: null,
        lastDownloadedEpisode: 0,
        isTracked: true,
      });
    });

    it('should reject a show without a title', async () => {
      const response = await request(app).post('/api/shows').send({ season: 2 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'title must be a non-empty string' });
    });

    it('should reject an unknown feed source', async () => {
      const response = await request(app)
        .post('/api/shows')
        .send({ title: 'Dandadan', sources: [{ kind: 'unknown' }] });

      expect(response.status).toBe(400);
    });

    it('should list, load and update shows', async () => {
      const created = await request(app).post('/api/shows').send({ title: 'Dandadan' });
      const id: number = created.body.show.id;

      const list = await request(app).get('/api/shows');
      expect(list.body.shows.map((s: { title: string }) => s.title)).toEqual(['Dandadan']);

      const updated = await request(app).patch(`/api/shows/${id}`).send({ preferredGroup: 'Erai-raws', season: 2 });
      expect(updated.status).toBe(200);
      expect(updated.body.show).toMatchObject({ preferredGroup: 'Erai-raws', season: 2 });

      const loaded = await request(app).get(`/api/shows/${id}`);
      expect(loaded.body).toMatchObject({ show: { id, preferredGroup: 'Erai-raws' }, history: [] });
    });

    it('should return 404 for a missing show', async () => {
      expect((await request(app).get('/api/shows/999')).status).toBe(404);
      expect((await request(app).patch('/api/shows/999').send({ season: 2 })).status).toBe(404);
    });

    it('should reject ids that are not positive integers', async () => {
      const response = await request(app).get('/api/shows/abc');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'id must be a positive integer' });
    });
  });

  describe('/api/filters', () => {
    const minimumEpisode = {
      name: 'Skip recaps',
      predicate: { kind: 'compare', field: 'episode', op: '<', value: 1 },
      action: 'reject',
      priority: 10,
    };

    it('should create a global rule', async () => {
      const response = await request(app).post('/api/filters').send(minimumEpisode);

      expect(response.status).toBe(201);
      expect(response.body.rule).toMatchObject({
        name: 'Skip recaps',
        predicate: { kind: 'compare', field: 'episode', op: '<', value: 1 },
        action: 'reject',
        priority: 10,
        scope: { kind: 'global' },
        enabled: true,
      });
    });

    it('should accept prefer rules and reject unknown actions', async () => {
      const prefer = await request(app)
        .post('/api/filters')
        .send({ name: 'Prefer HEVC', predicate: { kind: 'contains', field: 'extras', value: 'HEVC' }, action: 'prefer', priority: 5 });
      expect(prefer.status).toBe(201);
      expect(prefer.body.rule).toMatchObject({ action: 'prefer', priority: 5 });

      const unknown = await request(app).post('/api/filters').send({ ...minimumEpisode, action: 'boost' });
      expect(unknown.status).toBe(400);
      expect(unknown.body).toEqual({ error: 'action must be "accept", "reject" or "prefer"' });
    });

    it('should reject an invalid predicate', async () => {
      const response = await request(app)
        .post('/api/filters')
        .send({ name: 'Broken', predicate: { kind: 'regex', field: 'title', pattern: '(' }, action: 'reject' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'predicate.pattern is not a valid regular expression: (' });
    });

    it('should reject a rule scoped to a missing show', async () => {
      const response = await request(app).post('/api/filters').send({ ...minimumEpisode, showId: 42 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Show 42 does not exist' });
    });

    it('should list stored rules that no longer validate separately', async () => {
      filtersModel.seedDefaults();
      db.prepare("INSERT INTO filter_rules (name, predicate, action) VALUES ('Legacy', '{\"kind\":\"unknown\"}', 'reject')").run();

      const response = await request(app).get('/api/filters');

      expect(response.status).toBe(200);
      expect(response.body.rules).toHaveLength(3);
      expect(response.body.invalid).toHaveLength(1);
      expect(response.body.invalid[0].error).toMatch(/^Filter rule "Legacy" \(\d+\) is invalid: predicate.kind "unknown"/);
    });

    it('should update and delete a rule', async () => {
      const created = await request(app).post('/api/filters').send(minimumEpisode);
      const id: number = created.body.rule.id;

      const updated = await request(app).patch(`/api/filters/${id}`).send({ enabled: false });
      expect(updated.body.rule.enabled).toBe(false);

      expect((await request(app).delete(`/api/filters/${id}`)).status).toBe(204);
      expect((await request(app).delete(`/api/filters/${id}`)).status).toBe(404);
    });

    it('should disable and re-enable a global rule for one show', async () => {
      const show = showsModel.create({
        title: 'Dandadan',
        aliases: [],
        season: 1,
        sources: [{ kind: 'nyaa_rss', uploader: 'subsplease' }],
        quality: '1080p',
        preferredGroup: null,
        downloadPath: null,
        lastDownloadedEpisode: 0,
        isTracked: true,
      });
      const created = await request(app).post('/api/filters').send(minimumEpisode);
      const ruleId: number = created.body.rule.id;

      const disabled = await request(app).post(`/api/filters/${ruleId}/shows/${show.id}/disable`);
      expect(disabled.body).toEqual({ success: true, overrides: [{ showId: show.id, ruleId }] });

      const enabled = await request(app).delete(`/api/filters/${ruleId}/shows/${show.id}/disable`);
      expect(enabled.body).toEqual({ success: true, overrides: [] });

      const again = await request(app).delete(`/api/filters/${ruleId}/shows/${show.id}/disable`);
      expect(again.status).toBe(404);
    });

    it('should refuse to disable a show-scoped rule', async () => {
      const show = await request(app).post('/api/shows').send({ title: 'Dandadan' });
      const showId: number = show.body.show.id;
      const created = await request(app).post('/api/filters').send({ ...minimumEpisode, showId });

      const response = await request(app).post(`/api/filters/${created.body.rule.id}/shows/${showId}/disable`);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Only global rules can be disabled per show' });
    });
  });

  describe('/api status routes', () => {
    it('should list download history for a show', async () => {
      const show = await request(app).post('/api/shows').send({ title: 'Dandadan' });
      const showId: number = show.body.show.id;
      historyModel.recordSuccess({ showId, episode: 3, contentId: 'test-hash', downloadUrl: 'magnet:?xt=urn:btih:test-hash', title: 'Dandadan - 03' });

      const response = await request(app).get(`/api/history?showId=${showId}`);

      expect(response.status).toBe(200);
      expect(response.body.history).toMatchObject([{ showId, episode: 3, contentId: 'test-hash', outcome: 'success' }]);
    });

    it('should report tracker status and recent cycles', async () => {
      const status = await request(app).get('/api/status');
      expect(status.body).toMatchObject({ running: false, phase: 'idle', nextRun: null, settings: { pollTimesPerDay: 4 } });

      const cycles = await request(app).get('/api/cycles');
      expect(cycles.body).toEqual({ cycles: [cycle] });
    });

    it('should return logs as a list', async () => {
      const response = await request(app).get('/api/logs?level=error&limit=10');

      expect(response.status).toBe(200);
      expect(Array.isArray(response.body.logs)).toBe(true);
    });
  });

  describe('/actions', () => {
    it('should start a poll cycle', async () => {
      const response = await request(app).post('/actions/poll');

      expect(response.status).toBe(202);
      expect(response.body).toEqual({ started: true, message: 'Poll cycle started' });
      expect(tracker.runNow).toHaveBeenCalledTimes(1);
    });

    it('should report a poll already in progress', async () => {
      tracker.runNow.mockReturnValueOnce({ started: false, result: Promise.resolve(cycle) });

      const response = await request(app).post('/actions/poll');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ started: false, message: 'A poll cycle is already running' });
    });

    it('should store new settings before reloading', async () => {
      const response = await request(app).post('/actions/reload').send({ pollTimesPerDay: 12 });

      expect(response.status).toBe(200);
      expect(response.body.settings.pollTimesPerDay).toBe(12);
      expect(settingsModel.getTrackerSettings().pollTimesPerDay).toBe(12);
      expect(tracker.reload).toHaveBeenCalledTimes(1);
    });

    it('should reject invalid settings without reloading', async () => {
      const response = await request(app).post('/actions/reload').send({ confidenceThreshold: 2 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'confidenceThreshold must be a number between 0 and 1' });
      expect(tracker.reload).not.toHaveBeenCalled();
    });
  });

  it('should answer unknown routes with JSON', async () => {
    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not found' });
  });
});
