import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SonarrClient } from '../src/client.js';
import { fakeHttp, recordingLogger, testConfig, testContext, unreachableHttp } from './helpers.js';

const config = testConfig({ sonarrUrl: 'http://sonarr.test:8989/' });

describe('SonarrClient.testConnection', () => {
  it('reports the server version', async () => {
    const { http, requests } = fakeHttp(() => ({ status: 200, data: { appName: 'Sonarr', version: '4.0.9' } }));
    const client = new SonarrClient(config, http, recordingLogger());

    assert.deepEqual(await client.testConnection(), { ok: true, version: '4.0.9' });
    assert.equal(requests[0].url, 'http://sonarr.test:8989/api/v3/system/status');
    assert.equal(requests[0].headers.get('X-Api-Key'), 'test-secret');
    assert.equal(requests[0].timeout, 10_000);
  });

  it('describes HTTP failures', async () => {
    const { http } = fakeHttp(() => ({ status: 500, data: 'boom' }));
    const client = new SonarrClient(config, http, recordingLogger());

    assert.deepEqual(await client.testConnection(), { ok: false, error: 'HTTP 500 Internal Server Error' });
  });

  it('describes transport failures', async () => {
    const logger = recordingLogger();
    const client = new SonarrClient(config, unreachableHttp(), logger);

    assert.deepEqual(await client.testConnection(), {
      ok: false,
      error: 'ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:8989',
    });
    assert.equal(logger.entries[0].level, 'warn');
  });
});

describe('SonarrClient.fetchCalendarWindow', () => {
  it('requests the window with every include flag', async () => {
    const { http, requests } = fakeHttp(() => ({
      status: 200,
      data: [
        { id: 1, seriesId: 10, seasonNumber: 1, episodeNumber: 1, title: 'Pilot', airDate: '2026-10-19' },
        { id: 2, title: 'No series' },
      ],
    }));
    const ctx = testContext();
    const client = new SonarrClient(config, http, recordingLogger());

    const result = await client.fetchCalendarWindow(ctx);

    assert.equal(requests[0].url, 'http://sonarr.test:8989/api/v3/calendar');
    assert.deepEqual(requests[0].params, {
      start: '2026-10-12',
      end: '2026-11-18',
      includeSeries: 'true',
      includeEpisodeFile: 'true',
      includeEpisodeImages: 'true',
      unmonitored: 'true',
    });
    assert.equal(requests[0].timeout, 30_000);
    assert.equal(result.items.length, 1);
    assert.equal(result.items[0].title, 'Pilot');
    assert.deepEqual(result.window, ctx.window);
  });

  it('returns no items and the local window on failure', async () => {
    const logger = recordingLogger();
    const ctx = testContext();
    const client = new SonarrClient(config, unreachableHttp(), logger);

    const result = await client.fetchCalendarWindow(ctx);

    assert.deepEqual(result, { items: [], window: ctx.window });
    assert.equal(logger.entries[0].level, 'error');
    assert.equal(logger.entries[0].message, 'Error fetching calendar');
  });
});

describe('SonarrClient series endpoints', () => {
  it('fetchAllParents keys the catalog by id', async () => {
    const { http } = fakeHttp(() => ({
      status: 200,
      data: [{ id: 10, title: 'Harbor Lights' }, { id: 11, title: 'Night Shift' }, { title: 'No id' }],
    }));
    const client = new SonarrClient(config, http, recordingLogger());

    const series = await client.fetchAllParents();

    assert.deepEqual([...series.keys()], [10, 11]);
    assert.equal(series.get(11)?.title, 'Night Shift');
  });

  it('fetchAllParents is empty on failure', async () => {
    const client = new SonarrClient(config, unreachableHttp(), recordingLogger());
    assert.equal((await client.fetchAllParents()).size, 0);
  });

  it('fetchParentDetail returns seasons or null', async () => {
    const { http, requests } = fakeHttp((request) =>
      request.url?.endsWith('/series/10')
        ? { status: 200, data: { id: 10, title: 'Harbor Lights', seasons: [{ seasonNumber: 1, monitored: true }] } }
        : { status: 500, data: null }
    );
    const client = new SonarrClient(config, http, recordingLogger());

    const detail = await client.fetchParentDetail(10);
    assert.equal(detail?.seasons.length, 1);
    assert.equal(requests[0].url, 'http://sonarr.test:8989/api/v3/series/10');
    assert.equal(await client.fetchParentDetail(99), null);
  });

  it('fetchParentEpisodes filters by series id', async () => {
    const { http, requests } = fakeHttp(() => ({
      status: 200,
      data: [
        { id: 1, seriesId: 10, seasonNumber: 1, episodeNumber: 1, title: 'Pilot', hasFile: true },
        { id: 2, seriesId: 10, seasonNumber: 1, episodeNumber: 2, title: 'Second' },
      ],
    }));
    const client = new SonarrClient(config, http, recordingLogger());

    const episodes = await client.fetchParentEpisodes(10);

    assert.equal(requests[0].url, 'http://sonarr.test:8989/api/v3/episode');
    assert.deepEqual(requests[0].params, { seriesId: 10 });
    assert.deepEqual(
      episodes.map((ep) => [ep.episodeNumber, ep.hasFile]),
      [
        [1, true],
        [2, false],
      ]
    );
  });
});
