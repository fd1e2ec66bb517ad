import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, readdir, utimes, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { ImageCache } from '../src/image-cache.js';
import { fakeHttp, recordingLogger, withTempDir } from './helpers.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function options(dir: string, enableImageCache = true) {
  return {
    imageCacheDir: join(dir, 'sonarr_images'),
    sonarrUrl: 'http://sonarr.test:8989',
    sonarrApiKey: 'test-secret',
    enableImageCache,
  };
}

async function age(path: string, days: number): Promise<void> {
  const when = new Date(Date.now() - days * DAY_MS);
  await utimes(path, when, when);
}

describe('ImageCache.ensureImage', () => {
  it('does nothing when caching is disabled', async () => {
    await withTempDir(async (dir) => {
      const { http, requests } = fakeHttp(() => ({ status: 200, data: Buffer.from('jpeg') }));
      const cache = new ImageCache(options(dir, false), http, recordingLogger());

      assert.equal(await cache.ensureImage('http://sonarr.test:8989/MediaCover/10/poster.jpg', 10), null);
      assert.equal(requests.length, 0);
    });
  });

  it('downloads into the cache and returns the dashboard path', async () => {
    await withTempDir(async (dir) => {
      const { http, requests } = fakeHttp(() => ({ status: 200, data: Buffer.from('jpeg-bytes') }));
      const cache = new ImageCache(options(dir), http, recordingLogger());

      const path = await cache.ensureImage('http://sonarr.test:8989/MediaCover/10/poster.jpg', 10);

      assert.equal(path, 'sonarr_images/10_poster.jpg');
      assert.equal(requests[0].headers.get('X-Api-Key'), 'test-secret');
      assert.equal(requests[0].responseType, 'arraybuffer');
      assert.equal(await readFile(join(dir, 'sonarr_images', '10_poster.jpg'), 'utf8'), 'jpeg-bytes');
    });
  });

  it('keeps the API key away from other hosts', async () => {
    await withTempDir(async (dir) => {
      const { http, requests } = fakeHttp(() => ({ status: 200, data: Buffer.from('jpeg') }));
      const cache = new ImageCache(options(dir), http, recordingLogger());

      await cache.ensureImage('https://artworks.example/banners/_cache/posters/10.jpg', 10);

      assert.equal(requests[0].headers.get('X-Api-Key'), undefined);
    });
  });

  it('serves a fresh file without a request and refetches a stale one', async () => {
    await withTempDir(async (dir) => {
      const cacheDir = join(dir, 'sonarr_images');
      await mkdir(cacheDir, { recursive: true });
      const file = join(cacheDir, '10_poster.jpg');
      await writeFile(file, 'old');

      const { http, requests } = fakeHttp(() => ({ status: 200, data: Buffer.from('new') }));
      const cache = new ImageCache(options(dir), http, recordingLogger());
      const url = 'http://sonarr.test:8989/MediaCover/10/poster.jpg';

      assert.equal(await cache.ensureImage(url, 10), 'sonarr_images/10_poster.jpg');
      assert.equal(requests.length, 0);

      await age(file, 8);
      assert.equal(await cache.ensureImage(url, 10), 'sonarr_images/10_poster.jpg');
      assert.equal(requests.length, 1);
      assert.equal(await readFile(file, 'utf8'), 'new');
    });
  });

  it('returns null and warns when the download fails', async () => {
    await withTempDir(async (dir) => {
      const logger = recordingLogger();
      const { http } = fakeHttp(() => ({ status: 500, data: null }));
      const cache = new ImageCache(options(dir), http, logger);

      assert.equal(await cache.ensureImage('http://sonarr.test:8989/MediaCover/10/poster.jpg', 10, 'fanart'), null);
      assert.equal(logger.entries[0].level, 'warn');
      assert.equal(logger.entries[0].message, 'Error caching image');
      assert.deepEqual(await readdir(join(dir, 'sonarr_images')), []);
    });
  });
});

describe('ImageCache.pruneStale', () => {
  it('removes only files older than the retention period', async () => {
    await withTempDir(async (dir) => {
      const cacheDir = join(dir, 'sonarr_images');
      await mkdir(cacheDir, { recursive: true });
      await writeFile(join(cacheDir, '10_poster.jpg'), 'a');
      await writeFile(join(cacheDir, '20_poster.jpg'), 'b');
      await age(join(cacheDir, '10_poster.jpg'), 40);

      const cache = new ImageCache(options(dir), fakeHttp(() => ({ status: 200, data: null })).http, recordingLogger());

      assert.equal(await cache.pruneStale(30), 1);
      assert.deepEqual(await readdir(cacheDir), ['20_poster.jpg']);
    });
  });

  it('treats a missing directory as empty', async () => {
    await withTempDir(async (dir) => {
      const cache = new ImageCache(options(dir), fakeHttp(() => ({ status: 200, data: null })).http, recordingLogger());
      assert.equal(await cache.pruneStale(30), 0);
    });
  });
});
