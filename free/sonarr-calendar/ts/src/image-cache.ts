/**
 * Poster cache keyed by `{seriesId}_{kind}.jpg` inside the configured
 * directory. Files younger than the freshness threshold are served without a
 * network call; older ones are fetched again.
 */

import axios, { type AxiosInstance } from 'axios';
import { mkdir, readdir, stat, unlink, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { createLogger, type PluginLogger } from '@episode-calendar/plugin-utils';
import { describeRequestError } from './client.js';
import type { CalendarConfig } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
export const IMAGE_FRESHNESS_DAYS = 7;

export type ImageCacheOptions = Pick<CalendarConfig, 'imageCacheDir' | 'sonarrUrl' | 'sonarrApiKey' | 'enableImageCache'> & {
  freshnessDays?: number;
};

function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

export class ImageCache {
  private dir: string;
  private publicPrefix: string;
  private serverHost: string | null;
  private apiKey: string;
  private enabled: boolean;
  private freshnessMs: number;
  private http: AxiosInstance;
  private logger: PluginLogger;

  constructor(
    options: ImageCacheOptions,
    http: AxiosInstance = axios.create(),
    logger: PluginLogger = createLogger('sonarr-calendar:images')
  ) {
    this.dir = options.imageCacheDir;
    this.publicPrefix = basename(options.imageCacheDir);
    this.serverHost = hostOf(options.sonarrUrl);
    this.apiKey = options.sonarrApiKey;
    this.enabled = options.enableImageCache;
    this.freshnessMs = (options.freshnessDays ?? IMAGE_FRESHNESS_DAYS) * DAY_MS;
    this.http = http;
    this.logger = logger;
  }

  static fileName(seriesId: number, kind: string): string {
    return `${seriesId}_${kind}.jpg`;
  }

  private async ageOf(path: string): Promise<number | null> {
    try {
      const info = await stat(path);
      return Date.now() - info.mtimeMs;
    } catch {
      return null;
    }
  }

  /**
   * Returns the dashboard-relative path of a cached copy, or null when caching
   * is disabled or the download fails. Callers fall back to the remote URL or
   * a placeholder.
   */
  async ensureImage(url: string, seriesId: number, kind = 'poster'): Promise<string | null> {
    if (!url || !this.enabled) {
      return null;
    }

    const fileName = ImageCache.fileName(seriesId, kind);
    const cachePath = join(this.dir, fileName);
    const publicPath = `${this.publicPrefix}/${fileName}`;

    const age = await this.ageOf(cachePath);
    if (age !== null && age < this.freshnessMs) {
      return publicPath;
    }

    try {
      await mkdir(this.dir, { recursive: true });
      const headers: Record<string, string> =
        this.serverHost !== null && hostOf(url) === this.serverHost ? { 'X-Api-Key': this.apiKey } : {};
      const response = await this.http.get<ArrayBuffer>(url, {
        headers,
        responseType: 'arraybuffer',
        timeout: 30_000,
      });

      if (response.status !== 200) {
        this.logger.warn('Failed to download image', { seriesId, status: response.status });
        return null;
      }

      await writeFile(cachePath, Buffer.from(response.data));
      this.logger.debug('Cached image', { seriesId, file: fileName });
      return publicPath;
    } catch (error) {
      this.logger.warn('Error caching image', { seriesId, error: describeRequestError(error) });
      return null;
    }
  }

  /**
   * Delete every cached file older than `maxAgeDays`. Returns the number of
   * files removed.
   */
  async pruneStale(maxAgeDays: number): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch {
      return 0;
    }

    const cutoff = Date.now() - maxAgeDays * DAY_MS;
    let removed = 0;

    for (const entry of entries) {
      const path = join(this.dir, entry);
      try {
        const info = await stat(path);
        if (!info.isFile() || info.mtimeMs >= cutoff) continue;
        await unlink(path);
        removed++;
        this.logger.info('Removed old cached image', { file: entry });
      } catch (error) {
        this.logger.error(`Error removing ${entry}`, { error: error instanceof Error ? error.message : String(error) });
      }
    }

    return removed;
  }
}
