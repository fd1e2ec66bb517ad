/**
 * Shared fixtures for the sonarr-calendar tests
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LogMeta, PluginLogger } from '@episode-calendar/plugin-utils';
import { buildDateWindow } from '../src/dates.js';
import { emptySeriesProgress } from '../src/progress.js';
import type {
  AggregatedShow,
  CalendarConfig,
  CycleContext,
  SeriesProgress,
  SonarrCalendarEpisode,
} from '../src/types.js';

export const NOW = new Date('2026-10-19T12:00:00Z');

export function testContext(daysPast = 7, daysFuture = 30): CycleContext {
  return { now: NOW, window: buildDateWindow(NOW, daysPast, daysFuture) };
}

export function testConfig(overrides: Partial<CalendarConfig> = {}): CalendarConfig {
  return {
    sonarrUrl: 'http://sonarr.test:8989',
    sonarrApiKey: 'test-secret',
    daysPast: 7,
    daysFuture: 30,
    outputHtmlFile: 'sonarr_calendar.html',
    outputJsonFile: null,
    imageCacheDir: 'sonarr_images',
    refreshIntervalHours: 6,
    imageQuality: 'poster',
    imageSize: '500',
    enableImageCache: false,
    htmlTitle: 'Sonarr Calendar Pro',
    htmlTheme: 'dark',
    gridColumns: 4,
    imageRetentionDays: 30,
    ...overrides,
  };
}

export function episode(overrides: Partial<SonarrCalendarEpisode> = {}): SonarrCalendarEpisode {
  return {
    id: 1,
    seriesId: 10,
    seasonNumber: 1,
    episodeNumber: 1,
    title: 'Pilot',
    overview: '',
    airDate: '2026-10-19',
    airDateUtc: '2026-10-19T02:00:00Z',
    hasFile: false,
    monitored: true,
    ...overrides,
  };
}

export interface ShowOverrides extends Partial<Omit<AggregatedShow, 'progress' | 'windowProgress'>> {
  progress?: Partial<SeriesProgress>;
  windowPercentage?: number;
  episodesInRange?: number;
  downloadedInRange?: number;
}

/** An aggregated show with loaded, zeroed statistics unless overridden */
export function aggregatedShow(overrides: ShowOverrides = {}): AggregatedShow {
  const { progress, windowPercentage = 0, episodesInRange = 0, downloadedInRange = 0, ...rest } = overrides;
  return {
    seriesId: 10,
    title: 'Harbor Lights',
    truncatedTitle: 'Harbor Lights',
    slug: 'harbor-lights',
    year: 2024,
    status: 'continuing',
    network: 'Channel 9',
    runtime: 45,
    genres: ['Drama'],
    rating: 0,
    posterUrl: '',
    progressColor: '#F44336',
    slots: [],
    ...rest,
    progress: { ...emptySeriesProgress(), statisticsAvailable: true, ...progress },
    windowProgress: { episodesInRange, downloadedInRange, percentage: windowPercentage, color: '#F44336' },
  };
}

export interface RecordedLog {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: LogMeta;
}

export function recordingLogger(): PluginLogger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    debug: (message, meta) => entries.push({ level: 'debug', message, meta }),
    info: (message, meta) => entries.push({ level: 'info', message, meta }),
    warn: (message, meta) => entries.push({ level: 'warn', message, meta }),
    error: (message, meta) => entries.push({ level: 'error', message, meta }),
  };
}

export interface FakeReply {
  status: number;
  data: unknown;
}

export type FakeRoute = (config: InternalAxiosRequestConfig) => FakeReply;

/**
 * Axios instance answered in-process. Replies with status >= 400 are raised as
 * AxiosError, the way axios' own adapters settle them.
 */
export function fakeHttp(route: FakeRoute): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = route(config);
      const response = {
        data: reply.data,
        status: reply.status,
        statusText: reply.status >= 400 ? 'Internal Server Error' : 'OK',
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

export function unreachableHttp(): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:8989', 'ECONNREFUSED', config);
    },
  });
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'sonarr-calendar-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
