/**
 * Sonarr API Client
 *
 * Read-only v3 endpoints. Every fetcher degrades to an empty result on
 * transport or HTTP errors and logs the failure; nothing is thrown to callers.
 */

import axios, { type AxiosInstance } from 'axios';
import { createLogger, type PluginLogger } from '@episode-calendar/plugin-utils';
import {
  CalendarEpisodeSchema,
  SeriesDetailSchema,
  SeriesSummarySchema,
  SystemStatusSchema,
  parseList,
} from './schemas.js';
import type {
  CalendarConfig,
  CycleContext,
  DateWindow,
  SeriesDetail,
  SeriesSummary,
  SonarrCalendarEpisode,
  SonarrEpisode,
} from './types.js';

const STATUS_TIMEOUT_MS = 10_000;
const REQUEST_TIMEOUT_MS = 30_000;

export interface ConnectionCheck {
  ok: boolean;
  version?: string;
  error?: string;
}

export interface CalendarFetchResult {
  items: SonarrCalendarEpisode[];
  window: DateWindow;
}

export function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}${error.response.statusText ? ` ${error.response.statusText}` : ''}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class SonarrClient {
  private baseUrl: string;
  private apiKey: string;
  private http: AxiosInstance;
  private logger: PluginLogger;

  constructor(
    config: Pick<CalendarConfig, 'sonarrUrl' | 'sonarrApiKey'>,
    http: AxiosInstance = axios.create(),
    logger: PluginLogger = createLogger('sonarr-calendar:client')
  ) {
    this.baseUrl = config.sonarrUrl.replace(/\/+$/, '');
    this.apiKey = config.sonarrApiKey;
    this.http = http;
    this.logger = logger;
  }

  private async get(path: string, params?: Record<string, string | number>, timeout = REQUEST_TIMEOUT_MS): Promise<unknown> {
    const response = await this.http.get<unknown>(`${this.baseUrl}/api/v3${path}`, {
      params,
      headers: { 'X-Api-Key': this.apiKey },
      timeout,
    });
    return response.data;
  }

  /** `GET /api/v3/system/status` */
  async testConnection(): Promise<ConnectionCheck> {
    try {
      const status = SystemStatusSchema.safeParse(await this.get('/system/status', undefined, STATUS_TIMEOUT_MS));
      return { ok: true, version: status.success ? status.data.version : undefined };
    } catch (error) {
      const message = describeRequestError(error);
      this.logger.warn('Connection test failed', { error: message });
      return { ok: false, error: message };
    }
  }

  /**
   * Items whose air date falls in the cycle window (inclusive). The window is
   * computed locally and returned even when the request fails.
   */
  async fetchCalendarWindow(ctx: CycleContext): Promise<CalendarFetchResult> {
    const { window } = ctx;

    try {
      const payload = await this.get('/calendar', {
        start: window.start,
        end: window.end,
        includeSeries: 'true',
        includeEpisodeFile: 'true',
        includeEpisodeImages: 'true',
        unmonitored: 'true',
      });
      const { items, dropped } = parseList(CalendarEpisodeSchema, payload);
      if (dropped > 0) {
        this.logger.debug('Dropped malformed calendar entries', { dropped });
      }
      return { items, window };
    } catch (error) {
      this.logger.error('Error fetching calendar', { error: describeRequestError(error), start: window.start, end: window.end });
      return { items: [], window };
    }
  }

  /** Full series catalog keyed by id; empty on error */
  async fetchAllParents(): Promise<Map<number, SeriesSummary>> {
    const series = new Map<number, SeriesSummary>();

    try {
      const { items, dropped } = parseList(SeriesSummarySchema, await this.get('/series'));
      if (dropped > 0) {
        this.logger.debug('Dropped malformed series entries', { dropped });
      }
      for (const item of items) {
        series.set(item.id, item);
      }
    } catch (error) {
      this.logger.error('Error fetching series', { error: describeRequestError(error) });
    }

    return series;
  }

  /**
   * Season statistics for one series. null means no statistics are
   * available, which is not the same as a series with zero episodes.
   */
  async fetchParentDetail(seriesId: number): Promise<SeriesDetail | null> {
    try {
      const result = SeriesDetailSchema.safeParse(await this.get(`/series/${seriesId}`));
      if (!result.success) {
        this.logger.warn('Unexpected series detail payload', { seriesId });
        return null;
      }
      return result.data;
    } catch (error) {
      this.logger.error(`Error fetching series ${seriesId} details`, { error: describeRequestError(error) });
      return null;
    }
  }

  /** `GET /api/v3/episode?seriesId=` */
  async fetchParentEpisodes(seriesId: number): Promise<SonarrEpisode[]> {
    try {
      return parseList(CalendarEpisodeSchema, await this.get('/episode', { seriesId })).items;
    } catch (error) {
      this.logger.error(`Error fetching episodes for series ${seriesId}`, { error: describeRequestError(error) });
      return [];
    }
  }
}
