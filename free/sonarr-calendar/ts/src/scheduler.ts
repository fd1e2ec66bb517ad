/**
 * Refresh loop
 *
 * Two states: `running` while the loop is active and `stopped` otherwise.
 * Each cycle fetches the calendar and series list, aggregates, renders and
 * writes the outputs, then sleeps for the refresh interval. `stop()` aborts the
 * sleep so the loop ends without waiting out the interval.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger, type PluginLogger } from '@episode-calendar/plugin-utils';
import { CalendarAggregator, type DetailSource } from './aggregator.js';
import type { CalendarFetchResult } from './client.js';
import { buildDateWindow, utcDayString } from './dates.js';
import type { ImageCache } from './image-cache.js';
import { writeHtml, writeJson } from './output.js';
import { DashboardRenderer } from './renderer.js';
import { findCompletedSeasons, summarize } from './statistics.js';
import type {
  CalendarConfig,
  CalendarSnapshot,
  CycleContext,
  CycleResult,
  SchedulerState,
  SeriesSummary,
} from './types.js';

const HOUR_MS = 60 * 60 * 1000;
/** Sunday = 0 */
export const PRUNE_WEEKDAY = 1;

export interface CalendarSource extends DetailSource {
  fetchCalendarWindow(ctx: CycleContext): Promise<CalendarFetchResult>;
  fetchAllParents(): Promise<Map<number, SeriesSummary>>;
}

export interface SchedulerOptions {
  config: CalendarConfig;
  source: CalendarSource;
  imageCache?: ImageCache | null;
  clock?: () => Date;
  logger?: PluginLogger;
}

export interface SchedulerStatus {
  state: SchedulerState;
  cycles: number;
  lastResult: CycleResult | null;
  nextRunAt: string | null;
  lastPruneDay: string | null;
}

export class CalendarScheduler {
  private config: CalendarConfig;
  private source: CalendarSource;
  private imageCache: ImageCache | null;
  private clock: () => Date;
  private logger: PluginLogger;
  private aggregator: CalendarAggregator;
  private renderer: DashboardRenderer;

  private state: SchedulerState = 'stopped';
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private cycles = 0;
  private lastResult: CycleResult | null = null;
  private lastSnapshot: CalendarSnapshot | null = null;
  private nextRunAt: Date | null = null;
  private lastPruneDay: string | null = null;

  constructor(options: SchedulerOptions) {
    this.config = options.config;
    this.source = options.source;
    this.imageCache = options.imageCache ?? null;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('sonarr-calendar:scheduler');
    this.aggregator = new CalendarAggregator(
      this.source,
      this.imageCache,
      this.config,
      this.logger
    );
    this.renderer = new DashboardRenderer(this.config);
  }

  getState(): SchedulerState {
    return this.state;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      cycles: this.cycles,
      lastResult: this.lastResult,
      nextRunAt: this.nextRunAt ? this.nextRunAt.toISOString() : null,
      lastPruneDay: this.lastPruneDay,
    };
  }

  /** Snapshot from the most recent successful cycle */
  getSnapshot(): CalendarSnapshot | null {
    return this.lastSnapshot;
  }

  async runCycle(): Promise<CycleResult> {
    const now = this.clock();
    const startedMs = Date.now();
    const ctx: CycleContext = {
      now,
      window: buildDateWindow(now, this.config.daysPast, this.config.daysFuture),
    };

    const result: CycleResult = {
      success: false,
      startedAt: now.toISOString(),
      duration: 0,
      calendarItems: 0,
      seriesLoaded: 0,
      showsProcessed: 0,
      htmlWritten: false,
      jsonWritten: false,
    };

    try {
      this.logger.info('Fetching calendar data', { start: ctx.window.start, end: ctx.window.end });
      const { items, window } = await this.source.fetchCalendarWindow(ctx);
      result.calendarItems = items.length;

      const series = await this.source.fetchAllParents();
      result.seriesLoaded = series.size;

      const shows = await this.aggregator.aggregate(items, series, { now, window });
      result.showsProcessed = shows.length;

      const summary = summarize(shows, window);
      const completedSeasons = findCompletedSeasons(shows, items, window);
      this.logger.info('Calendar aggregated', {
        items: items.length,
        series: series.size,
        shows: shows.length,
        overallProgress: Number(summary.overallProgress.toFixed(1)),
        windowProgress: Number(summary.overallWindowProgress.toFixed(1)),
        completedSeasons: completedSeasons.length,
      });

      const html = this.renderer.render({ shows, summary, completedSeasons, generatedAt: now });
      result.htmlWritten = await writeHtml(this.config.outputHtmlFile, html);

      if (result.htmlWritten) {
        const snapshot: CalendarSnapshot = {
          lastUpdated: now.toISOString(),
          window,
          summary,
          completedSeasons,
          totalShows: shows.length,
          shows,
        };
        this.lastSnapshot = snapshot;
        if (this.config.outputJsonFile) {
          result.jsonWritten = await writeJson(this.config.outputJsonFile, snapshot);
        }
      }

      result.success = result.htmlWritten;
    } catch (error) {
      result.error = error instanceof Error ? error.message : String(error);
      this.logger.error('Cycle failed', { error: result.error });
    }

    result.duration = Date.now() - startedMs;
    this.cycles++;
    this.lastResult = result;
    return result;
  }

  /**
   * Prunes the image cache when today (UTC) is the prune weekday and no prune
   * has run yet today. Returns the number of files removed, or null when skipped.
   */
  async maybePruneImages(now: Date = this.clock()): Promise<number | null> {
    if (!this.imageCache || now.getUTCDay() !== PRUNE_WEEKDAY) return null;

    const today = utcDayString(now);
    if (today === this.lastPruneDay) return null;
    this.lastPruneDay = today;

    const removed = await this.imageCache.pruneStale(this.config.imageRetentionDays);
    this.logger.info('Image cache pruned', { removed, retentionDays: this.config.imageRetentionDays });
    return removed;
  }

  /** Runs the first cycle immediately, then one per refresh interval */
  start(): void {
    if (this.state === 'running') return;

    this.state = 'running';
    this.abort = new AbortController();
    this.loop = this.runLoop(this.abort.signal).catch((error: unknown) => {
      this.state = 'stopped';
      this.logger.error('Scheduler loop ended', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    this.logger.info('Scheduler started', { intervalHours: this.config.refreshIntervalHours });
  }

  /** Stop the loop and wait for the current cycle to finish */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;

    this.state = 'stopped';
    this.abort?.abort();
    await this.loop;
    this.abort = null;
    this.loop = null;
    this.nextRunAt = null;
    this.logger.info('Scheduler stopped');
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const intervalMs = this.config.refreshIntervalHours * HOUR_MS;

    while (!signal.aborted) {
      try {
        await this.maybePruneImages();
        await this.runCycle();
      } catch (error) {
        this.logger.error('Unexpected scheduler error', {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (signal.aborted) break;

      this.nextRunAt = new Date(Date.now() + intervalMs);
      this.logger.info(`Next update in ${this.config.refreshIntervalHours} hour(s)`);
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }
  }
}
