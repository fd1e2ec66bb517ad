/**
 * Sonarr Calendar
 * Static HTML calendar and download progress dashboard for a Sonarr server
 */

export { SonarrClient, describeRequestError } from './client.js';
export type { ConnectionCheck, CalendarFetchResult } from './client.js';
export {
  ConfigError,
  loadConfig,
  loadServerConfig,
  parseConfig,
  saveConfig,
  configFromEnv,
  describeConfig,
  resolveConfigPath,
} from './config.js';
export { CalendarAggregator, groupBySeriesAndDate, buildSlot, resolvePosterUrl } from './aggregator.js';
export { calculateSeriesProgress, calculateWindowProgress } from './progress.js';
export { summarize, findCompletedSeasons } from './statistics.js';
export { ImageCache } from './image-cache.js';
export { DashboardRenderer, renderDashboard } from './renderer.js';
export type { DashboardInput, RendererOptions } from './renderer.js';
export { writeHtml, writeJson } from './output.js';
export { CalendarScheduler } from './scheduler.js';
export type { CalendarSource, SchedulerOptions, SchedulerStatus } from './scheduler.js';
export { createServer } from './server.js';
export { buildDateWindow } from './dates.js';
export * from './types.js';
