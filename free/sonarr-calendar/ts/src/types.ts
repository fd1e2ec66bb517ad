/**
 * Sonarr Calendar Types
 */

// =============================================================================
// Configuration
// =============================================================================

export type HtmlTheme = 'dark' | 'light';

export interface CalendarConfig {
  sonarrUrl: string;
  sonarrApiKey: string;
  daysPast: number;
  daysFuture: number;
  outputHtmlFile: string;
  /** null disables the JSON snapshot */
  outputJsonFile: string | null;
  /** default `sonarr_images/` */
  imageCacheDir: string;
  /** default 6 */
  refreshIntervalHours: number;
  /** image kind used as the cache key suffix, default `poster` */
  imageQuality: string;
  /** default `500` */
  imageSize: string;
  /** default true */
  enableImageCache: boolean;
  /** default `Sonarr Calendar Pro` */
  htmlTitle: string;
  /** default `dark` */
  htmlTheme: HtmlTheme;
  /** default 4 */
  gridColumns: number;
  /** cached images older than this are pruned, default 30 */
  imageRetentionDays: number;
}

export interface ServerConfig {
  port: number;
  host: string;
}

// =============================================================================
// Sonarr API (v3) payloads
// =============================================================================

export interface SonarrImage {
  coverType: string;
  url?: string;
  remoteUrl?: string;
}

export interface SonarrSeasonStatistics {
  episodeCount?: number;
  episodeFileCount?: number;
  totalEpisodeCount?: number;
  sizeOnDisk?: number;
  percentOfEpisodes?: number;
}

export interface SonarrSeason {
  seasonNumber: number;
  monitored: boolean;
  statistics?: SonarrSeasonStatistics;
}

export interface SonarrEpisode {
  id: number;
  seriesId: number;
  seasonNumber: number;
  episodeNumber: number;
  title: string;
  overview: string;
  /** naive `YYYY-MM-DD` in the server's zone */
  airDate: string;
  /** ISO-8601 UTC timestamp */
  airDateUtc: string;
  hasFile: boolean;
  monitored: boolean;
}

/** Calendar entries are episodes; one entry is one CalendarItem */
export type SonarrCalendarEpisode = SonarrEpisode;

/**
 * Series summary from `GET /api/v3/series`, with every optional field
 * defaulted ('' for strings, 0 for numbers, [] for lists).
 */
export interface SeriesSummary {
  id: number;
  title: string;
  year: number;
  overview: string;
  status: string;
  network: string;
  runtime: number;
  genres: string[];
  rating: number;
  images: SonarrImage[];
  remotePoster: string;
  seasons: SonarrSeason[];
  seasonCount: number;
  episodeFileCount: number;
  episodeCount: number;
  totalEpisodeCount: number;
  sizeOnDisk: number;
}

/** Series detail from `GET /api/v3/series/{id}`; authoritative for season statistics */
export interface SeriesDetail {
  id: number;
  title: string;
  seasons: SonarrSeason[];
}

// =============================================================================
// Per-cycle context
// =============================================================================

export interface DateWindow {
  /** YYYY-MM-DD */
  start: string;
  /** YYYY-MM-DD */
  end: string;
  /** e.g. `Oct 12, 2026` */
  startDisplay: string;
  endDisplay: string;
  totalDays: number;
  daysPast: number;
  daysFuture: number;
}

export interface CycleContext {
  now: Date;
  window: DateWindow;
}

// =============================================================================
// Aggregation
// =============================================================================

export type ProgressStatus =
  | 'complete'
  | 'almost-complete'
  | 'halfway'
  | 'started'
  | 'just-started'
  | 'not-started'
  | 'unknown';

export type ProgressBucket = 'complete' | 'high' | 'medium' | 'low' | 'none';

export interface SeasonProgress {
  season: number;
  monitored: boolean;
  total: number;
  downloaded: number;
  percentage: number;
  complete: boolean;
}

export interface SeriesProgress {
  /** false when the detail call returned nothing; status is then `unknown` and the counts are meaningless */
  statisticsAvailable: boolean;
  totalEpisodes: number;
  downloadedEpisodes: number;
  percentage: number;
  status: ProgressStatus;
  unmonitoredSeasons: number;
  monitoredSeasons: number;
  totalSeasons: number;
  seasonProgress: SeasonProgress[];
  currentSeason: number;
  currentSeasonProgress: number;
  currentSeasonComplete: boolean;
  currentSeasonEpisodes: number;
  currentSeasonDownloaded: number;
}

export interface WindowProgress {
  episodesInRange: number;
  downloadedInRange: number;
  percentage: number;
  color: string;
}

interface EpisodeSlotBase {
  airDate: string;
  /** e.g. `Mon, Oct 19` */
  formattedDate: string;
  /** whole days from today to the slot's air date, negative in the past */
  daysUntil: number;
  /** `S01E05` or `S01 E01-E03` */
  label: string;
  hasFile: boolean;
  monitored: boolean;
  overview: string;
  tooltip: string;
  episodeCount: number;
}

export interface SingleEpisodeSlot extends EpisodeSlotBase {
  kind: 'single';
  season: number;
  episode: number;
  title: string;
  truncatedTitle: string;
}

export interface MultiEpisodeSlot extends EpisodeSlotBase {
  kind: 'multi';
  seasons: number[];
  episodes: number[];
  titles: string[];
  truncatedTitles: string[];
  titlesDisplay: string;
}

export type EpisodeSlot = SingleEpisodeSlot | MultiEpisodeSlot;

export interface AggregatedShow {
  seriesId: number;
  title: string;
  truncatedTitle: string;
  slug: string;
  year: number;
  status: string;
  network: string;
  runtime: number;
  genres: string[];
  rating: number;
  /** cached path, remote URL, or '' when no artwork exists */
  posterUrl: string;
  progress: SeriesProgress;
  progressColor: string;
  windowProgress: WindowProgress;
  slots: EpisodeSlot[];
}

// =============================================================================
// Summary
// =============================================================================

export type BucketCounts = Record<ProgressBucket, number>;

export interface WindowSummary {
  window: DateWindow;
  totalSeries: number;
  avgProgress: number;
  avgWindowProgress: number;
  overallProgress: number;
  overallWindowProgress: number;
  totalEpisodes: number;
  totalDownloaded: number;
  totalSeasons: number;
  monitoredSeasons: number;
  unmonitoredSeasons: number;
  episodesInRange: number;
  downloadedInRange: number;
  showsWithEpisodes: number;
  /** shows left out of the library-wide figures because their detail call failed */
  statisticsUnavailable: number;
  completedCurrentSeasons: number;
  overallBuckets: BucketCounts;
  windowBuckets: BucketCounts;
}

export interface CompletedSeason {
  seriesId: number;
  title: string;
  season: number;
  /** YYYY-MM-DD of the season's latest item in the window */
  completionDate: string;
  completionDisplay: string;
  totalEpisodes: number;
  posterUrl: string;
}

// =============================================================================
// Output
// =============================================================================

export interface CalendarSnapshot {
  lastUpdated: string;
  window: DateWindow;
  summary: WindowSummary;
  completedSeasons: CompletedSeason[];
  totalShows: number;
  shows: AggregatedShow[];
}

export interface CycleResult {
  success: boolean;
  startedAt: string;
  duration: number;
  calendarItems: number;
  seriesLoaded: number;
  showsProcessed: number;
  htmlWritten: boolean;
  jsonWritten: boolean;
  error?: string;
}

export type SchedulerState = 'running' | 'stopped';
