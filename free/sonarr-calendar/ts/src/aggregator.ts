/**
 * Calendar aggregation
 *
 * Groups calendar items by series and air date, turns each group into one
 * display slot, and attaches season statistics, window progress and artwork
 * to every series. A series that fails is logged and left out; the rest of
 * the batch continues.
 */

import { createLogger, type PluginLogger } from '@episode-calendar/plugin-utils';
import { daysUntil, formatAirDate } from './dates.js';
import {
  MAX_EPISODE_TITLE_LENGTH,
  MAX_SHOW_TITLE_LENGTH,
  formatMultiEpisodeDisplay,
  formatSeasonEpisode,
  slugify,
  statusColor,
  truncateText,
} from './formatting.js';
import { calculateSeriesProgress, calculateWindowProgress } from './progress.js';
import type {
  AggregatedShow,
  CalendarConfig,
  CycleContext,
  EpisodeSlot,
  SeriesDetail,
  SeriesSummary,
  SonarrCalendarEpisode,
} from './types.js';

export interface DetailSource {
  fetchParentDetail(seriesId: number): Promise<SeriesDetail | null>;
}

export interface ArtworkSource {
  ensureImage(url: string, seriesId: number, kind?: string): Promise<string | null>;
}

export type AggregatorOptions = Pick<CalendarConfig, 'sonarrUrl' | 'imageSize' | 'imageQuality'>;

/** seriesId -> airDate -> items, in first-seen order */
export type GroupedCalendar = Map<number, Map<string, SonarrCalendarEpisode[]>>;

export function groupBySeriesAndDate(items: SonarrCalendarEpisode[]): GroupedCalendar {
  const grouped: GroupedCalendar = new Map();

  for (const item of items) {
    if (!item.seriesId || !item.airDate) continue;

    let byDate = grouped.get(item.seriesId);
    if (!byDate) {
      byDate = new Map();
      grouped.set(item.seriesId, byDate);
    }
    const slot = byDate.get(item.airDate) ?? [];
    slot.push(item);
    byDate.set(item.airDate, slot);
  }

  return grouped;
}

export function buildSlot(airDate: string, items: SonarrCalendarEpisode[], now: Date): EpisodeSlot {
  const episodes = [...items].sort(
    (a, b) => a.seasonNumber - b.seasonNumber || a.episodeNumber - b.episodeNumber
  );
  const first = episodes[0];
  const timing = {
    airDate,
    formattedDate: formatAirDate(airDate),
    daysUntil: daysUntil(first.airDateUtc, airDate, now),
    overview: first.overview,
    episodeCount: episodes.length,
  };

  if (episodes.length === 1) {
    return {
      ...timing,
      kind: 'single',
      season: first.seasonNumber,
      episode: first.episodeNumber,
      title: first.title,
      truncatedTitle: truncateText(first.title, MAX_EPISODE_TITLE_LENGTH),
      label: formatSeasonEpisode(first.seasonNumber, first.episodeNumber),
      tooltip: first.title,
      hasFile: first.hasFile,
      monitored: first.monitored,
    };
  }

  const titles = episodes.map((ep) => ep.title);
  const truncatedTitles = titles.map((title) => truncateText(title, MAX_EPISODE_TITLE_LENGTH));
  const seasons = [...new Set(episodes.map((ep) => ep.seasonNumber))];
  const numbers = episodes.map((ep) => ep.episodeNumber);
  const display = formatMultiEpisodeDisplay({ seasons, episodes: numbers, titles, truncatedTitles });

  return {
    ...timing,
    kind: 'multi',
    seasons,
    episodes: numbers,
    titles,
    truncatedTitles,
    titlesDisplay: display.titlesDisplay,
    label: display.label,
    tooltip: display.tooltip,
    hasFile: episodes.every((ep) => ep.hasFile),
    monitored: episodes.some((ep) => ep.monitored),
  };
}

/**
 * Poster URL for a series: `remotePoster` first (TheTVDB banners go through
 * their resized cache), then the `poster` image, resolved against the server.
 */
export function resolvePosterUrl(series: SeriesSummary | undefined, sonarrUrl: string, imageSize: string): string | null {
  if (!series) return null;

  if (series.remotePoster) {
    if (series.remotePoster.includes('thetvdb.com') && imageSize) {
      return series.remotePoster.replace('/banners/', '/banners/_cache/');
    }
    return series.remotePoster;
  }

  for (const image of series.images) {
    if (image.coverType !== 'poster') continue;
    const url = image.url || image.remoteUrl;
    if (!url) continue;
    if (url.startsWith('/')) {
      try {
        return new URL(url, sonarrUrl).toString();
      } catch {
        return null;
      }
    }
    return url;
  }

  return null;
}

/** Highest window progress first, then title */
export function compareShows(a: AggregatedShow, b: AggregatedShow): number {
  const byProgress = b.windowProgress.percentage - a.windowProgress.percentage;
  if (byProgress !== 0) return byProgress;
  return a.title < b.title ? -1 : a.title > b.title ? 1 : 0;
}

export class CalendarAggregator {
  private details: DetailSource;
  private artwork: ArtworkSource | null;
  private options: AggregatorOptions;
  private logger: PluginLogger;

  constructor(
    details: DetailSource,
    artwork: ArtworkSource | null,
    options: AggregatorOptions,
    logger: PluginLogger = createLogger('sonarr-calendar:aggregator')
  ) {
    this.details = details;
    this.artwork = artwork;
    this.options = options;
    this.logger = logger;
  }

  /** Series are processed one at a time, in calendar order. */
  async aggregate(
    items: SonarrCalendarEpisode[],
    series: Map<number, SeriesSummary>,
    ctx: CycleContext
  ): Promise<AggregatedShow[]> {
    const grouped = groupBySeriesAndDate(items);
    const shows: AggregatedShow[] = [];

    for (const [seriesId, byDate] of grouped) {
      try {
        shows.push(await this.buildShow(seriesId, byDate, items, series.get(seriesId), ctx));
      } catch (error) {
        this.logger.error(`Error processing show ${seriesId}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return shows.sort(compareShows);
  }

  private async buildShow(
    seriesId: number,
    byDate: Map<string, SonarrCalendarEpisode[]>,
    items: SonarrCalendarEpisode[],
    summary: SeriesSummary | undefined,
    ctx: CycleContext
  ): Promise<AggregatedShow> {
    const title = summary?.title ?? 'Unknown Show';
    const posterUrl = resolvePosterUrl(summary, this.options.sonarrUrl, this.options.imageSize);

    let cachedPoster: string | null = null;
    if (posterUrl && this.artwork) {
      cachedPoster = await this.artwork.ensureImage(posterUrl, seriesId, this.options.imageQuality);
    }

    const progress = calculateSeriesProgress(await this.details.fetchParentDetail(seriesId));
    const windowProgress = calculateWindowProgress(seriesId, items, ctx.window);

    const slots = [...byDate.entries()]
      .map(([airDate, slotItems]) => buildSlot(airDate, slotItems, ctx.now))
      .sort((a, b) => (a.airDate < b.airDate ? -1 : a.airDate > b.airDate ? 1 : 0));

    return {
      seriesId,
      title,
      truncatedTitle: truncateText(title, MAX_SHOW_TITLE_LENGTH),
      slug: slugify(title),
      year: summary?.year ?? 0,
      status: summary?.status ?? '',
      network: summary?.network ?? '',
      runtime: summary?.runtime ?? 0,
      genres: summary?.genres ?? [],
      rating: summary?.rating ?? 0,
      posterUrl: cachedPoster ?? posterUrl ?? '',
      progress,
      progressColor: statusColor(progress.status),
      windowProgress,
      slots,
    };
  }
}
