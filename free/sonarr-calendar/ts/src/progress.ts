/**
 * Series progress calculations.
 *
 * Unmonitored seasons count their full episode total as downloaded. This
 * keeps a show whose old seasons are intentionally skipped from looking
 * incomplete.
 */

import { isInWindow } from './dates.js';
import { clampPercentage, progressColor, progressStatus } from './formatting.js';
import type {
  DateWindow,
  SeasonProgress,
  SeriesDetail,
  SeriesProgress,
  SonarrCalendarEpisode,
  WindowProgress,
} from './types.js';

export function emptySeriesProgress(): SeriesProgress {
  return {
    statisticsAvailable: false,
    totalEpisodes: 0,
    downloadedEpisodes: 0,
    percentage: 0,
    status: 'not-started',
    unmonitoredSeasons: 0,
    monitoredSeasons: 0,
    totalSeasons: 0,
    seasonProgress: [],
    currentSeason: 0,
    currentSeasonProgress: 0,
    currentSeasonComplete: false,
    currentSeasonEpisodes: 0,
    currentSeasonDownloaded: 0,
  };
}

/** Highest season number with a non-zero episode total, 0 if none */
export function findCurrentSeason(detail: SeriesDetail): number {
  let current = 0;
  for (const season of detail.seasons) {
    if (season.seasonNumber > current && (season.statistics?.totalEpisodeCount ?? 0) > 0) {
      current = season.seasonNumber;
    }
  }
  return current;
}

export function calculateSeriesProgress(detail: SeriesDetail | null): SeriesProgress {
  if (!detail) {
    return { ...emptySeriesProgress(), status: 'unknown' };
  }

  const progress = emptySeriesProgress();
  progress.statisticsAvailable = true;
  progress.currentSeason = findCurrentSeason(detail);

  const seasons: SeasonProgress[] = [];

  for (const season of detail.seasons) {
    if (season.seasonNumber < 0) continue;

    const total = Math.max(0, season.statistics?.totalEpisodeCount ?? 0);
    const files = season.statistics?.episodeFileCount ?? 0;
    const downloaded = season.monitored ? Math.min(total, Math.max(0, files)) : total;
    const percentage = clampPercentage(downloaded, total);

    progress.totalSeasons++;
    if (season.monitored) {
      progress.monitoredSeasons++;
    } else {
      progress.unmonitoredSeasons++;
    }
    progress.totalEpisodes += total;
    progress.downloadedEpisodes += downloaded;

    if (season.seasonNumber === progress.currentSeason) {
      progress.currentSeasonProgress = percentage;
      progress.currentSeasonEpisodes = total;
      progress.currentSeasonDownloaded = downloaded;
      progress.currentSeasonComplete = percentage >= 100;
    }

    seasons.push({
      season: season.seasonNumber,
      monitored: season.monitored,
      total,
      downloaded,
      percentage,
      complete: percentage >= 100,
    });
  }

  progress.seasonProgress = seasons;
  progress.percentage = clampPercentage(progress.downloadedEpisodes, progress.totalEpisodes);
  progress.status = progressStatus(progress.percentage);
  return progress;
}

/**
 * Share of a series' calendar items inside the window that already have a
 * file. Independent of the season statistics.
 */
export function calculateWindowProgress(
  seriesId: number,
  items: SonarrCalendarEpisode[],
  window: DateWindow
): WindowProgress {
  let episodesInRange = 0;
  let downloadedInRange = 0;

  for (const item of items) {
    if (item.seriesId !== seriesId || !isInWindow(item.airDate, window)) continue;
    episodesInRange++;
    if (item.hasFile) downloadedInRange++;
  }

  const percentage = clampPercentage(downloadedInRange, episodesInRange);
  return {
    episodesInRange,
    downloadedInRange,
    percentage,
    color: progressColor(percentage),
  };
}
