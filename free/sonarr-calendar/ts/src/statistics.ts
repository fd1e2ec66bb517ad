/**
 * Window-wide statistics over the aggregated shows
 */

import { formatDisplayDate, isInWindow, parseDay } from './dates.js';
import { progressBucket } from './formatting.js';
import type {
  AggregatedShow,
  BucketCounts,
  CompletedSeason,
  DateWindow,
  SonarrCalendarEpisode,
  WindowSummary,
} from './types.js';

export const MAX_COMPLETED_SEASONS = 10;

function emptyBuckets(): BucketCounts {
  return { complete: 0, high: 0, medium: 0, low: 0, none: 0 };
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export function summarize(shows: AggregatedShow[], window: DateWindow): WindowSummary {
  const overallBuckets = emptyBuckets();
  const windowBuckets = emptyBuckets();

  let progressSum = 0;
  let windowProgressSum = 0;
  let totalEpisodes = 0;
  let totalDownloaded = 0;
  let totalSeasons = 0;
  let monitoredSeasons = 0;
  let unmonitoredSeasons = 0;
  let episodesInRange = 0;
  let downloadedInRange = 0;
  let showsWithEpisodes = 0;
  let statisticsUnavailable = 0;
  let completedCurrentSeasons = 0;

  for (const show of shows) {
    const { progress, windowProgress } = show;

    windowProgressSum += windowProgress.percentage;
    episodesInRange += windowProgress.episodesInRange;
    downloadedInRange += windowProgress.downloadedInRange;
    if (windowProgress.episodesInRange > 0) showsWithEpisodes++;
    windowBuckets[progressBucket(windowProgress.percentage)]++;

    // Library-wide figures only count shows whose season statistics loaded
    if (!progress.statisticsAvailable) {
      statisticsUnavailable++;
      continue;
    }

    progressSum += progress.percentage;
    totalEpisodes += progress.totalEpisodes;
    totalDownloaded += progress.downloadedEpisodes;
    totalSeasons += progress.totalSeasons;
    monitoredSeasons += progress.monitoredSeasons;
    unmonitoredSeasons += progress.unmonitoredSeasons;
    if (progress.currentSeasonComplete) completedCurrentSeasons++;
    overallBuckets[progressBucket(progress.percentage)]++;
  }

  const totalSeries = shows.length;
  const withStatistics = totalSeries - statisticsUnavailable;

  return {
    window,
    totalSeries,
    avgProgress: withStatistics > 0 ? progressSum / withStatistics : 0,
    avgWindowProgress: totalSeries > 0 ? windowProgressSum / totalSeries : 0,
    overallProgress: ratio(totalDownloaded, totalEpisodes),
    overallWindowProgress: ratio(downloadedInRange, episodesInRange),
    totalEpisodes,
    totalDownloaded,
    totalSeasons,
    monitoredSeasons,
    unmonitoredSeasons,
    episodesInRange,
    downloadedInRange,
    showsWithEpisodes,
    statisticsUnavailable,
    completedCurrentSeasons,
    overallBuckets,
    windowBuckets,
  };
}

/**
 * Shows whose current season is complete and whose latest current-season
 * item (by date, then episode number) airs inside the window. Newest first.
 * Items without a parseable air date are ignored.
 */
export function findCompletedSeasons(
  shows: AggregatedShow[],
  calendar: SonarrCalendarEpisode[],
  window: DateWindow
): CompletedSeason[] {
  const completed: CompletedSeason[] = [];

  for (const show of shows) {
    const { currentSeason, currentSeasonComplete, currentSeasonEpisodes } = show.progress;
    if (!currentSeasonComplete) continue;

    let latest: SonarrCalendarEpisode | null = null;
    for (const item of calendar) {
      if (item.seriesId !== show.seriesId || item.seasonNumber !== currentSeason || !parseDay(item.airDate)) continue;
      if (
        !latest ||
        item.airDate > latest.airDate ||
        (item.airDate === latest.airDate && item.episodeNumber > latest.episodeNumber)
      ) {
        latest = item;
      }
    }

    if (latest && isInWindow(latest.airDate, window)) {
      completed.push({
        seriesId: show.seriesId,
        title: show.title,
        season: currentSeason,
        completionDate: latest.airDate,
        completionDisplay: formatDisplayDate(latest.airDate),
        totalEpisodes: currentSeasonEpisodes,
        posterUrl: show.posterUrl,
      });
    }
  }

  return completed
    .sort((a, b) => (a.completionDate < b.completionDate ? 1 : a.completionDate > b.completionDate ? -1 : 0))
    .slice(0, MAX_COMPLETED_SEASONS);
}
