/**
 * Display formatting for episode slots and progress values
 */

import type { ProgressBucket, ProgressStatus } from './types.js';

export const MAX_EPISODE_TITLE_LENGTH = 25;
export const MAX_SHOW_TITLE_LENGTH = 30;
export const MAX_MULTI_EPISODE_DISPLAY = 2;
/** Hard cap on the multi-episode title summary */
export const MAX_EPISODE_LIST_LENGTH = 15;

export function truncateText(text: string, maxLength: number): string {
  if (!text || text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

export function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatSeasonEpisode(season: number, episode: number): string {
  return `S${pad2(season)}E${pad2(episode)}`;
}

/**
 * `E05` for one episode, `E01-E03` for a consecutive run, `E01, E03` for up to
 * three scattered episodes and `E01, E02 +3 more` beyond that.
 */
export function formatEpisodeRange(episodes: number[]): string {
  if (episodes.length === 1) {
    return `E${pad2(episodes[0])}`;
  }

  const sorted = [...episodes].sort((a, b) => a - b);
  const consecutive = sorted.every((ep, i) => i === 0 || sorted[i - 1] + 1 === ep);

  if (consecutive && sorted.length > 1) {
    return `E${pad2(sorted[0])}-E${pad2(sorted[sorted.length - 1])}`;
  }

  if (sorted.length > 3) {
    const firstFew = sorted.slice(0, 2).map((ep) => `E${pad2(ep)}`);
    return `${firstFew.join(', ')} +${sorted.length - 2} more`;
  }

  return sorted.map((ep) => `E${pad2(ep)}`).join(', ');
}

export interface MultiEpisodeInput {
  seasons: number[];
  episodes: number[];
  titles: string[];
  truncatedTitles: string[];
}

export interface MultiEpisodeDisplay {
  label: string;
  titlesDisplay: string;
  tooltip: string;
  episodeCount: number;
}

export function formatMultiEpisodeDisplay(input: MultiEpisodeInput): MultiEpisodeDisplay {
  const episodeCount = input.episodes.length;
  const season = input.seasons.length > 0 ? Math.min(...input.seasons) : 0;
  const label = `S${pad2(season)} ${formatEpisodeRange(input.episodes)}`;

  let titlesDisplay: string;
  if (episodeCount === 1) {
    titlesDisplay = input.truncatedTitles[0] ?? 'Episode';
  } else {
    const shown = input.truncatedTitles.slice(0, MAX_MULTI_EPISODE_DISPLAY).join(', ');
    titlesDisplay = episodeCount <= MAX_MULTI_EPISODE_DISPLAY
      ? `${episodeCount} Episodes: ${shown}`
      : `${episodeCount} Episodes: ${shown} +${episodeCount - MAX_MULTI_EPISODE_DISPLAY} more`;
  }
  titlesDisplay = truncateText(titlesDisplay, MAX_EPISODE_LIST_LENGTH);

  const lines = [`Season ${season}`];
  input.episodes.forEach((ep, i) => {
    lines.push(`E${pad2(ep)}: ${input.titles[i] ?? ''}`);
  });

  return { label, titlesDisplay, tooltip: lines.join('\n'), episodeCount };
}

/** Sonarr's series URL slug */
export function slugify(title: string): string {
  if (!title) return '';
  return title
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
}

export function clampPercentage(downloaded: number, total: number): number {
  if (total <= 0) return 0;
  return Math.max(0, Math.min(100, (downloaded / total) * 100));
}

export function progressStatus(percentage: number): ProgressStatus {
  if (percentage >= 100) return 'complete';
  if (percentage >= 75) return 'almost-complete';
  if (percentage >= 50) return 'halfway';
  if (percentage >= 25) return 'started';
  if (percentage > 0) return 'just-started';
  return 'not-started';
}

const STATUS_COLORS: Record<ProgressStatus, string> = {
  complete: '#4CAF50',
  'almost-complete': '#8BC34A',
  halfway: '#FFC107',
  started: '#FF9800',
  'just-started': '#FF5722',
  'not-started': '#F44336',
  unknown: '#9E9E9E',
};

export function statusColor(status: ProgressStatus): string {
  return STATUS_COLORS[status];
}

export function progressColor(percentage: number): string {
  return statusColor(progressStatus(percentage));
}

/** Five-way histogram bucket used by the summary and the CSS filters */
export function progressBucket(percentage: number): ProgressBucket {
  if (percentage >= 100) return 'complete';
  if (percentage >= 75) return 'high';
  if (percentage >= 25) return 'medium';
  if (percentage > 0) return 'low';
  return 'none';
}

export interface RelativeDay {
  text: string;
  className: string;
}

export function relativeDayLabel(days: number): RelativeDay {
  if (days === 0) return { text: 'Today', className: 'days-today' };
  if (days === 1) return { text: 'Tomorrow', className: 'days-tomorrow' };
  if (days > 0) return { text: `In ${days} days`, className: 'days-future' };
  if (days === -1) return { text: 'Yesterday', className: 'days-yesterday' };
  return { text: `${Math.abs(days)} days ago`, className: 'days-past' };
}

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}
