/**
 * HTML dashboard renderer
 *
 * Builds a flat view model from the aggregated shows and feeds it to the
 * Handlebars templates under `templates/`. Every value interpolated with
 * `{{ }}` is HTML-escaped by Handlebars.
 */

import Handlebars from 'handlebars';
import { readFileSync } from 'node:fs';
import { formatUtcTimestamp } from './dates.js';
import {
  MAX_SHOW_TITLE_LENGTH,
  plural,
  progressBucket,
  progressColor,
  relativeDayLabel,
  slugify,
  truncateText,
} from './formatting.js';
import type {
  AggregatedShow,
  CalendarConfig,
  CompletedSeason,
  EpisodeSlot,
  WindowSummary,
} from './types.js';

export const MAX_COMPLETED_ON_DASHBOARD = 6;
const MAX_GENRES = 3;

export type RendererOptions = Pick<
  CalendarConfig,
  'sonarrUrl' | 'htmlTitle' | 'htmlTheme' | 'gridColumns' | 'refreshIntervalHours'
>;

export interface DashboardInput {
  shows: AggregatedShow[];
  summary: WindowSummary;
  completedSeasons: CompletedSeason[];
  generatedAt: Date;
}

interface SlotView {
  label: string;
  formattedDate: string;
  daysText: string;
  daysClass: string;
  statusClass: string;
  multi: boolean;
  text: string;
  tooltip: string;
}

interface ShowView {
  seriesId: number;
  title: string;
  truncatedTitle: string;
  detailUrl: string;
  posterUrl: string;
  meta: string;
  /** `unknown` when the season statistics could not be loaded */
  bucket: string;
  statisticsAvailable: boolean;
  rangeBucket: string;
  hasEpisodes: boolean;
  currentSeason: string;
  currentSeasonNumber: number;
  currentSeasonComplete: boolean;
  currentSeasonProgress: string;
  progress: string;
  progressColor: string;
  downloadedEpisodes: number;
  totalEpisodes: number;
  windowProgress: string;
  windowColor: string;
  downloadedInRange: number;
  episodesInRange: number;
  genres: string[];
  totalSeasons: number;
  monitoredSeasons: number;
  unmonitoredSeasons: number;
  slots: SlotView[];
}

interface CompletedView {
  title: string;
  truncatedTitle: string;
  detailUrl: string;
  posterUrl: string;
  season: number;
  totalEpisodes: number;
  completionDisplay: string;
}

interface DashboardView {
  title: string;
  theme: string;
  gridColumns: number;
  window: WindowSummary['window'];
  summary: WindowSummary;
  overallProgress: string;
  overallColor: string;
  windowProgress: string;
  windowColor: string;
  completedCount: number;
  completed: CompletedView[];
  jumpMenu: Array<{ seriesId: number; label: string }>;
  shows: ShowView[];
  refreshInterval: string;
  lastUpdated: string;
}

function percent(value: number): string {
  return value.toFixed(1);
}

function slotStatusClass(slot: EpisodeSlot): string {
  if (slot.hasFile) return 'status-downloaded';
  if (slot.monitored) return 'status-monitored';
  return 'status-missing';
}

function toSlotView(slot: EpisodeSlot): SlotView {
  const days = relativeDayLabel(slot.daysUntil);
  return {
    label: slot.label,
    formattedDate: slot.formattedDate,
    daysText: days.text,
    daysClass: days.className,
    statusClass: slotStatusClass(slot),
    multi: slot.kind === 'multi',
    text: slot.kind === 'multi' ? slot.titlesDisplay : slot.truncatedTitle,
    tooltip: slot.tooltip,
  };
}

function showMeta(show: AggregatedShow): string {
  const parts: string[] = [];
  if (show.year) parts.push(String(show.year));
  if (show.network) parts.push(show.network);
  if (show.runtime) parts.push(`${show.runtime} min`);
  if (show.rating > 0) parts.push(`⭐ ${Math.round(show.rating * 10) / 10}`);
  return parts.join(' • ');
}

export class DashboardRenderer {
  private options: RendererOptions;
  private template: Handlebars.TemplateDelegate<DashboardView>;

  constructor(options: RendererOptions) {
    this.options = options;

    const hbs = Handlebars.create();
    hbs.registerHelper('number', (value: number) => value.toLocaleString('en-US'));
    hbs.registerPartial('styles', readTemplate('dashboard.css.hbs'));
    hbs.registerPartial('showCard', readTemplate('show-card.hbs'));
    this.template = hbs.compile<DashboardView>(readTemplate('dashboard.hbs'));
  }

  private detailUrl(title: string): string {
    return `${this.options.sonarrUrl}/series/${slugify(title)}`;
  }

  private toShowView(show: AggregatedShow): ShowView {
    const { progress, windowProgress } = show;
    return {
      seriesId: show.seriesId,
      title: show.title,
      truncatedTitle: show.truncatedTitle,
      detailUrl: this.detailUrl(show.title),
      posterUrl: show.posterUrl,
      meta: showMeta(show),
      bucket: progress.statisticsAvailable ? progressBucket(progress.percentage) : 'unknown',
      statisticsAvailable: progress.statisticsAvailable,
      rangeBucket: progressBucket(windowProgress.percentage),
      hasEpisodes: windowProgress.episodesInRange > 0,
      currentSeason: String(progress.currentSeason).padStart(2, '0'),
      currentSeasonNumber: progress.currentSeason,
      currentSeasonComplete: progress.currentSeasonComplete,
      currentSeasonProgress: progress.currentSeasonProgress.toFixed(0),
      progress: percent(progress.percentage),
      progressColor: show.progressColor,
      downloadedEpisodes: progress.downloadedEpisodes,
      totalEpisodes: progress.totalEpisodes,
      windowProgress: percent(windowProgress.percentage),
      windowColor: windowProgress.color,
      downloadedInRange: windowProgress.downloadedInRange,
      episodesInRange: windowProgress.episodesInRange,
      genres: show.genres.slice(0, MAX_GENRES),
      totalSeasons: progress.totalSeasons,
      monitoredSeasons: progress.monitoredSeasons,
      unmonitoredSeasons: progress.unmonitoredSeasons,
      slots: show.slots.map(toSlotView),
    };
  }

  buildView(input: DashboardInput): DashboardView {
    const { summary } = input;
    const jumpMenu = [...input.shows]
      .sort((a, b) => (a.title < b.title ? -1 : a.title > b.title ? 1 : 0))
      .map((show) => ({ seriesId: show.seriesId, label: show.truncatedTitle }));

    return {
      title: this.options.htmlTitle,
      theme: this.options.htmlTheme,
      gridColumns: this.options.gridColumns,
      window: summary.window,
      summary,
      overallProgress: percent(summary.overallProgress),
      overallColor: progressColor(summary.overallProgress),
      windowProgress: percent(summary.overallWindowProgress),
      windowColor: progressColor(summary.overallWindowProgress),
      completedCount: input.completedSeasons.length,
      completed: input.completedSeasons.slice(0, MAX_COMPLETED_ON_DASHBOARD).map((season) => ({
        title: season.title,
        truncatedTitle: truncateText(season.title, MAX_SHOW_TITLE_LENGTH),
        detailUrl: this.detailUrl(season.title),
        posterUrl: season.posterUrl,
        season: season.season,
        totalEpisodes: season.totalEpisodes,
        completionDisplay: season.completionDisplay,
      })),
      jumpMenu,
      shows: input.shows.map((show) => this.toShowView(show)),
      refreshInterval: plural(this.options.refreshIntervalHours, 'hour'),
      lastUpdated: formatUtcTimestamp(input.generatedAt),
    };
  }

  render(input: DashboardInput): string {
    return this.template(this.buildView(input));
  }
}

function readTemplate(name: string): string {
  return readFileSync(new URL(`./templates/${name}`, import.meta.url), 'utf8');
}

export function renderDashboard(input: DashboardInput, options: RendererOptions): string {
  return new DashboardRenderer(options).render(input);
}
