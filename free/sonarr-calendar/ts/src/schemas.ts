/**
 * Sonarr Response Schemas
 * Zod schemas that normalise API payloads at the ingestion boundary.
 * Optional fields fall back to ''/0/false/[] instead of failing the record.
 */

import { z } from 'zod';
import type { SeriesDetail, SeriesSummary, SonarrCalendarEpisode } from './types.js';

const text = (fallback = '') => z.string().catch(fallback);
const count = z.number().catch(0);
const flag = z.boolean().catch(false);
const optionalCount = z.number().optional().catch(undefined);

export const SonarrImageSchema = z.object({
  coverType: text(),
  url: z.string().optional().catch(undefined),
  remoteUrl: z.string().optional().catch(undefined),
});

export const SeasonStatisticsSchema = z.object({
  episodeCount: optionalCount,
  episodeFileCount: optionalCount,
  totalEpisodeCount: optionalCount,
  sizeOnDisk: optionalCount,
  percentOfEpisodes: optionalCount,
});

export const SonarrSeasonSchema = z.object({
  seasonNumber: count,
  monitored: flag,
  statistics: SeasonStatisticsSchema.optional().catch(undefined),
});

export const SystemStatusSchema = z.object({
  appName: z.string().optional().catch(undefined),
  version: z.string().optional().catch(undefined),
});

export const CalendarEpisodeSchema = z.object({
  id: count,
  seriesId: z.number().int(),
  seasonNumber: count,
  episodeNumber: count,
  title: text('TBA'),
  overview: text(),
  airDate: text(),
  airDateUtc: text(),
  hasFile: flag,
  monitored: flag,
}) satisfies z.ZodType<SonarrCalendarEpisode, z.ZodTypeDef, unknown>;

export const SeriesSummarySchema = z
  .object({
    id: z.number().int(),
    title: text('Unknown Show'),
    year: count,
    overview: text(),
    status: text(),
    network: text(),
    runtime: count,
    genres: z.array(z.string()).catch([]),
    ratings: z.object({ value: count }).catch({ value: 0 }),
    images: z.array(SonarrImageSchema).catch([]),
    remotePoster: text(),
    seasons: z.array(SonarrSeasonSchema).catch([]),
    seasonCount: optionalCount,
    episodeFileCount: optionalCount,
    episodeCount: optionalCount,
    totalEpisodeCount: optionalCount,
    sizeOnDisk: optionalCount,
    statistics: SeasonStatisticsSchema.extend({ seasonCount: optionalCount }).catch({}),
  })
  .transform((series): SeriesSummary => ({
    id: series.id,
    title: series.title,
    year: series.year,
    overview: series.overview,
    status: series.status,
    network: series.network,
    runtime: series.runtime,
    genres: series.genres,
    rating: series.ratings.value,
    images: series.images,
    remotePoster: series.remotePoster,
    seasons: series.seasons,
    seasonCount: series.seasonCount ?? series.statistics.seasonCount ?? series.seasons.length,
    episodeFileCount: series.episodeFileCount ?? series.statistics.episodeFileCount ?? 0,
    episodeCount: series.episodeCount ?? series.statistics.episodeCount ?? 0,
    totalEpisodeCount: series.totalEpisodeCount ?? series.statistics.totalEpisodeCount ?? 0,
    sizeOnDisk: series.sizeOnDisk ?? series.statistics.sizeOnDisk ?? 0,
  }));

export const SeriesDetailSchema = z.object({
  id: count,
  title: text(),
  seasons: z.array(SonarrSeasonSchema).catch([]),
}) satisfies z.ZodType<SeriesDetail, z.ZodTypeDef, unknown>;

/**
 * Parse every element of a list payload, dropping the ones that fail.
 * Non-array payloads yield an empty list.
 */
export function parseList<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown
): { items: T[]; dropped: number } {
  if (!Array.isArray(payload)) {
    return { items: [], dropped: 0 };
  }

  const items: T[] = [];
  let dropped = 0;
  for (const entry of payload) {
    const result = schema.safeParse(entry);
    if (result.success) {
      items.push(result.data);
    } else {
      dropped++;
    }
  }
  return { items, dropped };
}
