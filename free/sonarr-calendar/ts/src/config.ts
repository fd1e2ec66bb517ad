/**
 * Sonarr Calendar Configuration
 *
 * Settings live in a JSON file with snake_case keys. When the file is missing
 * and SONARR_URL/SONARR_API_KEY are present in the environment, a file is
 * written from the environment first (container bootstrap).
 */

import 'dotenv/config';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { createLogger, validatePort } from '@episode-calendar/plugin-utils';
import type { CalendarConfig, ServerConfig } from './types.js';

const logger = createLogger('sonarr-calendar:config');

export const DEFAULT_CONFIG_FILE = '.sonarr_calendar_config.json';
export const DEFAULT_IMAGE_CACHE_DIR = 'sonarr_images/';
export const SETUP_HINT = 'Run `sonarr-calendar setup` to create or repair the configuration.';

export class ConfigError extends Error {
  readonly configPath: string;
  readonly problems: string[];

  constructor(message: string, configPath: string, problems: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.configPath = configPath;
    this.problems = problems;
  }
}

const requiredString = (key: string) =>
  z.string({ required_error: `${key} is required`, invalid_type_error: `${key} must be a string` })
    .trim()
    .min(1, `${key} is required`);

const dayCount = (key: string, min: number) =>
  z.number({ required_error: `${key} is required`, invalid_type_error: `${key} must be a number` })
    .int(`${key} must be a whole number`)
    .min(min, `${key} must be between ${min} and 365`)
    .max(365, `${key} must be between ${min} and 365`);

export const ConfigFileSchema = z.object({
  sonarr_url: requiredString('sonarr_url')
    .regex(/^https?:\/\//i, 'sonarr_url must start with http:// or https://')
    .transform((url) => url.replace(/\/+$/, '')),
  sonarr_api_key: requiredString('sonarr_api_key'),
  days_past: dayCount('days_past', 0),
  days_future: dayCount('days_future', 1),
  output_html_file: requiredString('output_html_file'),
  output_json_file: z.string().trim().nullish().transform((value) => value || null),
  image_cache_dir: z.string().trim().nullish().transform((value) => value || DEFAULT_IMAGE_CACHE_DIR),
  refresh_interval_hours: z.number().int().min(1).max(168).default(6),
  image_quality: z.string().trim().min(1).default('poster'),
  image_size: z.union([z.string(), z.number()]).transform(String).default('500'),
  enable_image_cache: z.boolean().default(true),
  html_title: z.string().trim().min(1).default('Sonarr Calendar Pro'),
  html_theme: z.enum(['dark', 'light']).default('dark'),
  grid_columns: z.number().int().min(1).max(8).default(4),
  image_retention_days: z.number().int().min(1).default(30),
});

export type ConfigFile = z.input<typeof ConfigFileSchema>;

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(env.SONARR_CALENDAR_CONFIG || DEFAULT_CONFIG_FILE);
}

/**
 * Validate a raw settings object (as read from disk) into a CalendarConfig.
 */
export function parseConfig(raw: unknown, configPath: string = resolveConfigPath()): CalendarConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    );
    throw new ConfigError(`Invalid configuration in ${configPath}`, configPath, problems);
  }

  const file = result.data;
  return {
    sonarrUrl: file.sonarr_url,
    sonarrApiKey: file.sonarr_api_key,
    daysPast: file.days_past,
    daysFuture: file.days_future,
    outputHtmlFile: file.output_html_file,
    outputJsonFile: file.output_json_file,
    imageCacheDir: file.image_cache_dir,
    refreshIntervalHours: file.refresh_interval_hours,
    imageQuality: file.image_quality,
    imageSize: file.image_size,
    enableImageCache: file.enable_image_cache,
    htmlTitle: file.html_title,
    htmlTheme: file.html_theme,
    gridColumns: file.grid_columns,
    imageRetentionDays: file.image_retention_days,
  };
}

export function toConfigFile(config: CalendarConfig): ConfigFile {
  return {
    sonarr_url: config.sonarrUrl,
    sonarr_api_key: config.sonarrApiKey,
    days_past: config.daysPast,
    days_future: config.daysFuture,
    output_html_file: config.outputHtmlFile,
    output_json_file: config.outputJsonFile,
    image_cache_dir: config.imageCacheDir,
    refresh_interval_hours: config.refreshIntervalHours,
    image_quality: config.imageQuality,
    image_size: config.imageSize,
    enable_image_cache: config.enableImageCache,
    html_title: config.htmlTitle,
    html_theme: config.htmlTheme,
    grid_columns: config.gridColumns,
    image_retention_days: config.imageRetentionDays,
  };
}

function envNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  return Number(value);
}

/**
 * Build a raw settings object from SONARR_* environment variables, or null
 * when the connection variables are absent.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigFile | null {
  if (!env.SONARR_URL || !env.SONARR_API_KEY) {
    return null;
  }

  return {
    sonarr_url: env.SONARR_URL,
    sonarr_api_key: env.SONARR_API_KEY,
    days_past: envNumber(env.DAYS_PAST, 7),
    days_future: envNumber(env.DAYS_FUTURE, 30),
    output_html_file: env.OUTPUT_HTML_FILE || 'sonarr_calendar.html',
    output_json_file: env.OUTPUT_JSON_FILE || null,
    image_cache_dir: env.IMAGE_CACHE_DIR || DEFAULT_IMAGE_CACHE_DIR,
    refresh_interval_hours: envNumber(env.REFRESH_INTERVAL_HOURS, 6),
  };
}

/** Values the setup command starts from when no configuration exists yet */
export function defaultConfigFile(): ConfigFile {
  return {
    sonarr_url: 'http://localhost:8989',
    sonarr_api_key: '',
    days_past: 7,
    days_future: 30,
    output_html_file: 'sonarr_calendar.html',
    output_json_file: null,
    image_cache_dir: DEFAULT_IMAGE_CACHE_DIR,
    refresh_interval_hours: 6,
  };
}

/** Command-line values for `setup`; numbers arrive as strings */
export interface SetupOverrides {
  url?: string;
  apiKey?: string;
  daysPast?: string;
  daysFuture?: string;
  htmlFile?: string;
  jsonFile?: string;
  cacheDir?: string;
  interval?: string;
  title?: string;
  theme?: string;
  columns?: string;
  imageCache?: boolean;
}

function optionNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? NaN : Number(value);
}

/**
 * Overlay setup options on a raw settings object. An empty `jsonFile` turns
 * the snapshot off. The result is unvalidated; pass it to parseConfig.
 */
export function applySetupOverrides(base: ConfigFile, overrides: SetupOverrides): Record<string, unknown> {
  const next: Record<string, unknown> = { ...base };
  const set = (key: keyof ConfigFile, value: unknown) => {
    if (value !== undefined) next[key] = value;
  };

  set('sonarr_url', overrides.url);
  set('sonarr_api_key', overrides.apiKey);
  set('days_past', optionNumber(overrides.daysPast));
  set('days_future', optionNumber(overrides.daysFuture));
  set('output_html_file', overrides.htmlFile);
  set('output_json_file', overrides.jsonFile === undefined ? undefined : overrides.jsonFile || null);
  set('image_cache_dir', overrides.cacheDir);
  set('refresh_interval_hours', optionNumber(overrides.interval));
  set('html_title', overrides.title);
  set('html_theme', overrides.theme);
  set('grid_columns', optionNumber(overrides.columns));
  set('enable_image_cache', overrides.imageCache);

  return next;
}

export function saveConfig(config: CalendarConfig, configPath: string = resolveConfigPath()): void {
  const dir = dirname(configPath);
  if (dir) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(configPath, JSON.stringify(toConfigFile(config), null, 4) + '\n', 'utf-8');
  logger.info('Configuration saved', { path: configPath });
}

/**
 * Load and validate the configuration. Throws ConfigError when it is missing
 * or invalid; callers treat that as fatal.
 */
export function loadConfig(
  configPath: string = resolveConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): CalendarConfig {
  if (!existsSync(configPath)) {
    const fromEnv = configFromEnv(env);
    if (!fromEnv) {
      throw new ConfigError(`Configuration file not found: ${configPath}`, configPath);
    }

    const config = parseConfig(fromEnv, configPath);
    saveConfig(config, configPath);
    logger.info('Configuration created from environment variables', { path: configPath });
    return config;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  const config = parseConfig(raw, configPath);
  logger.debug('Configuration loaded', { path: configPath, sonarr: config.sonarrUrl });
  return config;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: validatePort(env.SONARR_CALENDAR_PORT, 8000),
    host: env.SONARR_CALENDAR_HOST || '0.0.0.0',
  };
}

export function maskApiKey(apiKey: string): string {
  return `${'•'.repeat(32)}${apiKey.slice(-4)}`;
}

export function describeConfig(config: CalendarConfig, configPath?: string): string[] {
  const hours = config.refreshIntervalHours;
  const lines = [
    `URL:          ${config.sonarrUrl}`,
    `API Key:      ${maskApiKey(config.sonarrApiKey)}`,
    `Look Back:    ${config.daysPast} days`,
    `Look Forward: ${config.daysFuture} days`,
    `HTML Output:  ${config.outputHtmlFile}`,
    `JSON Output:  ${config.outputJsonFile ?? 'Not enabled'}`,
    `Cache Dir:    ${config.imageCacheDir}${config.enableImageCache ? '' : ' (disabled)'}`,
    `Interval:     ${hours} hour${hours === 1 ? '' : 's'}`,
  ];
  if (configPath) {
    lines.push(`Config File:  ${configPath}`);
  }
  return lines;
}
