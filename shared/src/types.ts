/**
 * Shared types for episode-calendar plugins
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type LogMeta = Record<string, unknown>;

/**
 * Minimal logging surface accepted by plugin services, so tests can pass a
 * silent or recording logger.
 */
export interface PluginLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
