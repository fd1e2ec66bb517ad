/**
 * Console logger shared by the episode-calendar packages.
 *
 * One line per entry: `<ISO time> <LEVEL> [<name>] <message> <json meta>`.
 * ANSI colours are used only when stdout is a terminal.
 */

import { LOG_LEVEL_NAMES, type LogLevel, type LogMeta, type PluginLogger } from './types.js';
import { validateEnum } from './validation.js';

type Tone = 'gray' | 'blue' | 'yellow' | 'red' | 'green' | 'cyan';

const ANSI: Record<Tone, string> = {
  gray: '\x1b[90m',
  blue: '\x1b[34m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
};
const RESET = '\x1b[0m';

interface LineStyle {
  /** threshold the entry is compared against */
  rank: number;
  label: string;
  tone: Tone;
  sink: 'log' | 'warn' | 'error';
}

const STYLES: Record<LogLevel | 'success', LineStyle> = {
  debug: { rank: 0, label: 'DEBUG', tone: 'gray', sink: 'log' },
  info: { rank: 1, label: 'INFO ', tone: 'blue', sink: 'log' },
  success: { rank: 1, label: 'OK   ', tone: 'green', sink: 'log' },
  warn: { rank: 2, label: 'WARN ', tone: 'yellow', sink: 'warn' },
  error: { rank: 3, label: 'ERROR', tone: 'red', sink: 'error' },
};

export class Logger implements PluginLogger {
  private readonly name: string;
  private readonly threshold: number;
  private readonly colored: boolean;

  constructor(name: string, level: LogLevel = 'info', useColors = true) {
    this.name = name;
    this.threshold = STYLES[level].rank;
    this.colored = useColors && process.stdout.isTTY === true;
  }

  private paint(text: string, tone: Tone): string {
    return this.colored ? `${ANSI[tone]}${text}${RESET}` : text;
  }

  private emit(kind: keyof typeof STYLES, message: string, meta?: LogMeta): void {
    const style = STYLES[kind];
    if (style.rank < this.threshold) return;

    const parts = [
      this.paint(new Date().toISOString(), 'gray'),
      this.paint(style.label, style.tone),
      this.paint(`[${this.name}]`, 'cyan'),
      message,
    ];
    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.paint(JSON.stringify(meta), 'gray'));
    }
    console[style.sink](parts.join(' '));
  }

  debug(message: string, meta?: LogMeta): void {
    this.emit('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.emit('error', message, meta);
  }

  /** Info-level line flagged as a completed step */
  success(message: string, meta?: LogMeta): void {
    this.emit('success', message, meta);
  }
}

/** `LOG_LEVEL`, case-insensitive; unknown values fall back to `info` */
export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  return validateEnum(value?.toLowerCase(), LOG_LEVEL_NAMES, 'info');
}

export function createLogger(name: string, level?: LogLevel): Logger {
  return new Logger(name, level ?? resolveLogLevel());
}
