/**
 * Dashboard and snapshot writers
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '@episode-calendar/plugin-utils';
import type { CalendarSnapshot } from './types.js';

const logger = createLogger('sonarr-calendar:output');

async function writeText(path: string, content: string, label: string): Promise<boolean> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
    logger.success(`${label} written`, { path });
    return true;
  } catch (error) {
    logger.error(`Error writing ${label}`, { path, error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

export function writeHtml(path: string, html: string): Promise<boolean> {
  return writeText(path, html, 'HTML dashboard');
}

export function writeJson(path: string, snapshot: CalendarSnapshot): Promise<boolean> {
  return writeText(path, `${JSON.stringify(snapshot, null, 2)}\n`, 'JSON snapshot');
}
