/**
 * Sonarr Calendar Dashboard Server
 * Serves the generated dashboard, cached posters and the JSON snapshot
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { createLogger } from '@episode-calendar/plugin-utils';
import type { CalendarScheduler } from './scheduler.js';
import type { CalendarConfig, ServerConfig } from './types.js';

const logger = createLogger('sonarr-calendar:server');

const IMAGE_FILE_PATTERN = /^[A-Za-z0-9_-]+\.jpg$/;

export interface DashboardServerOptions {
  config: CalendarConfig;
  server: ServerConfig;
  scheduler?: CalendarScheduler | null;
}

async function readIfExists(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function createServer(options: DashboardServerOptions) {
  const { config, server } = options;
  const scheduler = options.scheduler ?? null;
  const imagePrefix = basename(config.imageCacheDir);

  const app = Fastify({ logger: false });

  await app.register(cors, { origin: true });

  // =========================================================================
  // Health Check
  // =========================================================================

  app.get('/health', async () => {
    return { status: 'ok', plugin: 'sonarr-calendar', timestamp: new Date().toISOString() };
  });

  // =========================================================================
  // Dashboard
  // =========================================================================

  app.get('/', async (_request, reply) => {
    const html = await readIfExists(config.outputHtmlFile);
    if (!html) {
      return reply.status(404).send({ error: 'Dashboard has not been generated yet' });
    }
    return reply.type('text/html; charset=utf-8').send(html);
  });

  app.get<{ Params: { file: string } }>(`/${imagePrefix}/:file`, async (request, reply) => {
    const { file } = request.params;
    if (!IMAGE_FILE_PATTERN.test(file)) {
      return reply.status(400).send({ error: 'Invalid image name' });
    }

    const image = await readIfExists(join(config.imageCacheDir, file));
    if (!image) {
      return reply.status(404).send({ error: 'Image not found' });
    }
    return reply.type('image/jpeg').send(image);
  });

  // =========================================================================
  // Snapshot & Status
  // =========================================================================

  app.get('/v1/snapshot', async (_request, reply) => {
    const current = scheduler?.getSnapshot();
    if (current) {
      return current;
    }

    if (config.outputJsonFile) {
      const stored = await readIfExists(config.outputJsonFile);
      if (stored) {
        return reply.type('application/json; charset=utf-8').send(stored.toString('utf8'));
      }
    }

    return reply.status(404).send({ error: 'No snapshot available' });
  });

  app.get('/v1/status', async () => {
    if (!scheduler) {
      return { plugin: 'sonarr-calendar', state: 'stopped', cycles: 0, lastResult: null, nextRunAt: null };
    }
    const status = scheduler.getStatus();
    return {
      plugin: 'sonarr-calendar',
      state: status.state,
      cycles: status.cycles,
      lastResult: status.lastResult,
      nextRunAt: status.nextRunAt,
    };
  });

  return {
    app,
    start: async () => {
      await app.listen({ port: server.port, host: server.host });
      logger.success(`Sonarr Calendar dashboard running on http://${server.host}:${server.port}`);
    },
    stop: async () => {
      logger.info('Shutting down...');
      await app.close();
    },
  };
}
