#!/usr/bin/env -S node --import tsx
/**
 * Sonarr Calendar CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync } from 'node:fs';
import { createLogger, validatePositiveInt } from '@episode-calendar/plugin-utils';
import { SonarrClient } from './client.js';
import {
  ConfigError,
  SETUP_HINT,
  applySetupOverrides,
  defaultConfigFile,
  describeConfig,
  loadConfig,
  loadServerConfig,
  parseConfig,
  resolveConfigPath,
  saveConfig,
  toConfigFile,
  type SetupOverrides,
} from './config.js';
import { formatSeasonEpisode } from './formatting.js';
import { ImageCache } from './image-cache.js';
import { CalendarScheduler } from './scheduler.js';
import { createServer } from './server.js';
import type { CalendarConfig } from './types.js';

const logger = createLogger('sonarr-calendar:cli');
const program = new Command();

function fail(message: string, problems: string[] = []): never {
  console.error(chalk.red(message));
  for (const problem of problems) {
    console.error(chalk.red(`  • ${problem}`));
  }
  process.exit(1);
}

function loadConfigOrExit(): CalendarConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      for (const problem of error.problems) {
        console.error(chalk.red(`  • ${problem}`));
      }
      console.error(chalk.yellow(SETUP_HINT));
      process.exit(1);
    }
    throw error;
  }
}

function createPipeline(config: CalendarConfig): { client: SonarrClient; scheduler: CalendarScheduler } {
  const client = new SonarrClient(config);
  const scheduler = new CalendarScheduler({
    config,
    source: client,
    imageCache: config.enableImageCache ? new ImageCache(config) : null,
  });
  return { client, scheduler };
}

async function checkConnection(client: SonarrClient): Promise<void> {
  const spinner = ora('Testing connection to Sonarr').start();
  const check = await client.testConnection();
  if (!check.ok) {
    spinner.fail('Cannot connect to Sonarr');
    fail(check.error ?? 'Unknown error', ['Check the URL and API key with `sonarr-calendar show-config`.']);
  }
  spinner.succeed(`Connected to Sonarr v${check.version ?? 'Unknown'}`);
}

function printConfig(config: CalendarConfig): void {
  console.log(chalk.bold('\nSonarr Calendar Configuration'));
  console.log('=============================');
  for (const line of describeConfig(config, resolveConfigPath())) {
    console.log(line);
  }
  console.log('');
}

function stopOnSignal(stop: () => Promise<void>): void {
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

program
  .name('sonarr-calendar')
  .description('Static HTML calendar and download progress dashboard for Sonarr')
  .version('1.0.0');

program
  .command('run')
  .description('Check connectivity, then refresh the dashboard on the configured interval')
  .action(async () => {
    const config = loadConfigOrExit();
    printConfig(config);

    const { client, scheduler } = createPipeline(config);
    await checkConnection(client);

    scheduler.start();
    stopOnSignal(() => scheduler.stop());
  });

program
  .command('once')
  .description('Run a single refresh cycle and exit')
  .action(async () => {
    const config = loadConfigOrExit();
    const { scheduler } = createPipeline(config);

    const spinner = ora('Generating calendar').start();
    const result = await scheduler.runCycle();
    if (!result.success) {
      spinner.fail('Refresh failed');
      fail(result.error ?? `Could not write ${config.outputHtmlFile}`);
    }

    spinner.succeed(`${result.showsProcessed} shows processed in ${result.duration}ms`);
    console.log(`  Calendar items: ${result.calendarItems}`);
    console.log(`  Series loaded:  ${result.seriesLoaded}`);
    console.log(chalk.green(`  HTML:           ${config.outputHtmlFile}`));
    if (config.outputJsonFile) {
      console.log(result.jsonWritten ? chalk.green(`  JSON:           ${config.outputJsonFile}`) : chalk.yellow('  JSON:           not written'));
    }
  });

program
  .command('setup')
  .description('Create or update the configuration file')
  .option('-u, --url <url>', 'Sonarr URL, e.g. http://localhost:8989')
  .option('-k, --api-key <key>', 'Sonarr API key')
  .option('--days-past <days>', 'Days to look back (0-365)')
  .option('--days-future <days>', 'Days to look forward (1-365)')
  .option('--html-file <path>', 'HTML output file')
  .option('--json-file <path>', 'JSON snapshot file (empty string disables it)')
  .option('--cache-dir <path>', 'Image cache directory')
  .option('-i, --interval <hours>', 'Refresh interval in hours (1-168)')
  .option('--title <title>', 'Dashboard title')
  .option('--theme <theme>', 'Default theme: dark or light')
  .option('--columns <n>', 'Grid columns (1-8)')
  .option('--no-image-cache', 'Disable poster caching')
  .option('--skip-test', 'Save without testing the connection')
  .action(async (options: SetupOverrides & { skipTest?: boolean }) => {
    const configPath = resolveConfigPath();

    let base = defaultConfigFile();
    if (existsSync(configPath)) {
      try {
        base = toConfigFile(loadConfig(configPath));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.yellow(`Existing configuration ignored: ${message}`));
      }
    }

    let config: CalendarConfig;
    try {
      // commander reports --no-image-cache as imageCache: true when the flag is absent
      const overrides: SetupOverrides = { ...options, imageCache: options.imageCache === false ? false : undefined };
      config = parseConfig(applySetupOverrides(base, overrides), configPath);
    } catch (error) {
      if (error instanceof ConfigError) {
        fail('Please fix the following errors:', error.problems);
      }
      throw error;
    }

    if (!options.skipTest) {
      await checkConnection(new SonarrClient(config));
    }

    const spinner = ora('Saving configuration').start();
    try {
      saveConfig(config, configPath);
      spinner.succeed(`Configuration saved to ${configPath}`);
    } catch (error) {
      spinner.fail('Failed to save configuration');
      fail(error instanceof Error ? error.message : String(error));
    }

    printConfig(config);
  });

program
  .command('show-config')
  .description('Print the current configuration with the API key masked')
  .action(() => {
    printConfig(loadConfigOrExit());
  });

program
  .command('test-connection')
  .description('Check that Sonarr is reachable with the configured API key')
  .action(async () => {
    const config = loadConfigOrExit();
    await checkConnection(new SonarrClient(config));
  });

program
  .command('prune-images')
  .description('Delete cached images older than the retention period')
  .option('-d, --days <days>', 'Maximum age in days (defaults to image_retention_days)')
  .action(async (options: { days?: string }) => {
    const config = loadConfigOrExit();
    const days = validatePositiveInt(options.days, config.imageRetentionDays);
    const spinner = ora(`Removing cached images older than ${days} days`).start();
    const removed = await new ImageCache(config).pruneStale(days);
    spinner.succeed(`Removed ${removed} cached image${removed === 1 ? '' : 's'}`);
  });

program
  .command('episodes <seriesId>')
  .description('List every episode of a series with its download state')
  .action(async (seriesIdArg: string) => {
    const seriesId = validatePositiveInt(seriesIdArg, 0);
    if (seriesId === 0) {
      fail(`Invalid series id: ${seriesIdArg}`);
    }

    const config = loadConfigOrExit();
    const spinner = ora(`Loading episodes for series ${seriesId}`).start();
    const episodes = await new SonarrClient(config).fetchParentEpisodes(seriesId);
    spinner.stop();

    if (episodes.length === 0) {
      console.log(chalk.yellow('No episodes found'));
      return;
    }

    const downloaded = episodes.filter((ep) => ep.hasFile).length;
    console.log(chalk.bold(`\n${episodes.length} episodes, ${downloaded} downloaded:\n`));
    for (const ep of episodes) {
      const state = ep.hasFile ? chalk.green('downloaded') : ep.monitored ? chalk.yellow('monitored') : chalk.gray('unmonitored');
      console.log(`${formatSeasonEpisode(ep.seasonNumber, ep.episodeNumber)}  ${(ep.airDate || 'TBA').padEnd(10)}  ${state}  ${ep.title}`);
    }
  });

program
  .command('serve')
  .description('Serve the dashboard over HTTP')
  .option('--with-loop', 'Also run the refresh loop in this process')
  .action(async (options: { withLoop?: boolean }) => {
    const config = loadConfigOrExit();
    const serverConfig = loadServerConfig();

    let scheduler: CalendarScheduler | null = null;
    if (options.withLoop) {
      const pipeline = createPipeline(config);
      await checkConnection(pipeline.client);
      scheduler = pipeline.scheduler;
    }

    try {
      const server = await createServer({ config, server: serverConfig, scheduler });
      await server.start();
      scheduler?.start();
      stopOnSignal(async () => {
        await scheduler?.stop();
        await server.stop();
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Server failed', { error: message });
      process.exit(1);
    }
  });

await program.parseAsync();
