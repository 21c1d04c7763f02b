#!/usr/bin/env node
import { Command } from 'commander';
import { Logger } from './utils/logger.js';
import { loadConfig } from './utils/config.js';
import { nonNegativeInt } from './utils/args.js';
import { NavidromeCatalog } from './modules/catalog/NavidromeCatalog.js';
import { LastfmClient } from './modules/scrobblers/LastfmClient.js';
import { ReconciliationLoop } from './services/ReconciliationLoop.js';
import { CancelledError } from './types/errors.js';

interface CliOptions {
  dryRun?: boolean;
  max?: number;
  config?: string;
}

const program = new Command();

program
  .name('playcount-sync')
  .description('Sync Navidrome play counts into Last.fm by scrobbling the difference.')
  .option('--dry-run', 'Do not scrobble, only print actions')
  .option('--max <n>', 'Stop after N scrobbles', nonNegativeInt)
  .option('--config <path>', 'Path to config.yaml (defaults to $CONFIG_PATH or ./config/config.yaml)')
  .action(async (options: CliOptions) => {
    const config = loadConfig(options.config);
    const dryRun = options.dryRun === true || config.dryRun;

    // Ctrl+C stops the loop between steps instead of killing the process mid-request
    const controller = new AbortController();
    process.once('SIGINT', () => {
      Logger.warn('Interrupt received; stopping after the current step (Ctrl+C again to force).');
      controller.abort();
      process.once('SIGINT', () => process.exit(130));
    });

    if (dryRun) {
      Logger.info('DRY-RUN MODE: no scrobbles will be sent.');
    } else {
      Logger.warn('LIVE MODE: scrobbles will be sent to Last.fm.');
    }

    const catalog = new NavidromeCatalog(config.navidrome, config.retry.catalog);
    const fetchStart = Date.now();
    const tracks = await catalog.fetchAllTracks(controller.signal);
    Logger.info(`Fetched ${tracks.length} tracks with playcounts in ${((Date.now() - fetchStart) / 1000).toFixed(2)}s`);

    const lastfm = new LastfmClient(config.lastfm, config.rateLimit.lastfm);
    const loop = new ReconciliationLoop(tracks, lastfm, {
      settings: { ...config.sync, dryRun, maxScrobbles: options.max ?? null },
      retry: config.retry,
      signal: controller.signal,
    });
    await loop.run();
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CancelledError) {
    Logger.warn('Cancelled before any tracks were gathered.');
  } else {
    Logger.error('Fatal error; aborting run.', err);
  }
  process.exitCode = 1;
});
