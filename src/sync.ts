import { Command } from 'commander';

import { parseAfterDate, parsePositiveInt, toBatchSyncOptions } from './cli/syncOptions';
import { credentialsFromEnv, StravaClient } from './clients/strava';
import { validateDatabaseEnv, validateStravaEnv } from './config';
import { runBatchSync } from './pipelines/batchSync';
import { closeStore, getStore } from './storage';
import { logger } from './utils/logger';

import type { SyncCliOptions } from './cli/syncOptions';

const program = new Command();

program
  .name('activity-sync')
  .description('Fetch all Strava activities and load the new ones into the database')
  .option('-t, --table <name>', 'Target table (default: ACTIVITIES_TABLE or "activities")')
  .option('--per-page <number>', 'Activities per API page', parsePositiveInt)
  .option('--max-pages <number>', 'Stop after this many pages', parsePositiveInt)
  .option('--after <date>', 'Only activities that started after this date', parseAfterDate)
  .option('--csv <path>', 'Also write the raw fetched activities to a CSV file')
  .option('--no-dedupe', 'Insert every row without checking for existing ones')
  .action(async (options: SyncCliOptions) => {
    try {
      validateStravaEnv();
      validateDatabaseEnv();

      const { fetched, load } = await runBatchSync(
        { log: logger, source: new StravaClient(credentialsFromEnv()), store: getStore() },
        toBatchSyncOptions(options),
      );

      if (load.success) {
        logger.info('Sync complete', { fetched, skipped: load.skipped, written: load.written });
      } else if (load.reason === 'schema_mismatch') {
        logger.error('Sync aborted: table schema does not match', undefined, {
          mismatches: load.mismatches,
        });
        process.exitCode = 1;
      } else {
        logger.error('Sync aborted: store failure', load.error);
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error('Sync failed', error);
      process.exitCode = 1;
    } finally {
      await closeStore();
    }
  });

await program.parseAsync();
