#!/usr/bin/env node
import { runSync } from './services/addon.service';
import { ensureDirectory } from './services/discovery.service';
import { parseCommandLine, USAGE } from './utils/cliArgs';
import { logger } from './utils/logger';
import { describeCause, SyncError } from './utils/syncError';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const main = async (argv: string[]): Promise<number> => {
  try {
    const command = parseCommandLine(argv);
    if (command.kind === 'help') {
      process.stdout.write(USAGE);
      return EXIT_OK;
    }

    const { config } = command;
    await ensureDirectory(config.path);

    const report = await runSync(config);
    const skipped = report.results.filter((result) => result.status === 'skipped').length;
    logger.info(
      {
        synced: report.results.length - skipped,
        skipped,
        failed: report.failures.length,
      },
      'Sync finished',
    );

    return report.failures.length > 0 ? EXIT_FAILURE : EXIT_OK;
  } catch (error) {
    if (error instanceof SyncError && error.kind === 'InvalidArguments') {
      logger.error(error.message);
      process.stderr.write(USAGE);
      return EXIT_USAGE;
    }
    logger.error({ error: describeCause(error) }, 'Sync aborted');
    return EXIT_FAILURE;
  }
};

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ error: describeCause(error) }, 'Unhandled error');
      process.exitCode = EXIT_FAILURE;
    });
}
