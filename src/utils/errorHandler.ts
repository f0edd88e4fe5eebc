import { SyncError } from './syncError';
import { logger } from './logger';

/**
 * Logs a failure raised while syncing one add-on and returns it as a `SyncError`,
 * so the caller can record it and move on to the next add-on.
 */
export const reportSyncError = (err: unknown, addonDir: string): SyncError => {
  if (err instanceof SyncError) {
    logger.error(
      {
        kind: err.kind,
        path: err.path,
        addonDir,
      },
      err.message,
    );
    return err;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error(
    {
      error: error.message,
      stack: error.stack,
      name: error.name,
      addonDir,
    },
    'Unhandled error',
  );
  return SyncError.unexpected(error, addonDir);
};
