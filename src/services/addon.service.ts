import fs from 'fs/promises';
import { CatalogHandler } from '../utils/file-handlers/catalog.handler';
import { ManifestHandler } from '../utils/file-handlers/manifest.handler';
import type { ExportOptions, MetadataFileHandler } from '../utils/file-handlers/types';
import { reportSyncError } from '../utils/errorHandler';
import { logger, truncateForLog } from '../utils/logger';
import type { SyncConfig } from '../utils/syncConfig';
import { describeCause, SyncError } from '../utils/syncError';
import { findManifest, listAddonDirectories, listLocaleCatalogs } from './discovery.service';
import {
  catalogsEqual,
  manifestsEqual,
  syncCatalogsToManifest,
  syncManifestToCatalogs,
  type LocaleCatalog,
  type SyncOptions,
} from './sync.service';

export type AddonSyncResult = {
  addonDir: string;
  status: 'synced' | 'skipped';
  manifestUpdated: boolean;
  catalogsUpdated: string[];
};

export type SyncFailure = {
  addonDir: string;
  error: SyncError;
};

export type SyncReport = {
  results: AddonSyncResult[];
  failures: SyncFailure[];
};

const catalogHandler = new CatalogHandler();

const readSource = async (filePath: string): Promise<Buffer> => {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw SyncError.read(filePath, error);
  }
};

const parseSource = async <TRecord>(
  handler: MetadataFileHandler<TRecord>,
  filePath: string,
  buffer: Buffer,
): Promise<TRecord> => {
  try {
    return await handler.parse(buffer);
  } catch (error) {
    const errorMessage = describeCause(error);
    logger.debug({ error: errorMessage, filePath }, 'Failed to parse metadata file');
    throw SyncError.parse(filePath, errorMessage, error);
  }
};

// Temporary sibling + rename: a file is either fully rewritten or left as it was
const writeAtomically = async (filePath: string, content: Buffer): Promise<void> => {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    // rename would replace a read-only file through its directory
    await fs.access(filePath, fs.constants.W_OK);
  } catch (error) {
    throw SyncError.write(filePath, error);
  }
  try {
    const { mode } = await fs.stat(filePath);
    await fs.writeFile(tempPath, content);
    await fs.chmod(tempPath, mode & 0o777);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ tempPath, error: describeCause(cleanupError) }, 'Failed to remove temporary file');
    });
    throw SyncError.write(filePath, error);
  }
};

const writeRecord = async <TRecord>(
  handler: MetadataFileHandler<TRecord>,
  filePath: string,
  options: ExportOptions<TRecord>,
): Promise<void> => {
  let content: Buffer;
  try {
    content = await handler.export(options);
  } catch (error) {
    throw SyncError.write(filePath, error);
  }
  await writeAtomically(filePath, content);
};

/**
 * Syncs one add-on directory: its `addon.xml` and every catalog under
 * `resource.language.*`, in the direction the config asks for.
 */
export const syncAddon = async (addonDir: string, config: SyncConfig): Promise<AddonSyncResult> => {
  const manifestPath = await findManifest(addonDir);

  const locations = await listLocaleCatalogs(addonDir);
  if (locations.length === 0) {
    logger.warn({ addonDir }, 'No catalogs found, add-on skipped');
    return { addonDir, status: 'skipped', manifestUpdated: false, catalogsUpdated: [] };
  }
  if (!locations.some((location) => location.locale === config.baseLocale)) {
    throw SyncError.missingBaseCatalog(addonDir, config.baseLocale);
  }

  const manifestHandler = new ManifestHandler(config.baseLocale);
  const manifestBuffer = await readSource(manifestPath);
  const manifest = await parseSource(manifestHandler, manifestPath, manifestBuffer);

  const buffers: Buffer[] = [];
  const catalogs: LocaleCatalog[] = [];
  for (const location of locations) {
    const buffer = await readSource(location.path);
    buffers.push(buffer);
    catalogs.push({ ...location, record: await parseSource(catalogHandler, location.path, buffer) });
  }

  logger.debug({ addonDir, locales: catalogs.map((catalog) => catalog.locale) }, 'Catalogs loaded');

  const options: SyncOptions = { baseLocale: config.baseLocale, emptyTranslation: config.emptyTranslation };

  let nextManifest = manifest;
  if (config.direction !== 'xml-to-po') {
    const synced = syncCatalogsToManifest(manifest, catalogs, options);
    for (const { locale, field, source } of synced.outdated) {
      logger.warn(
        { locale, field, source: truncateForLog(source) },
        'Translation was made from a different source text than addon.xml has',
      );
    }
    nextManifest = synced.manifest;
  }

  let nextCatalogs = catalogs;
  if (config.direction !== 'po-to-xml') {
    const synced = syncManifestToCatalogs(nextManifest, catalogs, options);
    for (const field of synced.missingFields) {
      logger.warn(
        { kind: 'MissingField', field, locale: config.baseLocale, manifestPath },
        'Field missing from addon.xml, catalog entries left as they are',
      );
    }
    nextCatalogs = synced.catalogs;
  }

  const manifestUpdated = !manifestsEqual(manifest, nextManifest);
  if (manifestUpdated) {
    await writeRecord(manifestHandler, manifestPath, { record: nextManifest, originalBuffer: manifestBuffer });
    logger.info({ manifestPath }, 'addon.xml updated');
  } else {
    logger.info({ manifestPath }, 'No changes made to addon.xml');
  }

  const catalogsUpdated: string[] = [];
  for (const [index, catalog] of nextCatalogs.entries()) {
    if (catalogsEqual(catalogs[index].record, catalog.record)) continue;
    await writeRecord(catalogHandler, catalog.path, { record: catalog.record, originalBuffer: buffers[index] });
    catalogsUpdated.push(catalog.path);
    logger.info({ locale: catalog.locale, path: catalog.path }, 'Catalog updated');
  }

  return { addonDir, status: 'synced', manifestUpdated, catalogsUpdated };
};

/**
 * Runs the sync over the configured path, or over each of its subdirectories when
 * `multipleAddons` is set. A failing add-on is reported and the rest still run.
 */
export const runSync = async (config: SyncConfig): Promise<SyncReport> => {
  const addonDirs = config.multipleAddons ? await listAddonDirectories(config.path) : [config.path];
  const report: SyncReport = { results: [], failures: [] };

  for (const addonDir of addonDirs) {
    logger.info({ addonDir, direction: config.direction }, 'Syncing add-on metadata');
    try {
      report.results.push(await syncAddon(addonDir, config));
    } catch (error) {
      report.failures.push({ addonDir, error: reportSyncError(error, addonDir) });
    }
  }

  return report;
};
