import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import type { LocaleCode } from '../utils/file-handlers/types';
import { LOCALE_CODE_SOURCE, normalizeLocaleCode } from '../utils/locale';
import { SyncError } from '../utils/syncError';

const MANIFEST_FILENAME = 'addon.xml';

const CATALOG_PATTERN = '**/resource.language.*/*.po';
const CATALOG_DIRECTORY = new RegExp(`^resource\\.language\\.(${LOCALE_CODE_SOURCE})$`);

export type CatalogLocation = {
  locale: LocaleCode;
  path: string;
};

const isNotFound = (error: unknown) =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const byPath = (a: CatalogLocation, b: CatalogLocation) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

export const localeFromCatalogPath = (filePath: string): LocaleCode | undefined => {
  const match = CATALOG_DIRECTORY.exec(path.basename(path.dirname(filePath)));
  return match ? normalizeLocaleCode(match[1]) : undefined;
};

export const ensureDirectory = async (directory: string): Promise<void> => {
  try {
    const stats = await fs.stat(directory);
    if (stats.isDirectory()) return;
  } catch (error) {
    if (!isNotFound(error)) throw SyncError.read(directory, error);
  }
  throw SyncError.invalidArguments(`Not a directory: ${directory}`);
};

export const findManifest = async (addonDir: string): Promise<string> => {
  const manifestPath = path.join(addonDir, MANIFEST_FILENAME);
  try {
    const stats = await fs.stat(manifestPath);
    if (stats.isFile()) return manifestPath;
  } catch (error) {
    if (!isNotFound(error)) throw SyncError.read(manifestPath, error);
  }
  throw SyncError.missingManifest(addonDir);
};

/**
 * Lists the catalogs of an add-on: every `.po` file inside a
 * `resource.language.<code>` directory, at any depth.
 */
export const listLocaleCatalogs = async (addonDir: string): Promise<CatalogLocation[]> => {
  let files: string[];
  try {
    files = await glob(CATALOG_PATTERN, {
      cwd: addonDir,
      absolute: true,
      nodir: true,
      ignore: ['**/node_modules/**'],
    });
  } catch (error) {
    throw SyncError.read(addonDir, error);
  }

  return files
    .flatMap((file) => {
      const locale = localeFromCatalogPath(file);
      return locale ? [{ locale, path: file }] : [];
    })
    .sort(byPath);
};

export const listAddonDirectories = async (root: string): Promise<string[]> => {
  try {
    const entries = await fs.readdir(root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(root, name));
  } catch (error) {
    throw SyncError.read(root, error);
  }
};
