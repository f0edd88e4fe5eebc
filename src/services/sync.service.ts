import type { EmptyTranslationPolicy } from '../utils/env';
import {
  FIELD_NAMES,
  emptyManifestRecord,
  type CatalogRecord,
  type FieldName,
  type LocaleCode,
  type LocalizedText,
  type ManifestRecord,
} from '../utils/file-handlers/types';

export type SyncOptions = {
  baseLocale: LocaleCode;
  emptyTranslation: EmptyTranslationPolicy;
};

export type LocaleCatalog = {
  locale: LocaleCode;
  path: string;
  record: CatalogRecord;
};

export type OutdatedTranslation = {
  locale: LocaleCode;
  field: FieldName;
  source: string; // msgid the translation was made from
};

export type CatalogSyncResult = {
  catalogs: LocaleCatalog[];
  missingFields: FieldName[];
};

export type ManifestSyncResult = {
  manifest: ManifestRecord;
  outdated: OutdatedTranslation[];
};

const localizedValue = (texts: LocalizedText, locale: LocaleCode): string | undefined =>
  Object.hasOwn(texts, locale) ? texts[locale] : undefined;

// Under the 'untranslated' policy an empty string means "no translation yet"
const isTranslated = (value: string | undefined, policy: EmptyTranslationPolicy): value is string =>
  value !== undefined && (value !== '' || policy === 'translated');

const cloneManifest = (manifest: ManifestRecord): ManifestRecord => {
  const copy = emptyManifestRecord();
  for (const field of FIELD_NAMES) {
    copy[field] = { ...manifest[field] };
  }
  return copy;
};

/**
 * Manifest → catalogs. The manifest's base-locale text becomes the `msgid` of every
 * catalog; a locale's manifest text replaces the catalog translation, and without one
 * the catalog keeps what it has (or gets an untranslated entry).
 */
export const syncManifestToCatalogs = (
  manifest: ManifestRecord,
  catalogs: LocaleCatalog[],
  options: SyncOptions,
): CatalogSyncResult => {
  const missingFields = FIELD_NAMES.filter(
    (field) => localizedValue(manifest[field], options.baseLocale) === undefined,
  );

  const updated = catalogs.map((catalog) => {
    const entries = { ...catalog.record.entries };

    for (const field of FIELD_NAMES) {
      const source = localizedValue(manifest[field], options.baseLocale);
      if (source === undefined) continue;

      if (catalog.locale === options.baseLocale) {
        entries[field] = { source, translation: '' };
        continue;
      }

      const manifestText = localizedValue(manifest[field], catalog.locale);
      const translation = isTranslated(manifestText, options.emptyTranslation)
        ? manifestText
        : entries[field]?.translation ?? '';
      entries[field] = { source, translation };
    }

    return { ...catalog, record: { entries } };
  });

  return { catalogs: updated, missingFields };
};

/**
 * Catalogs → manifest. Translations are copied into the manifest under the catalog's
 * locale; the base locale is never written and missing entries change nothing.
 */
export const syncCatalogsToManifest = (
  manifest: ManifestRecord,
  catalogs: LocaleCatalog[],
  options: SyncOptions,
): ManifestSyncResult => {
  const updated = cloneManifest(manifest);
  const outdated: OutdatedTranslation[] = [];

  for (const catalog of catalogs) {
    if (catalog.locale === options.baseLocale) continue;

    for (const field of FIELD_NAMES) {
      const entry = catalog.record.entries[field];
      if (!entry || !isTranslated(entry.translation, options.emptyTranslation)) continue;

      const source = localizedValue(manifest[field], options.baseLocale);
      if (source !== undefined && entry.source !== source) {
        outdated.push({ locale: catalog.locale, field, source: entry.source });
      }
      updated[field][catalog.locale] = entry.translation;
    }
  }

  return { manifest: updated, outdated };
};

const sameTexts = (a: LocalizedText, b: LocalizedText) => {
  const locales = Object.keys(a);
  return (
    locales.length === Object.keys(b).length &&
    locales.every((locale) => localizedValue(b, locale) === a[locale])
  );
};

export const manifestsEqual = (a: ManifestRecord, b: ManifestRecord): boolean =>
  FIELD_NAMES.every((field) => sameTexts(a[field], b[field]));

export const catalogsEqual = (a: CatalogRecord, b: CatalogRecord): boolean =>
  FIELD_NAMES.every((field) => {
    const left = a.entries[field];
    const right = b.entries[field];
    if (!left || !right) return left === right;
    return left.source === right.source && left.translation === right.translation;
  });
