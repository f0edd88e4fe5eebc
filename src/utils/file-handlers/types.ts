export const FIELD_NAMES = ['summary', 'description', 'disclaimer'] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type LocaleCode = string;

// msgctxt used by Kodi catalogs for each manifest field
export const FIELD_CONTEXTS: Record<FieldName, string> = {
  summary: 'Addon Summary',
  description: 'Addon Description',
  disclaimer: 'Addon Disclaimer',
};

export type LocalizedText = Record<LocaleCode, string>;

export type ManifestRecord = Record<FieldName, LocalizedText>;

export type CatalogEntry = {
  source: string; // msgid
  translation: string; // msgstr
};

export type CatalogRecord = {
  entries: Partial<Record<FieldName, CatalogEntry>>;
};

export type ExportOptions<TRecord> = {
  record: TRecord;
  originalBuffer: Buffer;
};

export interface MetadataFileHandler<TRecord> {
  parse: (buffer: Buffer) => Promise<TRecord>;
  export: (options: ExportOptions<TRecord>) => Promise<Buffer>;
}

export const emptyManifestRecord = (): ManifestRecord => ({
  summary: {},
  description: {},
  disclaimer: {},
});
