import { formatPoString, readPoEntries, splitLines, type PoEntry } from './po';
import {
  FIELD_CONTEXTS,
  FIELD_NAMES,
  type CatalogEntry,
  type CatalogRecord,
  type ExportOptions,
  type FieldName,
  type MetadataFileHandler,
} from './types';

type LineEdit = {
  start: number;
  deleteCount: number;
  insert: string[];
};

const findTrackedEntry = (entries: PoEntry[], field: FieldName) =>
  entries.find((entry) => entry.msgctxt === FIELD_CONTEXTS[field]);

const TRACKED_CONTEXTS = new Set(Object.values(FIELD_CONTEXTS));

// Metadata fields are single texts, never plural forms
const rejectPluralMetadata = (entries: PoEntry[]) => {
  const plural = entries.find(
    (entry) => entry.plural && entry.msgctxt !== undefined && TRACKED_CONTEXTS.has(entry.msgctxt),
  );
  if (plural) {
    throw new Error(`line ${plural.start + 1}: msgctxt "${plural.msgctxt}" is used by a plural entry`);
  }
};

const renderEntry = (field: FieldName, entry: CatalogEntry): string[] => [
  `msgctxt "${FIELD_CONTEXTS[field]}"`,
  ...formatPoString('msgid', entry.source),
  ...formatPoString('msgstr', entry.translation),
];

/**
 * Reads and writes the add-on metadata entries (`msgctxt "Addon Summary"` and friends)
 * of a gettext `strings.po` catalog.
 */
export class CatalogHandler implements MetadataFileHandler<CatalogRecord> {
  async parse(buffer: Buffer): Promise<CatalogRecord> {
    const { lines } = splitLines(buffer.toString('utf-8'));
    const entries = readPoEntries(lines);
    rejectPluralMetadata(entries);

    const record: CatalogRecord = { entries: {} };
    for (const field of FIELD_NAMES) {
      const entry = findTrackedEntry(entries, field);
      if (entry) {
        record.entries[field] = { source: entry.msgid, translation: entry.msgstr };
      }
    }
    return record;
  }

  async export(options: ExportOptions<CatalogRecord>): Promise<Buffer> {
    const { eol, lines } = splitLines(options.originalBuffer.toString('utf-8'));
    const entries = readPoEntries(lines);
    rejectPluralMetadata(entries);

    const edits: LineEdit[] = [];
    const missing: string[][] = [];
    let lastTrackedEnd: number | undefined;

    for (const field of FIELD_NAMES) {
      const existing = findTrackedEntry(entries, field);
      if (existing) {
        lastTrackedEnd = Math.max(lastTrackedEnd ?? 0, existing.end);
      }

      const wanted = options.record.entries[field];
      if (!wanted) continue;

      if (!existing) {
        missing.push(renderEntry(field, wanted));
      } else if (existing.msgid !== wanted.source || existing.msgstr !== wanted.translation) {
        edits.push({
          start: existing.start,
          deleteCount: existing.end - existing.start,
          insert: renderEntry(field, wanted),
        });
      }
    }

    if (missing.length > 0) {
      const header = entries.find((entry) => entry.msgctxt === undefined && entry.msgid === '');
      const after = lastTrackedEnd ?? header?.end;
      edits.push(
        after === undefined
          ? { start: 0, deleteCount: 0, insert: missing.flatMap((block) => [...block, '']) }
          : { start: after, deleteCount: 0, insert: missing.flatMap((block) => ['', ...block]) },
      );
    }

    // Bottom-up so earlier line numbers stay valid; at equal lines the replacement is applied first
    edits.sort((a, b) => b.start - a.start || b.deleteCount - a.deleteCount);

    const output = [...lines];
    for (const edit of edits) {
      output.splice(edit.start, edit.deleteCount, ...edit.insert);
    }

    return Buffer.from(output.join(eol), 'utf-8');
  }
}
