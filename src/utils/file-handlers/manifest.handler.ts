import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import {
  FIELD_NAMES,
  emptyManifestRecord,
  type ExportOptions,
  type FieldName,
  type ManifestRecord,
  type MetadataFileHandler,
} from './types';

const METADATA_POINT = 'xbmc.addon.metadata';

const METADATA_OPEN_TAG = /<extension\b[^>]*?\bpoint\s*=\s*["']xbmc\.addon\.metadata["'][^>]*>/g;
const METADATA_CLOSE_TAG = '</extension>';
const TRACKED_ELEMENT = /<(summary|description|disclaimer)\b([^>]*?)(?:\/>|>[\s\S]*?<\/\1\s*>)/g;
const LANG_ATTRIBUTE = /\blang\s*=\s*(?:"([^"]*)"|'([^']*)')/;
const UNPARSED_SECTION = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g;

const ARRAY_PATHS = new Set(['addon.extension', ...FIELD_NAMES.map((field) => `addon.extension.${field}`)]);

const textNodeSchema = z.union([
  z.string(),
  z.object({ '#text': z.string().optional(), '@_lang': z.string().optional() }).passthrough(),
]);

const extensionSchema = z
  .object({
    '@_point': z.string().optional(),
    summary: z.array(textNodeSchema).optional(),
    description: z.array(textNodeSchema).optional(),
    disclaimer: z.array(textNodeSchema).optional(),
  })
  .passthrough();

const manifestSchema = z
  .object({
    addon: z.object({ extension: z.array(z.union([z.string(), extensionSchema])).optional() }).passthrough(),
  })
  .passthrough();

type TextNode = z.infer<typeof textNodeSchema>;
type ExtensionNode = z.infer<typeof extensionSchema>;

type Range = {
  start: number;
  end: number;
};

type Removal = Range & {
  indent?: string; // set when the element occupied a whole line
};

// Original markup of each (field, locale), reused while its value is unchanged
type OriginalElements = Map<string, string>;

const elementKey = (field: string, locale: string) => `${field}\u0000${locale}`;

const findUnparsedSections = (xml: string): Range[] =>
  Array.from(xml.matchAll(UNPARSED_SECTION), (match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));

const isInside = (sections: Range[], index: number) =>
  sections.some((section) => index >= section.start && index < section.end);

const isMetadataExtension = (node: string | ExtensionNode): node is ExtensionNode =>
  typeof node !== 'string' && node['@_point'] === METADATA_POINT;

const readTextNode = (node: TextNode): { lang?: string; text: string } =>
  typeof node === 'string' ? { text: node } : { lang: node['@_lang'], text: node['#text'] ?? '' };

const escapeText = (text: string) => text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const escapeAttribute = (value: string) => escapeText(value).replace(/"/g, '&quot;');

const isBlank = (text: string) => /^[ \t\r]*$/.test(text);

/**
 * Reads and writes the localized summary, description and disclaimer elements of
 * an add-on manifest (`addon.xml`).
 *
 * Reading goes through fast-xml-parser. Writing splices the original text so that
 * everything outside the tracked elements keeps its exact bytes.
 */
export class ManifestHandler implements MetadataFileHandler<ManifestRecord> {
  private parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    trimValues: false,
    htmlEntities: true,
    isArray: (_tagName: string, jPath: string) => ARRAY_PATHS.has(jPath),
  });

  // Elements without a lang attribute belong to this locale
  constructor(private readonly baseLocale: string) {}

  async parse(buffer: Buffer): Promise<ManifestRecord> {
    const xml = buffer.toString('utf-8').replace(/^\uFEFF/, '');

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new Error(`${validation.err.msg} (line ${validation.err.line})`);
    }

    const result = manifestSchema.safeParse(this.parser.parse(xml));
    if (!result.success) {
      throw new Error('Missing <addon> root element');
    }

    const metadata = result.data.addon.extension?.find(isMetadataExtension);
    if (!metadata) {
      throw new Error(`Missing <extension point="${METADATA_POINT}">`);
    }

    const record = emptyManifestRecord();
    for (const field of FIELD_NAMES) {
      for (const node of metadata[field] ?? []) {
        const { lang, text } = readTextNode(node);
        const locale = lang ?? this.baseLocale;
        if (!Object.hasOwn(record[field], locale)) {
          record[field][locale] = text;
        }
      }
    }

    return record;
  }

  async export(options: ExportOptions<ManifestRecord>): Promise<Buffer> {
    const xml = options.originalBuffer.toString('utf-8');
    const eol = xml.includes('\r\n') ? '\r\n' : '\n';
    const sections = findUnparsedSections(xml);

    const open = this.findMetadataOpenTag(xml, sections);
    if (!open) {
      throw new Error(`Missing <extension point="${METADATA_POINT}">`);
    }
    if (open.tag.endsWith('/>')) {
      throw new Error(`<extension point="${METADATA_POINT}"> has no body to update`);
    }

    const bodyStart = open.index + open.tag.length;
    let bodyEnd = xml.indexOf(METADATA_CLOSE_TAG, bodyStart);
    while (bodyEnd >= 0 && isInside(sections, bodyEnd)) {
      bodyEnd = xml.indexOf(METADATA_CLOSE_TAG, bodyEnd + 1);
    }
    if (bodyEnd < 0) {
      throw new Error(`Unclosed <extension point="${METADATA_POINT}">`);
    }

    const { removals, originals } = this.findTrackedElements(xml, bodyStart, bodyEnd, sections);
    const indent =
      removals.find((removal) => removal.indent !== undefined)?.indent ??
      /\r?\n([ \t]*)<(?![/!?])/.exec(xml.slice(bodyStart, bodyEnd))?.[1] ??
      `${this.lineIndent(xml, open.index)}    `;

    const previous = await this.parse(options.originalBuffer);
    const lines = this.renderElements(options.record, previous, originals, indent, eol);

    const edits = removals.map((removal) => ({ start: removal.start, end: removal.end, text: '' }));
    const first = removals[0];
    if (first?.indent !== undefined) {
      edits[0].text = lines;
    } else {
      const closeLineStart = xml.lastIndexOf('\n', bodyEnd - 1) + 1;
      const atLineStart = closeLineStart > bodyStart && isBlank(xml.slice(closeLineStart, bodyEnd));
      const position = atLineStart ? closeLineStart : bodyEnd;
      edits.push({ start: position, end: position, text: atLineStart || !lines ? lines : `${eol}${lines}` });
    }

    let output = '';
    let cursor = 0;
    for (const edit of edits) {
      output += xml.slice(cursor, edit.start) + edit.text;
      cursor = edit.end;
    }
    output += xml.slice(cursor);

    return Buffer.from(output, 'utf-8');
  }

  private findMetadataOpenTag(xml: string, sections: Range[]): { index: number; tag: string } | undefined {
    for (const match of xml.matchAll(METADATA_OPEN_TAG)) {
      const index = match.index ?? 0;
      if (!isInside(sections, index)) return { index, tag: match[0] };
    }
    return undefined;
  }

  private findTrackedElements(
    xml: string,
    bodyStart: number,
    bodyEnd: number,
    sections: Range[],
  ): { removals: Removal[]; originals: OriginalElements } {
    const removals: Removal[] = [];
    const originals: OriginalElements = new Map();

    for (const match of xml.slice(bodyStart, bodyEnd).matchAll(TRACKED_ELEMENT)) {
      const start = bodyStart + (match.index ?? 0);
      if (isInside(sections, start)) continue;
      const end = start + match[0].length;

      const lang = LANG_ATTRIBUTE.exec(match[2]);
      const key = elementKey(match[1], lang ? lang[1] ?? lang[2] : this.baseLocale);
      if (!originals.has(key)) {
        originals.set(key, match[0]);
      }

      const lineStart = xml.lastIndexOf('\n', start - 1) + 1;
      const newline = xml.indexOf('\n', end);
      const lineEnd = newline < 0 ? xml.length : newline;
      const leading = xml.slice(lineStart, start);

      if (lineStart >= bodyStart && isBlank(leading) && isBlank(xml.slice(end, lineEnd))) {
        removals.push({ start: lineStart, end: newline < 0 ? lineEnd : newline + 1, indent: leading });
      } else {
        removals.push({ start, end });
      }
    }
    return { removals, originals };
  }

  private lineIndent(xml: string, index: number): string {
    const lineStart = xml.lastIndexOf('\n', index - 1) + 1;
    return /^[ \t]*/.exec(xml.slice(lineStart, index))?.[0] ?? '';
  }

  private renderElements(
    record: ManifestRecord,
    previous: ManifestRecord,
    originals: OriginalElements,
    indent: string,
    eol: string,
  ): string {
    return FIELD_NAMES.flatMap((field: FieldName) =>
      Object.keys(record[field])
        .sort()
        .map((locale) => {
          const text = record[field][locale];
          const original = originals.get(elementKey(field, locale));
          const unchanged = Object.hasOwn(previous[field], locale) && previous[field][locale] === text;
          const element =
            unchanged && original !== undefined
              ? original
              : `<${field} lang="${escapeAttribute(locale)}">${escapeText(text)}</${field}>`;
          return `${indent}${element}${eol}`;
        }),
    ).join('');
  }
}
