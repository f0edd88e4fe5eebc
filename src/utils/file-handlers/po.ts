export type PoEntry = {
  msgctxt?: string;
  msgid: string;
  msgstr: string;
  plural: boolean;
  start: number; // first keyword line, comments above it excluded
  end: number; // line after the last string of the entry
};

type StringKey = 'msgctxt' | 'msgid' | 'msgstr';

type DraftEntry = Partial<Record<StringKey, string>> & {
  plural: boolean;
  start: number;
  end: number;
};

const KEYWORD_LINE = /^(msgctxt|msgid_plural|msgid|msgstr(?:\[\d+\])?)\s+(.*)$/;
const STRING_LITERAL = /^"((?:[^"\\]|\\.)*)"\s*$/;

const UNESCAPES = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['a', '\x07'],
  ['b', '\b'],
  ['f', '\f'],
  ['v', '\v'],
]);

export const unescapePoString = (value: string): string =>
  value.replace(/\\(.)/g, (_, char: string) => UNESCAPES.get(char) ?? char);

export const escapePoString = (value: string): string =>
  value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');

/**
 * Renders `keyword "value"`. Values with a newline before their last character use
 * the multi-line form gettext tools write: an empty first string, then one string
 * per line.
 */
export const formatPoString = (keyword: string, value: string): string[] => {
  const newline = value.indexOf('\n');
  if (newline < 0 || newline === value.length - 1) {
    return [`${keyword} "${escapePoString(value)}"`];
  }
  return [`${keyword} ""`, ...value.split(/(?<=\n)/).map((line) => `"${escapePoString(line)}"`)];
};

export const splitLines = (text: string): { eol: string; lines: string[] } => {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  return { eol, lines: text.split(eol) };
};

const readString = (literal: string, lineNumber: number): string => {
  const match = STRING_LITERAL.exec(literal);
  if (!match) {
    throw new Error(`line ${lineNumber}: malformed string ${literal}`);
  }
  return unescapePoString(match[1]);
};

/**
 * Reads the entries of a gettext catalog, keeping the line range of each so that a
 * writer can replace single entries without touching the rest of the file.
 */
export const readPoEntries = (lines: string[]): PoEntry[] => {
  const entries: PoEntry[] = [];
  let current: DraftEntry | undefined;
  let key: StringKey | 'plural' | undefined;

  const finish = () => {
    if (!current) return;
    if (current.msgid === undefined) {
      throw new Error(`line ${current.start + 1}: entry has no msgid`);
    }
    if (current.msgstr === undefined && !current.plural) {
      throw new Error(`line ${current.start + 1}: entry has no msgstr`);
    }
    entries.push({
      msgctxt: current.msgctxt,
      msgid: current.msgid,
      msgstr: current.msgstr ?? '',
      plural: current.plural,
      start: current.start,
      end: current.end,
    });
    current = undefined;
    key = undefined;
  };

  lines.forEach((raw, index) => {
    const line = raw.trim();
    const lineNumber = index + 1;

    // blank lines and comments close the entry above them
    if (!line || line.startsWith('#')) {
      finish();
      return;
    }

    const keyword = KEYWORD_LINE.exec(line);
    if (keyword) {
      const [, name, literal] = keyword;
      const value = readString(literal, lineNumber);

      if (current && (name === 'msgctxt' || (name === 'msgid' && current.msgid !== undefined))) {
        finish();
      }
      if (!current) {
        if (name !== 'msgctxt' && name !== 'msgid') {
          throw new Error(`line ${lineNumber}: ${name} without msgid`);
        }
        current = { plural: false, start: index, end: index + 1 };
      }

      if (name === 'msgctxt' || name === 'msgid' || name === 'msgstr') {
        current[name] = value;
        key = name;
      } else {
        current.plural = true;
        key = 'plural';
      }
      current.end = index + 1;
      return;
    }

    if (line.startsWith('"')) {
      if (!current || !key) {
        throw new Error(`line ${lineNumber}: string outside of an entry`);
      }
      const value = readString(line, lineNumber);
      if (key !== 'plural') {
        current[key] = (current[key] ?? '') + value;
      }
      current.end = index + 1;
      return;
    }

    throw new Error(`line ${lineNumber}: unexpected content ${line}`);
  });

  finish();
  return entries;
};
