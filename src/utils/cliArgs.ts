import { parseArgs } from 'util';
import { describeCause, SyncError } from './syncError';
import { resolveSyncConfig, type SyncConfig, type SyncDirection } from './syncConfig';

// Single-dash spellings accepted by earlier releases of the tool
const LEGACY_FLAGS = new Map([
  ['-ptx', '--po-to-xml'],
  ['-xtp', '--xml-to-po'],
  ['-path', '--path'],
  ['-multi', '--multiple-addons'],
]);

const OPTIONS = {
  'po-to-xml': { type: 'boolean' },
  'xml-to-po': { type: 'boolean' },
  path: { type: 'string' },
  'multiple-addons': { type: 'boolean' },
  'base-locale': { type: 'string' },
  'empty-as-translated': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

export const USAGE = `Usage: sync-addon-metadata [options]

Sync the summary, description and disclaimer of Kodi add-ons between
addon.xml and the resource.language.* strings.po catalogs.

Options:
  -ptx, --po-to-xml        Sync catalog values into addon.xml
  -xtp, --xml-to-po        Sync addon.xml values into every catalog
  -path, --path [dir]      Working directory (default: current directory)
  -multi, --multiple-addons
                           Treat each subdirectory of the working directory as an add-on
  --base-locale <code>     Locale of the source text (default: en_GB)
  --empty-as-translated    Copy empty translations instead of treating them as untranslated
  -h, --help               Show this help

Without --po-to-xml or --xml-to-po both directions run, catalogs first.
`;

export type CliCommand = { kind: 'help' } | { kind: 'sync'; config: SyncConfig };

const readArgs = (args: string[]) => {
  try {
    return parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw SyncError.invalidArguments(describeCause(error));
  }
};

const normalizeArgs = (argv: string[]): string[] =>
  argv.map((arg, index) => {
    const name = LEGACY_FLAGS.get(arg) ?? arg;
    const next = argv[index + 1];
    // --path without a value means the current directory
    if (name === '--path' && (next === undefined || next.startsWith('-'))) return '--path=.';
    return name;
  });

export const parseCommandLine = (argv: string[]): CliCommand => {
  const values = readArgs(normalizeArgs(argv));

  if (values.help) {
    return { kind: 'help' };
  }

  if (values['po-to-xml'] && values['xml-to-po']) {
    throw SyncError.invalidArguments('--po-to-xml and --xml-to-po cannot be used together');
  }

  const direction: SyncDirection = values['po-to-xml'] ? 'po-to-xml' : values['xml-to-po'] ? 'xml-to-po' : 'both';

  return {
    kind: 'sync',
    config: resolveSyncConfig({
      direction,
      path: values.path,
      multipleAddons: values['multiple-addons'],
      baseLocale: values['base-locale'],
      emptyTranslation: values['empty-as-translated'] ? 'translated' : undefined,
    }),
  };
};
