import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export const MANIFEST = [
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
  '<addon id="plugin.video.example" name="Example" version="1.0.0" provider-name="tester">',
  '    <requires>',
  '        <import addon="xbmc.python" version="3.0.0"/>',
  '    </requires>',
  '    <extension point="xbmc.python.pluginsource" library="default.py">',
  '        <provides>video</provides>',
  '    </extension>',
  '    <extension point="xbmc.addon.metadata">',
  '        <summary lang="en_GB">A tool.</summary>',
  '        <description lang="en_GB">Does things &amp; more.</description>',
  '        <disclaimer lang="en_GB">Use at your own risk.</disclaimer>',
  '        <platform>all</platform>',
  '        <license>GPL-2.0-only</license>',
  '    </extension>',
  '</addon>',
  '',
].join('\n');

export const BASE_CATALOG = [
  '# Kodi Media Center language file',
  'msgid ""',
  'msgstr ""',
  '"Project-Id-Version: Example\\n"',
  '"Language: en_GB\\n"',
  '',
  'msgctxt "Addon Summary"',
  'msgid "A tool."',
  'msgstr ""',
  '',
  'msgctxt "Addon Description"',
  'msgid "Does things & more."',
  'msgstr ""',
  '',
  'msgctxt "Addon Disclaimer"',
  'msgid "Use at your own risk."',
  'msgstr ""',
  '',
  'msgctxt "#30000"',
  'msgid "Settings"',
  'msgstr ""',
  '',
].join('\n');

export const GERMAN_CATALOG = [
  '# Kodi Media Center language file',
  'msgid ""',
  'msgstr ""',
  '"Project-Id-Version: Example\\n"',
  '"Language: de_DE\\n"',
  '',
  'msgctxt "Addon Summary"',
  'msgid "A tool."',
  'msgstr "Ein Werkzeug."',
  '',
  'msgctxt "Addon Description"',
  'msgid "Does things & more."',
  'msgstr ""',
  '',
  'msgctxt "#30000"',
  'msgid "Settings"',
  'msgstr "Einstellungen"',
  '',
].join('\n');

export type AddonFiles = {
  manifest?: string;
  catalogs?: Record<string, string>; // directory suffix, e.g. en_gb
};

export const makeTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), 'addon-metadata-sync-'));

export const catalogPath = (addonDir: string, code: string) =>
  path.join(addonDir, 'resources', 'language', `resource.language.${code}`, 'strings.po');

export const writeAddon = async (addonDir: string, files: AddonFiles): Promise<void> => {
  await fs.mkdir(addonDir, { recursive: true });
  if (files.manifest !== undefined) {
    await fs.writeFile(path.join(addonDir, 'addon.xml'), files.manifest, 'utf-8');
  }
  for (const [code, content] of Object.entries(files.catalogs ?? {})) {
    const filePath = catalogPath(addonDir, code);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
};

export const readText = (filePath: string) => fs.readFile(filePath, 'utf-8');
