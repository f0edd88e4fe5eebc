import fs from 'fs/promises';
import path from 'path';
import {
  BASE_CATALOG,
  GERMAN_CATALOG,
  MANIFEST,
  catalogPath,
  makeTempDir,
  readText,
  writeAddon,
} from '../../__tests__/fixtures';
import { resolveSyncConfig } from '../../utils/syncConfig';
import { runSync, syncAddon } from '../addon.service';

const GERMAN_WITH_DISCLAIMER = GERMAN_CATALOG.replace(
  'msgid "Does things & more."\nmsgstr ""\n',
  'msgid "Does things & more."\nmsgstr ""\n\nmsgctxt "Addon Disclaimer"\nmsgid "Use at your own risk."\nmsgstr ""\n',
);

const MANIFEST_WITH_GERMAN = MANIFEST.replace(
  '        <summary lang="en_GB">A tool.</summary>\n',
  '        <summary lang="de_DE">Ein Werkzeug.</summary>\n        <summary lang="en_GB">A tool.</summary>\n',
);

describe('addon service', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const writeExampleAddon = (addonDir: string) =>
    writeAddon(addonDir, { manifest: MANIFEST, catalogs: { en_gb: BASE_CATALOG, de_de: GERMAN_CATALOG } });

  describe('syncAddon', () => {
    it('writes manifest values into the catalogs', async () => {
      await writeExampleAddon(root);

      const result = await syncAddon(root, resolveSyncConfig({ path: root, direction: 'xml-to-po' }));

      expect(result).toEqual({
        addonDir: root,
        status: 'synced',
        manifestUpdated: false,
        catalogsUpdated: [catalogPath(root, 'de_de')],
      });
      expect(await readText(catalogPath(root, 'de_de'))).toBe(GERMAN_WITH_DISCLAIMER);
      expect(await readText(catalogPath(root, 'en_gb'))).toBe(BASE_CATALOG);
      expect(await readText(path.join(root, 'addon.xml'))).toBe(MANIFEST);
    });

    it('writes catalog translations into the manifest', async () => {
      await writeExampleAddon(root);

      const result = await syncAddon(root, resolveSyncConfig({ path: root, direction: 'po-to-xml' }));

      expect(result).toEqual({ addonDir: root, status: 'synced', manifestUpdated: true, catalogsUpdated: [] });
      expect(await readText(path.join(root, 'addon.xml'))).toBe(MANIFEST_WITH_GERMAN);
      expect(await readText(catalogPath(root, 'de_de'))).toBe(GERMAN_CATALOG);
    });

    it('runs both directions by default and is stable on a second run', async () => {
      await writeExampleAddon(root);
      const config = resolveSyncConfig({ path: root });

      const first = await syncAddon(root, config);
      const second = await syncAddon(root, config);

      expect(first.manifestUpdated).toBe(true);
      expect(first.catalogsUpdated).toEqual([catalogPath(root, 'de_de')]);
      expect(second).toEqual({ addonDir: root, status: 'synced', manifestUpdated: false, catalogsUpdated: [] });
      expect(await readText(path.join(root, 'addon.xml'))).toBe(MANIFEST_WITH_GERMAN);
      expect(await readText(catalogPath(root, 'de_de'))).toBe(GERMAN_WITH_DISCLAIMER);
    });

    it('keeps the base locale text when its catalog says otherwise', async () => {
      await writeAddon(root, {
        manifest: MANIFEST,
        catalogs: { en_gb: BASE_CATALOG.replace('msgid "A tool."', 'msgid "Another tool."') },
      });

      await syncAddon(root, resolveSyncConfig({ path: root, direction: 'po-to-xml' }));

      expect(await readText(path.join(root, 'addon.xml'))).toBe(MANIFEST);
    });

    it('keeps the file mode of rewritten files', async () => {
      await writeExampleAddon(root);
      await fs.chmod(catalogPath(root, 'de_de'), 0o640);

      await syncAddon(root, resolveSyncConfig({ path: root, direction: 'xml-to-po' }));

      expect((await fs.stat(catalogPath(root, 'de_de'))).mode & 0o777).toBe(0o640);
      expect(await fs.readdir(path.dirname(catalogPath(root, 'de_de')))).toEqual(['strings.po']);
    });

    it('fails with WriteError when a changed file is not writable', async () => {
      await writeExampleAddon(root);
      const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      const access = jest.spyOn(fs, 'access').mockRejectedValueOnce(denied);

      try {
        await expect(syncAddon(root, resolveSyncConfig({ path: root, direction: 'xml-to-po' }))).rejects.toMatchObject({
          kind: 'WriteError',
          path: catalogPath(root, 'de_de'),
          message: `Failed to write ${catalogPath(root, 'de_de')}: EACCES: permission denied`,
        });
      } finally {
        access.mockRestore();
      }
      expect(await readText(catalogPath(root, 'de_de'))).toBe(GERMAN_CATALOG);
    });

    it('skips an add-on without catalogs', async () => {
      await writeAddon(root, { manifest: MANIFEST });

      const result = await syncAddon(root, resolveSyncConfig({ path: root }));

      expect(result).toEqual({ addonDir: root, status: 'skipped', manifestUpdated: false, catalogsUpdated: [] });
    });

    it('fails when the base catalog is missing', async () => {
      await writeAddon(root, { manifest: MANIFEST, catalogs: { de_de: GERMAN_CATALOG } });

      await expect(syncAddon(root, resolveSyncConfig({ path: root }))).rejects.toMatchObject({
        kind: 'MissingBaseCatalog',
        message: `No en_GB catalog found in ${root}`,
      });
    });

    it('fails on a malformed catalog without writing anything', async () => {
      await writeAddon(root, {
        manifest: MANIFEST,
        catalogs: { en_gb: BASE_CATALOG, de_de: 'msgid "broken\n' },
      });

      await expect(syncAddon(root, resolveSyncConfig({ path: root }))).rejects.toMatchObject({
        kind: 'ParseError',
        path: catalogPath(root, 'de_de'),
      });
      expect(await readText(path.join(root, 'addon.xml'))).toBe(MANIFEST);
    });

    it('fails on a malformed manifest', async () => {
      await writeAddon(root, { manifest: '<addon>', catalogs: { en_gb: BASE_CATALOG } });

      await expect(syncAddon(root, resolveSyncConfig({ path: root }))).rejects.toMatchObject({
        kind: 'ParseError',
        path: path.join(root, 'addon.xml'),
      });
    });
  });

  describe('runSync', () => {
    it('continues with the next add-on when one fails', async () => {
      const broken = path.join(root, 'plugin.broken');
      const good = path.join(root, 'plugin.good');
      await writeAddon(broken, { catalogs: { en_gb: BASE_CATALOG } });
      await writeExampleAddon(good);

      const report = await runSync(resolveSyncConfig({ path: root, multipleAddons: true }));

      expect(report.failures).toHaveLength(1);
      expect(report.failures[0].addonDir).toBe(broken);
      expect(report.failures[0].error.kind).toBe('MissingManifest');
      expect(report.results).toEqual([
        { addonDir: good, status: 'synced', manifestUpdated: true, catalogsUpdated: [catalogPath(good, 'de_de')] },
      ]);
      expect(await readText(path.join(good, 'addon.xml'))).toBe(MANIFEST_WITH_GERMAN);
    });

    it('syncs the configured path alone without multipleAddons', async () => {
      await writeExampleAddon(root);

      const report = await runSync(resolveSyncConfig({ path: root, direction: 'xml-to-po' }));

      expect(report.failures).toEqual([]);
      expect(report.results.map((result) => result.addonDir)).toEqual([root]);
    });
  });
});
