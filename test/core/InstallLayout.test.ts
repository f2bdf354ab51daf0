import * as fs from 'fs-extra';
import * as path from 'path';
import { InstallLayout } from '../../src/core/InstallLayout';
import { Version } from '../../src/core/version/Version';
import { FilesystemError, InvalidProjectError } from '../../src/types/Errors';
import { cleanupTempDir, createTempDir } from '../setup';

describe('InstallLayout', () => {
  let tempDir: string;
  let layout: InstallLayout;

  beforeEach(async () => {
    tempDir = await createTempDir();
    layout = new InstallLayout({
      dataDir: path.join(tempDir, 'data'),
      cacheDir: path.join(tempDir, 'cache'),
      target: 'x86_64-unknown-linux-gnu',
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('paths', () => {
    it('should key installs by the version display form', () => {
      expect(layout.installedDir(Version.parse('3.11'))).toBe(
        path.join(tempDir, 'data', 'pythons', '3.11')
      );
      expect(layout.installedDir(Version.parse('pypy3.9'))).toBe(
        path.join(tempDir, 'data', 'pythons', 'pypy3.9')
      );
    });

    it('should keep downloads under the cache dir', () => {
      expect(layout.downloadsDir()).toBe(path.join(tempDir, 'cache', 'downloads'));
    });

    it('should nest virtualenvs by project and version', () => {
      expect(layout.venvDir('webapp', Version.parse('3.12.1'))).toBe(
        path.join(tempDir, 'data', 'virtualenvs', 'webapp', '3.12.1')
      );
    });
  });

  describe('project names', () => {
    it.each(['', '.', '..', '../pythons', 'a/b', 'a\\b', '/abs'])(
      'should reject %j',
      project => {
        expect(() => layout.venvDir(project, Version.parse('3.11'))).toThrow(InvalidProjectError);
      }
    );

    it('should accept dotted and dashed names', () => {
      expect(layout.venvDir('my-app.v2', Version.parse('3.11'))).toBe(
        path.join(tempDir, 'data', 'virtualenvs', 'my-app.v2', '3.11')
      );
    });

    it('should guard existence checks too', async () => {
      await expect(layout.hasVenv('..', Version.parse('3.11'))).rejects.toThrow(
        "Invalid project name '..': use a single directory name"
      );
    });
  });

  describe('isInstalled', () => {
    it('should be true only once the directory exists', async () => {
      const version = Version.parse('3.11');
      expect(await layout.isInstalled(version)).toBe(false);

      await fs.ensureDir(layout.installedDir(version));

      expect(await layout.isInstalled(version)).toBe(true);
      expect(await layout.isInstalled(Version.parse('3.11.4'))).toBe(false);
    });
  });

  describe('interpreterPath', () => {
    it('should look inside the single top-level entry', async () => {
      const version = Version.parse('3.11');
      await fs.ensureDir(path.join(layout.installedDir(version), 'python', 'bin'));

      expect(await layout.interpreterPath(version)).toBe(
        path.join(layout.installedDir(version), 'python', 'bin', 'python3')
      );
    });

    it('should fail when nothing is installed', async () => {
      await expect(layout.interpreterPath(Version.parse('3.9'))).rejects.toThrow(FilesystemError);
    });
  });

  describe('listInstalled', () => {
    it('should list parsable install directories in version order', async () => {
      for (const name of ['pypy3.9', '3.11', '3.8.16', '3.11.tmp', 'notes']) {
        await fs.ensureDir(path.join(layout.pythonsDir, name));
      }

      const installed = await layout.listInstalled();

      expect(installed.map(entry => entry.version.toString())).toEqual(['3.8.16', '3.11', 'pypy3.9']);
      expect(installed[1].path).toBe(path.join(layout.pythonsDir, '3.11'));
    });

    it('should be empty before anything is installed', async () => {
      expect(await layout.listInstalled()).toEqual([]);
    });
  });

  describe('listVirtualenvs', () => {
    it('should list every project and version', async () => {
      await fs.ensureDir(layout.venvDir('webapp', Version.parse('3.11')));
      await fs.ensureDir(layout.venvDir('webapp', Version.parse('pypy3.9')));
      await fs.ensureDir(layout.venvDir('cli', Version.parse('3.12')));

      expect(await layout.listVirtualenvs()).toEqual([
        { project: 'cli', version: '3.12', path: path.join(layout.virtualenvsDir, 'cli', '3.12') },
        { project: 'webapp', version: '3.11', path: path.join(layout.virtualenvsDir, 'webapp', '3.11') },
        {
          project: 'webapp',
          version: 'pypy3.9',
          path: path.join(layout.virtualenvsDir, 'webapp', 'pypy3.9'),
        },
      ]);
    });
  });
});
