import * as fs from 'fs-extra';
import * as path from 'path';
import { DownloadCache } from '../../src/core/DownloadCache';
import { EnvironmentProvisioner } from '../../src/core/EnvironmentProvisioner';
import { InstallLayout } from '../../src/core/InstallLayout';
import { InterpreterManager } from '../../src/core/InterpreterManager';
import { Version } from '../../src/core/version/Version';
import { InterpreterFamily, Release, ReleaseProvider } from '../../src/types/Runtime';
import {
  EnvironmentCreationError,
  FilesystemError,
  InvalidProjectError,
  ProviderParseError,
  VersionNotFoundError,
} from '../../src/types/Errors';
import { ProcessUtils } from '../../src/utils/ProcessUtils';
import {
  FIXTURES_DIR,
  cleanupTempDir,
  createCPythonArchive,
  createTempDir,
  makeRelease,
  mockFetch,
} from '../setup';

jest.mock('../../src/utils/ProcessUtils');

const PYPY_ARCHIVE = 'pypy3.9-v7.3.11-linux64.tar.bz2';

const fakeProvider = (family: InterpreterFamily, releases: Release[]) => {
  const list = jest.fn().mockResolvedValue({ releases, failures: [] });
  const provider: ReleaseProvider = { family, list };
  return { provider, list };
};

describe('InterpreterManager', () => {
  let tempDir: string;
  let layout: InstallLayout;
  let archiveBytes: Buffer;

  const cpythonRelease = makeRelease(Version.parse('3.11.4'), '20230726');
  const olderRelease = makeRelease(Version.parse('3.11.1'), '20230116');
  const pypyRelease: Release = {
    displayName: PYPY_ARCHIVE,
    sourceUrl: `https://downloads.python.org/pypy/${PYPY_ARCHIVE}`,
    version: Version.parse('pypy3.9'),
    releaseTag: 'v7.3.11',
  };

  let cpython: ReturnType<typeof fakeProvider>;
  let pypy: ReturnType<typeof fakeProvider>;
  let manager: InterpreterManager;

  beforeEach(async () => {
    tempDir = await createTempDir();
    layout = new InstallLayout({
      dataDir: path.join(tempDir, 'data'),
      cacheDir: path.join(tempDir, 'cache'),
      target: 'x86_64-unknown-linux-gnu',
    });

    const archivePath = path.join(tempDir, 'cpython.tar.gz');
    await createCPythonArchive(tempDir, archivePath);
    archiveBytes = await fs.readFile(archivePath);

    cpython = fakeProvider('cpython', [olderRelease, cpythonRelease]);
    pypy = fakeProvider('pypy', [pypyRelease]);
    manager = new InterpreterManager({
      layout,
      providers: { cpython: cpython.provider, pypy: pypy.provider },
      cache: new DownloadCache({ verifyChecksums: true }),
      provisioner: new EnvironmentProvisioner(),
    });

    jest.mocked(ProcessUtils.execute).mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });
    jest.mocked(ProcessUtils.interactive).mockResolvedValue(0);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    jest.clearAllMocks();
    await cleanupTempDir(tempDir);
  });

  describe('ensureInstalled', () => {
    it('should download and unpack the newest compatible release', async () => {
      mockFetch({ [cpythonRelease.sourceUrl]: () => new Response(archiveBytes) });

      const installedDir = await manager.ensureInstalled(Version.parse('3.11'));

      expect(installedDir).toBe(path.join(tempDir, 'data', 'pythons', '3.11'));
      expect(await fs.readFile(path.join(installedDir, 'python', 'README'), 'utf8')).toBe(
        'CPython test fixture\n'
      );
      expect(await fs.readdir(layout.downloadsDir())).toEqual([cpythonRelease.displayName]);
      expect(pypy.list).not.toHaveBeenCalled();
    });

    it('should not touch providers or the network once installed', async () => {
      const fetchSpy = mockFetch({ [cpythonRelease.sourceUrl]: () => new Response(archiveBytes) });
      await manager.ensureInstalled(Version.parse('3.11'));
      fetchSpy.mockClear();
      cpython.list.mockClear();

      const installedDir = await manager.ensureInstalled(Version.parse('3.11'));

      expect(installedDir).toBe(layout.installedDir(Version.parse('3.11')));
      expect(fetchSpy).not.toHaveBeenCalled();
      expect(cpython.list).not.toHaveBeenCalled();
    });

    it('should reuse a cached archive for a different request', async () => {
      const fetchSpy = mockFetch({ [cpythonRelease.sourceUrl]: () => new Response(archiveBytes) });
      await manager.ensureInstalled(Version.parse('3.11'));

      await manager.ensureInstalled(Version.parse('3.11.4'));

      expect(fetchSpy).toHaveBeenCalledTimes(1);
      expect(await layout.isInstalled(Version.parse('3.11.4'))).toBe(true);
    });

    it('should install PyPy from its bzip2 archive', async () => {
      const bytes = await fs.readFile(path.join(FIXTURES_DIR, PYPY_ARCHIVE));
      mockFetch({ [pypyRelease.sourceUrl]: () => new Response(bytes) });

      const installedDir = await manager.ensureInstalled(Version.parse('pypy3.9'));

      expect(await fs.readdir(installedDir)).toEqual(['pypy3.9-v7.3.11-linux64']);
      expect(cpython.list).not.toHaveBeenCalled();
    });

    it('should fail without side effects when nothing matches', async () => {
      const fetchSpy = mockFetch({});

      await expect(manager.ensureInstalled(Version.parse('3.12'))).rejects.toThrow(
        new VersionNotFoundError('3.12')
      );
      expect(fetchSpy).not.toHaveBeenCalled();
      expect(await layout.isInstalled(Version.parse('3.12'))).toBe(false);
    });
  });

  describe('ensureVenv', () => {
    it('should run the installed interpreter with -m venv', async () => {
      mockFetch({ [cpythonRelease.sourceUrl]: () => new Response(archiveBytes) });
      const version = Version.parse('3.11');

      const venvDir = await manager.ensureVenv(version, 'webapp');

      expect(venvDir).toBe(path.join(tempDir, 'data', 'virtualenvs', 'webapp', '3.11'));
      expect(ProcessUtils.execute).toHaveBeenCalledWith(
        path.join(layout.installedDir(version), 'python', 'bin', 'python3'),
        ['-m', 'venv', venvDir]
      );
    });

    it('should skip creation when the virtualenv exists', async () => {
      const version = Version.parse('3.11');
      await fs.ensureDir(layout.venvDir('webapp', version));

      const venvDir = await manager.ensureVenv(version, 'webapp');

      expect(venvDir).toBe(layout.venvDir('webapp', version));
      expect(ProcessUtils.execute).not.toHaveBeenCalled();
      expect(cpython.list).not.toHaveBeenCalled();
    });

    it('should surface the interpreter stderr on failure', async () => {
      mockFetch({ [cpythonRelease.sourceUrl]: () => new Response(archiveBytes) });
      const version = Version.parse('3.11');
      jest.mocked(ProcessUtils.execute).mockImplementation(async () => {
        // venv lays down the directory before ensurepip fails
        await fs.ensureDir(layout.venvDir('webapp', version));
        return { stdout: '', stderr: 'ensurepip is not available', exitCode: 1 };
      });

      const promise = manager.ensureVenv(version, 'webapp');

      await expect(promise).rejects.toBeInstanceOf(EnvironmentCreationError);
      await expect(promise).rejects.toMatchObject({
        exitCode: 1,
        stderr: 'ensurepip is not available',
      });
      expect(await layout.hasVenv('webapp', version)).toBe(false);
    });

    it('should retry creation after a failed attempt', async () => {
      mockFetch({ [cpythonRelease.sourceUrl]: () => new Response(archiveBytes) });
      const version = Version.parse('3.11');
      const venvDir = layout.venvDir('webapp', version);
      jest
        .mocked(ProcessUtils.execute)
        .mockImplementationOnce(async () => {
          await fs.ensureDir(venvDir);
          return { stdout: '', stderr: 'ensurepip is not available', exitCode: 1 };
        })
        .mockResolvedValueOnce({ stdout: '', stderr: '', exitCode: 0 });

      await expect(manager.ensureVenv(version, 'webapp')).rejects.toBeInstanceOf(
        EnvironmentCreationError
      );
      await manager.ensureVenv(version, 'webapp');

      expect(ProcessUtils.execute).toHaveBeenCalledTimes(2);
    });

    it('should reject project names that are not a single directory', async () => {
      await expect(manager.ensureVenv(Version.parse('3.11'), '../escape')).rejects.toBeInstanceOf(
        InvalidProjectError
      );
      expect(cpython.list).not.toHaveBeenCalled();
      expect(ProcessUtils.execute).not.toHaveBeenCalled();
    });
  });

  describe('activationEnvironment', () => {
    const version = Version.parse('3.11');

    beforeEach(async () => {
      await fs.ensureDir(layout.venvDir('webapp', version));
    });

    it('should point the environment at the virtualenv', async () => {
      const venvDir = layout.venvDir('webapp', version);

      const env = await manager.activationEnvironment(version, 'webapp', {
        PATH: '/usr/bin:/bin',
        HOME: '/home/dev',
      });

      expect(env).toEqual({
        PATH: `${path.join(venvDir, 'bin')}:/usr/bin:/bin`,
        HOME: '/home/dev',
        VIRTUAL_ENV: venvDir,
        VIRTUAL_ENV_PROMPT: 'webapp (3.11) ',
        TERMINFO_DIRS: '/etc/terminfo:/lib/terminfo:/usr/share/terminfo',
      });
    });

    it('should use the bin directory alone when PATH is unset', async () => {
      const env = await manager.activationEnvironment(version, 'webapp', {});

      expect(env.PATH).toBe(path.join(layout.venvDir('webapp', version), 'bin'));
    });

    it('should start bash with that environment', async () => {
      jest.mocked(ProcessUtils.interactive).mockResolvedValue(3);

      const exitCode = await manager.activate(version, 'webapp');

      expect(exitCode).toBe(3);
      expect(ProcessUtils.interactive).toHaveBeenCalledWith(
        'bash',
        [],
        expect.objectContaining({ VIRTUAL_ENV: layout.venvDir('webapp', version) })
      );
    });
  });

  describe('listAvailable', () => {
    it('should merge both providers sorted by version', async () => {
      const failure = new ProviderParseError('pypy-nightly.tar.bz2', 'no version');
      pypy.list.mockResolvedValue({ releases: [pypyRelease], failures: [failure] });

      const { releases, failures } = await manager.listAvailable();

      expect(releases.map(release => release.version.toString())).toEqual([
        '3.11.1',
        '3.11.4',
        'pypy3.9',
      ]);
      expect(failures).toEqual([failure]);
    });
  });

  describe('uninstall', () => {
    it('should remove the install directory', async () => {
      const version = Version.parse('3.10');
      await fs.ensureDir(path.join(layout.installedDir(version), 'python'));

      const removed = await manager.uninstall(version);

      expect(removed).toBe(layout.installedDir(version));
      expect(await fs.pathExists(removed)).toBe(false);
    });

    it('should fail when the version is not installed', async () => {
      await expect(manager.uninstall(Version.parse('3.10'))).rejects.toThrow(
        'Python 3.10 is not installed'
      );
    });
  });

  describe('removeVirtualenv', () => {
    it('should remove only the requested virtualenv', async () => {
      await fs.ensureDir(layout.venvDir('webapp', Version.parse('3.11')));
      await fs.ensureDir(layout.venvDir('webapp', Version.parse('3.12')));

      await manager.removeVirtualenv('webapp', Version.parse('3.11'));

      expect(await manager.listVirtualenvs()).toEqual([
        { project: 'webapp', version: '3.12', path: layout.venvDir('webapp', Version.parse('3.12')) },
      ]);
    });

    it('should refuse a project name that escapes the virtualenvs dir', async () => {
      const version = Version.parse('3.11');
      await fs.ensureDir(path.join(layout.installedDir(version), 'python', 'bin'));

      await expect(manager.removeVirtualenv('../pythons', version)).rejects.toBeInstanceOf(
        InvalidProjectError
      );
      expect(await layout.isInstalled(version)).toBe(true);
    });

    it('should fail when the virtualenv does not exist', async () => {
      await expect(manager.removeVirtualenv('webapp', Version.parse('3.11'))).rejects.toBeInstanceOf(
        FilesystemError
      );
    });
  });
});
