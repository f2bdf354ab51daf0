// src/core/InterpreterManager.ts - Resolve, download, install and provision interpreters
import * as path from 'path';
import { Version } from './version/Version';
import { InstallLayout } from './InstallLayout';
import { DownloadCache } from './DownloadCache';
import { archiveFormatFor, extractArchive } from './ArchiveExtractor';
import { EnvironmentProvisioner, TERMINFO_DIRS } from './EnvironmentProvisioner';
import { resolveRelease, sortReleases } from './VersionMatcher';
import { CPythonReleaseProvider } from './providers/CPythonReleaseProvider';
import { PyPyReleaseProvider } from './providers/PyPyReleaseProvider';
import {
  InstalledInterpreter,
  InterpreterFamily,
  ProviderListing,
  ReleaseProvider,
  VirtualenvInfo,
} from '../types/Runtime';
import { PyroostSettings } from '../types/Config';
import { FilesystemError } from '../types/Errors';
import { FileSystem } from '../utils/FileSystem';
import { HttpClient } from '../utils/HttpClient';
import { logger } from '../utils/Logger';

export type ProviderSet = Record<InterpreterFamily, ReleaseProvider>;

export interface InterpreterManagerDeps {
  layout: InstallLayout;
  providers: ProviderSet;
  cache: DownloadCache;
  provisioner: EnvironmentProvisioner;
}

export class InterpreterManager {
  readonly layout: InstallLayout;
  private readonly providers: ProviderSet;
  private readonly cache: DownloadCache;
  private readonly provisioner: EnvironmentProvisioner;

  constructor(deps: InterpreterManagerDeps) {
    this.layout = deps.layout;
    this.providers = deps.providers;
    this.cache = deps.cache;
    this.provisioner = deps.provisioner;
  }

  static fromSettings(
    settings: PyroostSettings,
    layout: InstallLayout = InstallLayout.fromSettings(settings)
  ): InterpreterManager {
    const http = new HttpClient();
    const { target } = layout.context;

    return new InterpreterManager({
      layout,
      providers: {
        cpython: new CPythonReleaseProvider(
          {
            repository: settings.cpythonRepository,
            cutoff: settings.releaseCutoff,
            target,
            perPage: settings.releasesPerPage,
          },
          http
        ),
        pypy: new PyPyReleaseProvider(
          {
            indexUrl: settings.pypyIndexUrl,
            downloadPrefix: settings.pypyDownloadPrefix,
            target,
          },
          http
        ),
      },
      cache: new DownloadCache({ verifyChecksums: settings.verifyChecksums }, http),
      provisioner: new EnvironmentProvisioner(),
    });
  }

  /**
   * Make sure an interpreter for `requested` is unpacked and return its
   * directory. The install directory is keyed by the requested version as
   * typed, so `3.11` and `3.11.4` are separate installs even when they
   * resolve to the same build.
   */
  async ensureInstalled(requested: Version): Promise<string> {
    const installedDir = this.layout.installedDir(requested);
    if (await this.layout.isInstalled(requested)) {
      this.log(requested, 'debug', `Already installed at ${installedDir}`);
      return installedDir;
    }

    const { releases } = await this.providers[requested.family].list();
    const release = resolveRelease(requested, releases);
    this.log(requested, 'info', `Resolved to ${release.displayName} (${release.releaseTag})`);

    const archive = await this.cache.ensureCached(release, this.layout.downloadsDir());
    await extractArchive(archive, installedDir, archiveFormatFor(requested.family));

    logger.success(`Installed Python ${requested.toString()} to ${installedDir}`);
    return installedDir;
  }

  async ensureVenv(requested: Version, project: string): Promise<string> {
    const venvDir = this.layout.venvDir(project, requested);
    if (await this.layout.hasVenv(project, requested)) {
      this.log(requested, 'debug', `Virtualenv ${venvDir} already exists`);
      return venvDir;
    }

    await this.ensureInstalled(requested);
    const python = await this.layout.interpreterPath(requested);
    await this.provisioner.createVirtualenv(python, venvDir);

    logger.success(`Created virtualenv ${project} (${requested.toString()})`);
    return venvDir;
  }

  /**
   * Environment for a shell running inside the project's virtualenv.
   */
  async activationEnvironment(
    requested: Version,
    project: string,
    baseEnv: NodeJS.ProcessEnv = process.env
  ): Promise<NodeJS.ProcessEnv> {
    const venvDir = await this.ensureVenv(requested, project);
    const binDir = path.join(venvDir, 'bin');

    return {
      ...baseEnv,
      VIRTUAL_ENV: venvDir,
      VIRTUAL_ENV_PROMPT: `${project} (${requested.toString()}) `,
      PATH: baseEnv.PATH ? `${binDir}:${baseEnv.PATH}` : binDir,
      TERMINFO_DIRS,
    };
  }

  async activate(requested: Version, project: string): Promise<number> {
    const env = await this.activationEnvironment(requested, project);
    return this.provisioner.spawnShell(env);
  }

  /**
   * Every release both providers offer for this platform, sorted by version.
   * Entries that could not be parsed are reported in `failures`.
   */
  async listAvailable(): Promise<ProviderListing> {
    const listing: ProviderListing = { releases: [], failures: [] };

    for (const provider of Object.values(this.providers)) {
      const { releases, failures } = await provider.list();
      listing.releases.push(...releases);
      listing.failures.push(...failures);
    }

    listing.releases = sortReleases(listing.releases);
    return listing;
  }

  async listInstalled(): Promise<InstalledInterpreter[]> {
    return this.layout.listInstalled();
  }

  async listVirtualenvs(): Promise<VirtualenvInfo[]> {
    return this.layout.listVirtualenvs();
  }

  /**
   * Remove an installed interpreter. Virtualenvs created from it are left in
   * place and stop working.
   */
  async uninstall(version: Version): Promise<string> {
    const installedDir = this.layout.installedDir(version);
    if (!(await this.layout.isInstalled(version))) {
      throw new FilesystemError(installedDir, `Python ${version.toString()} is not installed`);
    }

    await FileSystem.remove(installedDir);
    this.log(version, 'info', `Removed ${installedDir}`);
    return installedDir;
  }

  async removeVirtualenv(project: string, version: Version): Promise<string> {
    const venvDir = this.layout.venvDir(project, version);
    if (!(await this.layout.hasVenv(project, version))) {
      throw new FilesystemError(
        venvDir,
        `No virtualenv for ${project} with Python ${version.toString()}`
      );
    }

    await FileSystem.remove(venvDir);
    this.log(version, 'info', `Removed virtualenv ${venvDir}`);
    return venvDir;
  }

  private log(version: Version, level: 'debug' | 'info' | 'warn', message: string): void {
    logger[level](`[${version.toString()}] ${message}`);
  }
}
