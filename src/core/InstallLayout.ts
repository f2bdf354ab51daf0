import * as path from 'path';
import { Version } from './version/Version';
import { InstalledInterpreter, VirtualenvInfo } from '../types/Runtime';
import { PyroostSettings } from '../types/Config';
import { InvalidProjectError, InvalidVersionError } from '../types/Errors';
import { FileSystem } from '../utils/FileSystem';
import { targetTriple } from '../utils/PlatformPaths';

export interface LayoutContext {
  dataDir: string;
  cacheDir: string;
  /** Platform target triple, e.g. x86_64-unknown-linux-gnu */
  target: string;
}

function assertProjectName(project: string): void {
  if (
    project === '' ||
    project === '.' ||
    project === '..' ||
    /[/\\]/.test(project) ||
    path.basename(project) !== project
  ) {
    throw new InvalidProjectError(project);
  }
}

/**
 * Canonical on-disk locations. Directory existence is the only record of
 * what is installed.
 */
export class InstallLayout {
  constructor(readonly context: LayoutContext) {}

  static fromSettings(settings: PyroostSettings, target: string = targetTriple()): InstallLayout {
    return new InstallLayout({
      dataDir: settings.dataDir,
      cacheDir: settings.cacheDir,
      target,
    });
  }

  get pythonsDir(): string {
    return path.join(this.context.dataDir, 'pythons');
  }

  get virtualenvsDir(): string {
    return path.join(this.context.dataDir, 'virtualenvs');
  }

  installedDir(version: Version): string {
    return path.join(this.pythonsDir, version.toString());
  }

  downloadsDir(): string {
    return path.join(this.context.cacheDir, 'downloads');
  }

  venvDir(project: string, version: Version): string {
    assertProjectName(project);
    return path.join(this.virtualenvsDir, project, version.toString());
  }

  async isInstalled(version: Version): Promise<boolean> {
    return FileSystem.pathExists(this.installedDir(version));
  }

  async hasVenv(project: string, version: Version): Promise<boolean> {
    return FileSystem.pathExists(this.venvDir(project, version));
  }

  /**
   * Archives unpack under a single top-level directory; the interpreter sits
   * in its bin/.
   */
  async interpreterPath(version: Version): Promise<string> {
    const root = await FileSystem.firstEntry(this.installedDir(version));
    return path.join(root, 'bin', 'python3');
  }

  async listInstalled(): Promise<InstalledInterpreter[]> {
    const names = await FileSystem.listDir(this.pythonsDir);
    const installed: InstalledInterpreter[] = [];

    for (const name of names) {
      try {
        const version = Version.parse(name);
        installed.push({ version, path: this.installedDir(version) });
      } catch (error) {
        // staging directories and stray files
        if (!(error instanceof InvalidVersionError)) throw error;
      }
    }

    return installed.sort((a, b) => Version.compare(a.version, b.version));
  }

  async listVirtualenvs(): Promise<VirtualenvInfo[]> {
    const venvs: VirtualenvInfo[] = [];

    for (const project of await FileSystem.listDir(this.virtualenvsDir)) {
      for (const version of await FileSystem.listDir(path.join(this.virtualenvsDir, project))) {
        venvs.push({ project, version, path: path.join(this.virtualenvsDir, project, version) });
      }
    }

    return venvs;
  }
}
