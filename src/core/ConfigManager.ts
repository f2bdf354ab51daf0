import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { PyroostConfigFile, PyroostSettings } from '../types/Config';
import { FilesystemError, errorMessage } from '../types/Errors';
import { isLogLevel } from '../utils/Logger';
import { PlatformInfo, currentPlatform, platformDirs } from '../utils/PlatformPaths';

export const APP_NAME = 'pyroost';

export interface ConfigManagerOptions {
  configDir?: string;
  platform?: PlatformInfo;
}

export class ConfigManager {
  private static instance: ConfigManager;
  private readonly configDir: string;
  private readonly configPath: string;
  private readonly platform: PlatformInfo;
  private settings: PyroostSettings | null = null;

  private constructor(options: ConfigManagerOptions) {
    this.platform = options.platform ?? currentPlatform();
    this.configDir =
      options.configDir ||
      this.platform.env.PYROOST_CONFIG_DIR ||
      platformDirs(APP_NAME, this.platform).configDir;
    this.configPath = path.join(this.configDir, 'config.yml');
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager({});
    }
    return ConfigManager.instance;
  }

  static create(options: ConfigManagerOptions): ConfigManager {
    return new ConfigManager(options);
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Defaults, then `config.yml`, then `PYROOST_*` environment overrides.
   */
  async load(): Promise<PyroostSettings> {
    if (this.settings) {
      return this.settings;
    }

    const fromFile = await this.readConfigFile();
    const { env } = this.platform;

    this.settings = {
      ...this.createDefaultSettings(),
      ...fromFile,
      ...(env.PYROOST_DATA_DIR && { dataDir: env.PYROOST_DATA_DIR }),
      ...(env.PYROOST_CACHE_DIR && { cacheDir: env.PYROOST_CACHE_DIR }),
      ...(env.PYROOST_LOG_LEVEL &&
        isLogLevel(env.PYROOST_LOG_LEVEL) && { logLevel: env.PYROOST_LOG_LEVEL }),
    };

    return this.settings;
  }

  private createDefaultSettings(): PyroostSettings {
    const dirs = platformDirs(APP_NAME, this.platform);

    return {
      logLevel: 'info',
      dataDir: dirs.dataDir,
      cacheDir: dirs.cacheDir,
      cpythonRepository: 'indygreg/python-build-standalone',
      releaseCutoff: '2022-02-26T00:00:00Z',
      releasesPerPage: 100,
      pypyIndexUrl: 'https://www.pypy.org/download.html',
      pypyDownloadPrefix: 'https://downloads.python.org/pypy/',
      verifyChecksums: true,
    };
  }

  private async readConfigFile(): Promise<PyroostConfigFile> {
    if (!(await fs.pathExists(this.configPath))) {
      return {};
    }

    let parsed: unknown;
    try {
      const content = await fs.readFile(this.configPath, 'utf8');
      parsed = yaml.parse(content);
    } catch (error) {
      throw new FilesystemError(
        this.configPath,
        `Failed to load config at ${this.configPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return this.validateConfigFile(parsed);
  }

  private validateConfigFile(raw: unknown): PyroostConfigFile {
    if (raw === null || raw === undefined) {
      return {};
    }
    if (typeof raw !== 'object' || Array.isArray(raw)) {
      throw new FilesystemError(this.configPath, `Config at ${this.configPath} must be a mapping`);
    }

    const entries = new Map<string, unknown>(Object.entries(raw));
    const config: PyroostConfigFile = {};

    const str = (key: string): string | undefined => {
      const value = entries.get(key);
      if (value === undefined) return undefined;
      if (typeof value !== 'string') {
        throw new FilesystemError(this.configPath, `Config key '${key}' must be a string`);
      }
      return value;
    };

    const logLevel = str('logLevel');
    if (logLevel !== undefined) {
      if (!isLogLevel(logLevel)) {
        throw new FilesystemError(this.configPath, `Unknown log level '${logLevel}'`);
      }
      config.logLevel = logLevel;
    }

    const dataDir = str('dataDir');
    if (dataDir !== undefined) config.dataDir = dataDir;
    const cacheDir = str('cacheDir');
    if (cacheDir !== undefined) config.cacheDir = cacheDir;
    const cpythonRepository = str('cpythonRepository');
    if (cpythonRepository !== undefined) config.cpythonRepository = cpythonRepository;
    const pypyIndexUrl = str('pypyIndexUrl');
    if (pypyIndexUrl !== undefined) config.pypyIndexUrl = pypyIndexUrl;
    const pypyDownloadPrefix = str('pypyDownloadPrefix');
    if (pypyDownloadPrefix !== undefined) config.pypyDownloadPrefix = pypyDownloadPrefix;

    const releaseCutoff = str('releaseCutoff');
    if (releaseCutoff !== undefined) {
      if (Number.isNaN(Date.parse(releaseCutoff))) {
        throw new FilesystemError(this.configPath, `Invalid releaseCutoff '${releaseCutoff}'`);
      }
      config.releaseCutoff = releaseCutoff;
    }

    const perPage = entries.get('releasesPerPage');
    if (perPage !== undefined) {
      if (typeof perPage !== 'number' || !Number.isInteger(perPage) || perPage < 1) {
        throw new FilesystemError(this.configPath, `releasesPerPage must be a positive integer`);
      }
      config.releasesPerPage = perPage;
    }

    const verify = entries.get('verifyChecksums');
    if (verify !== undefined) {
      if (typeof verify !== 'boolean') {
        throw new FilesystemError(this.configPath, `verifyChecksums must be true or false`);
      }
      config.verifyChecksums = verify;
    }

    return config;
  }
}
