import { LogLevel } from '../utils/Logger';

export interface PyroostSettings {
  logLevel: LogLevel;
  dataDir: string;
  cacheDir: string;
  /** GitHub `owner/repo` publishing CPython builds */
  cpythonRepository: string;
  /** Releases created at or before this instant use an older asset naming scheme */
  releaseCutoff: string;
  releasesPerPage: number;
  pypyIndexUrl: string;
  pypyDownloadPrefix: string;
  verifyChecksums: boolean;
}

/**
 * Shape of `config.yml`; every key is optional and merged over defaults.
 */
export type PyroostConfigFile = Partial<PyroostSettings>;
