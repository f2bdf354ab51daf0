// src/types/Runtime.ts - Interpreter and release types
import type { Version } from '../core/version/Version';
import type { ProviderParseError } from './Errors';

export type InterpreterFamily = 'cpython' | 'pypy';

export type ArchiveFormat = 'tar.gz' | 'tar.bz2';

/**
 * One downloadable distribution as reported by a provider. Produced fresh
 * per query and never persisted.
 */
export interface Release {
  displayName: string;
  sourceUrl: string;
  version: Version;
  releaseTag: string;
  checksumUrl?: string;
}

export interface ProviderListing {
  releases: Release[];
  failures: ProviderParseError[];
}

export interface ReleaseProvider {
  readonly family: InterpreterFamily;
  list(): Promise<ProviderListing>;
}

export interface InstalledInterpreter {
  version: Version;
  path: string;
}

export interface VirtualenvInfo {
  project: string;
  version: string;
  path: string;
}
