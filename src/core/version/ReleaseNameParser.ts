// Naming grammars for upstream release artifacts
import { Version, parseComponent } from './Version';
import { ProviderParseError } from '../../types/Errors';

export interface PrimaryReleaseName {
  releaseTag: string;
  version: Version;
}

export interface AlternateReleaseName {
  displayName: string;
  releaseTag: string;
  version: Version;
}

// cpython-3.11.2+20230226-x86_64-unknown-linux-gnu-install_only.tar.gz
const PRIMARY_FILENAME = /^cpython-(\d+)\.(\d+)\.(\d+)\+(\d+)/;

// pypy3.9-v7.3.11-linux64.tar.bz2
const ALTERNATE_FILENAME = /^pypy(\d+)\.(\d+)-([^-]*)-/;

export function parsePrimaryReleaseFilename(name: string): PrimaryReleaseName {
  const match = PRIMARY_FILENAME.exec(name);
  if (!match) {
    throw new ProviderParseError(name, 'expected cpython-<major>.<minor>.<patch>+<tag>');
  }

  const [, majorStr, minorStr, patchStr, releaseTag] = match;
  const major = parseComponent(majorStr);
  const minor = parseComponent(minorStr);
  const patch = parseComponent(patchStr);
  if (major === null || minor === null || patch === null) {
    throw new ProviderParseError(name, 'version component out of range');
  }

  return { releaseTag, version: new Version('cpython', major, minor, patch) };
}

/**
 * PyPy releases are not pinned to a patch level here, so the version always
 * comes back without one.
 */
export function parseAlternateReleaseUrl(url: string, downloadPrefix: string): AlternateReleaseName {
  if (!url.startsWith(downloadPrefix)) {
    throw new ProviderParseError(url, `expected a URL under ${downloadPrefix}`);
  }

  const displayName = url.slice(downloadPrefix.length);
  const match = ALTERNATE_FILENAME.exec(displayName);
  if (!match) {
    throw new ProviderParseError(url, 'expected pypy<major>.<minor>-<tag>-...');
  }

  const [, majorStr, minorStr, releaseTag] = match;
  const major = parseComponent(majorStr);
  const minor = parseComponent(minorStr);
  if (major === null || minor === null) {
    throw new ProviderParseError(url, 'version component out of range');
  }

  return { displayName, releaseTag, version: new Version('pypy', major, minor) };
}
