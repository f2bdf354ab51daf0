import { Version } from './version/Version';
import { Release } from '../types/Runtime';
import { VersionNotFoundError } from '../types/Errors';

/**
 * Pick the release to install for `requested`.
 *
 * Among compatible releases the greatest version wins, so a request without a
 * patch resolves to the newest patch in the catalog. Releases with equal
 * versions (same build under several upstream tags) keep catalog order.
 */
export function resolveRelease(requested: Version, catalog: readonly Release[]): Release {
  let best: Release | undefined;

  for (const release of catalog) {
    if (!release.version.compatible(requested)) {
      continue;
    }
    if (!best || Version.compare(release.version, best.version) > 0) {
      best = release;
    }
  }

  if (!best) {
    throw new VersionNotFoundError(requested.toString());
  }
  return best;
}

/**
 * Catalog sorted by version for display; stable, so equal versions keep the
 * order the provider returned them in.
 */
export function sortReleases(catalog: readonly Release[]): Release[] {
  return [...catalog].sort((a, b) => Version.compare(a.version, b.version));
}
