// src/core/providers/CPythonReleaseProvider.ts - python-build-standalone releases on GitHub
import { parsePrimaryReleaseFilename } from '../version/ReleaseNameParser';
import { ProviderListing, Release, ReleaseProvider } from '../../types/Runtime';
import { ProviderParseError, RequestError } from '../../types/Errors';
import { HttpClient } from '../../utils/HttpClient';
import { logger } from '../../utils/Logger';

interface GitHubReleaseAsset {
  name: string;
  browser_download_url: string;
}

interface GitHubRelease {
  tag_name: string;
  created_at: string | null;
  assets: GitHubReleaseAsset[];
}

export interface CPythonProviderOptions {
  repository: string;
  cutoff: string;
  target: string;
  perPage: number;
}

const CHECKSUM_SUFFIX = '.sha256';
const INSTALL_ONLY_MARKER = 'install_only';

export class CPythonReleaseProvider implements ReleaseProvider {
  readonly family = 'cpython';
  private static readonly GITHUB_API_URL = 'https://api.github.com';

  constructor(
    private readonly options: CPythonProviderOptions,
    private readonly http: HttpClient = new HttpClient()
  ) {}

  async list(): Promise<ProviderListing> {
    const url = `${CPythonReleaseProvider.GITHUB_API_URL}/repos/${this.options.repository}/releases?per_page=${this.options.perPage}`;
    const body = await this.http.getJson(url);
    const releases = this.validateReleases(url, body);

    const cutoff = Date.parse(this.options.cutoff);
    const assets = releases
      .filter(release => release.created_at !== null && Date.parse(release.created_at) > cutoff)
      .flatMap(release => release.assets);

    const checksums = new Map<string, string>();
    for (const asset of assets) {
      if (asset.name.endsWith(CHECKSUM_SUFFIX)) {
        checksums.set(asset.name.slice(0, -CHECKSUM_SUFFIX.length), asset.browser_download_url);
      }
    }

    const listing: ProviderListing = { releases: [], failures: [] };

    for (const asset of assets) {
      if (
        asset.name.endsWith(CHECKSUM_SUFFIX) ||
        !asset.name.includes(this.options.target) ||
        !asset.name.includes(INSTALL_ONLY_MARKER)
      ) {
        continue;
      }

      try {
        const { releaseTag, version } = parsePrimaryReleaseFilename(asset.name);
        const checksumUrl = checksums.get(asset.name);
        const release: Release = {
          displayName: asset.name,
          sourceUrl: asset.browser_download_url,
          version,
          releaseTag,
          ...(checksumUrl && { checksumUrl }),
        };
        listing.releases.push(release);
      } catch (error) {
        if (!(error instanceof ProviderParseError)) throw error;
        logger.warn(`Skipping CPython asset ${asset.name}`, error);
        listing.failures.push(error);
      }
    }

    logger.debug(
      `CPython catalog: ${listing.releases.length} releases, ${listing.failures.length} unparsable`
    );
    return listing;
  }

  private validateReleases(url: string, body: unknown): GitHubRelease[] {
    if (!Array.isArray(body)) {
      throw new RequestError(url, `Unexpected response from ${url}: expected a release list`);
    }

    return body.filter(isRecord).map(release => ({
      tag_name: typeof release.tag_name === 'string' ? release.tag_name : '',
      created_at: typeof release.created_at === 'string' ? release.created_at : null,
      assets: Array.isArray(release.assets)
        ? release.assets.filter(isRecord).flatMap(asset =>
            typeof asset.name === 'string' && typeof asset.browser_download_url === 'string'
              ? [{ name: asset.name, browser_download_url: asset.browser_download_url }]
              : []
          )
        : [],
    }));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
