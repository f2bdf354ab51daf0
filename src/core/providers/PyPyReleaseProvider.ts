// src/core/providers/PyPyReleaseProvider.ts - PyPy builds linked from the download page
import { parse } from 'node-html-parser';
import { parseAlternateReleaseUrl } from '../version/ReleaseNameParser';
import { ProviderListing, ReleaseProvider } from '../../types/Runtime';
import { ProviderParseError } from '../../types/Errors';
import { HttpClient } from '../../utils/HttpClient';
import { logger } from '../../utils/Logger';
import { pypyPlatformMarker } from '../../utils/PlatformPaths';

export interface PyPyProviderOptions {
  indexUrl: string;
  downloadPrefix: string;
  target: string;
}

// Download links live in paragraphs inside the release tables
const DOWNLOAD_LINK_SELECTOR = 'table>tbody>tr>td>p>a';

export class PyPyReleaseProvider implements ReleaseProvider {
  readonly family = 'pypy';

  constructor(
    private readonly options: PyPyProviderOptions,
    private readonly http: HttpClient = new HttpClient()
  ) {}

  async list(): Promise<ProviderListing> {
    const listing: ProviderListing = { releases: [], failures: [] };

    const marker = pypyPlatformMarker(this.options.target);
    if (!marker) {
      logger.debug(`No PyPy builds published for ${this.options.target}`);
      return listing;
    }

    const html = await this.http.getText(this.options.indexUrl);
    const links = this.extractLinks(html).filter(
      href => href.startsWith(this.options.downloadPrefix) && href.includes(marker)
    );

    for (const url of links) {
      try {
        const { displayName, releaseTag, version } = parseAlternateReleaseUrl(
          url,
          this.options.downloadPrefix
        );
        listing.releases.push({ displayName, sourceUrl: url, version, releaseTag });
      } catch (error) {
        if (!(error instanceof ProviderParseError)) throw error;
        logger.warn(`Skipping PyPy download ${url}`, error);
        listing.failures.push(error);
      }
    }

    logger.debug(
      `PyPy catalog: ${listing.releases.length} releases, ${listing.failures.length} unparsable`
    );
    return listing;
  }

  private extractLinks(html: string): string[] {
    const document = parse(html);
    return document
      .querySelectorAll(DOWNLOAD_LINK_SELECTOR)
      .flatMap(anchor => {
        const href = anchor.getAttribute('href');
        return href ? [href] : [];
      });
  }
}
