import * as crypto from 'crypto';
import * as path from 'path';
import { Release } from '../types/Runtime';
import { ChecksumMismatchError, RequestError } from '../types/Errors';
import { FileSystem } from '../utils/FileSystem';
import { HttpClient } from '../utils/HttpClient';
import { logger } from '../utils/Logger';

export interface DownloadCacheOptions {
  verifyChecksums: boolean;
}

const SHA256_HEX = /^[0-9a-f]{64}$/;

/**
 * Archives are cached under their upstream file name. A file at that path is
 * trusted as-is; downloads land in a `.part` file first and are renamed into
 * place only once complete and verified.
 */
export class DownloadCache {
  constructor(
    private readonly options: DownloadCacheOptions,
    private readonly http: HttpClient = new HttpClient()
  ) {}

  cachedPath(release: Release, downloadsDir: string): string {
    return path.join(downloadsDir, release.displayName);
  }

  async ensureCached(release: Release, downloadsDir: string): Promise<string> {
    await FileSystem.ensureDirExists(downloadsDir);

    const target = this.cachedPath(release, downloadsDir);
    if (await FileSystem.pathExists(target)) {
      logger.debug(`Using cached archive ${target}`);
      return target;
    }

    logger.info(`Downloading ${release.displayName}`);
    const data = await this.http.getBuffer(release.sourceUrl);

    if (this.options.verifyChecksums && release.checksumUrl) {
      await this.verify(release, release.checksumUrl, data);
    }

    const staging = `${target}.${process.pid}.part`;
    try {
      await FileSystem.writeFile(staging, data);
      await FileSystem.publish(staging, target);
    } catch (error) {
      await FileSystem.remove(staging);
      throw error;
    }

    logger.debug(`Cached ${release.displayName} (${data.length} bytes)`);
    return target;
  }

  private async verify(release: Release, checksumUrl: string, data: Buffer): Promise<void> {
    const sidecar = await this.http.getText(checksumUrl);
    const expected = sidecar.trim().split(/\s+/)[0].toLowerCase();
    if (!SHA256_HEX.test(expected)) {
      throw new RequestError(checksumUrl, `Malformed checksum file at ${checksumUrl}`);
    }

    const actual = crypto.createHash('sha256').update(data).digest('hex');
    if (actual !== expected) {
      throw new ChecksumMismatchError(release.displayName, expected, actual);
    }
    logger.debug(`Checksum verified for ${release.displayName}`);
  }
}
