import { logger } from './Logger';
import { RequestError, errorMessage } from '../types/Errors';

export const USER_AGENT = 'pyroost/0.1.0';

/**
 * Thin wrapper over the global fetch: fixed User-Agent, no retries, every
 * failure (transport or status) surfaced as a RequestError.
 */
export class HttpClient {
  constructor(private readonly userAgent: string = USER_AGENT) {}

  async get(url: string, accept?: string): Promise<Response> {
    logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          ...(accept && { Accept: accept }),
        },
      });
    } catch (error) {
      throw new RequestError(url, `Request to ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new RequestError(
        url,
        `Request to ${url} failed: ${response.status} ${response.statusText}`
      );
    }

    return response;
  }

  /**
   * Decoded JSON body; callers validate its shape.
   */
  async getJson(url: string): Promise<unknown> {
    const response = await this.get(url, 'application/json');
    return this.read(url, (): Promise<unknown> => response.json());
  }

  async getText(url: string): Promise<string> {
    const response = await this.get(url);
    return this.read(url, () => response.text());
  }

  async getBuffer(url: string): Promise<Buffer> {
    const response = await this.get(url);
    return this.read(url, async () => Buffer.from(await response.arrayBuffer()));
  }

  private async read<T>(url: string, body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } catch (error) {
      throw new RequestError(url, `Failed to read response from ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
