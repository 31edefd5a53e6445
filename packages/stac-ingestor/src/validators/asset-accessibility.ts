/**
 * Asset accessibility probes
 *
 * Every asset of a submitted item must answer a HEAD request before the item
 * is queued. http(s) assets go through the HTTP client, s3 assets through
 * the object store. A probe that times out counts as unreachable.
 */

import { HTTPClient, HTTPError, HTTPTimeoutError } from '../core/http-client.js';
import { AssetUnreachableError, describeError } from '../core/errors.js';
import { ObjectStoreError, parseS3Url, type ObjectStore } from '../storage/object-store.js';

export interface AssetProbeOptions {
  readonly timeoutMs: number;
}

export class AssetProbe {
  constructor(
    private readonly http: HTTPClient,
    private readonly objects: ObjectStore,
    private readonly options: AssetProbeOptions
  ) {}

  /**
   * @throws {AssetUnreachableError} When the asset cannot be reached
   */
  async probe(href: string): Promise<void> {
    let protocol: string;
    try {
      protocol = new URL(href).protocol;
    } catch {
      throw new AssetUnreachableError(href, 'invalid URL');
    }

    switch (protocol) {
      case 'http:':
      case 'https:':
        return this.probeHttp(href);
      case 's3:':
        return this.probeObject(href);
      default:
        throw new AssetUnreachableError(href, 'unsupported scheme');
    }
  }

  /**
   * Probe every href concurrently
   *
   * @returns One error per unreachable asset, in input order
   */
  async probeAll(hrefs: readonly string[]): Promise<AssetUnreachableError[]> {
    const results = await Promise.allSettled(hrefs.map((href) => this.probe(href)));

    return results.flatMap((result, index) => {
      if (result.status === 'fulfilled') {
        return [];
      }
      if (result.reason instanceof AssetUnreachableError) {
        return [result.reason];
      }
      return [
        new AssetUnreachableError(hrefs[index] ?? '', describeError(result.reason), undefined, {
          cause: result.reason,
        }),
      ];
    });
  }

  private async probeHttp(href: string): Promise<void> {
    try {
      await this.http.head(href, { timeoutMs: this.options.timeoutMs, retries: 0 });
    } catch (error) {
      if (error instanceof HTTPError) {
        throw new AssetUnreachableError(href, error.statusText || 'request failed', error.statusCode, {
          cause: error,
        });
      }
      if (error instanceof HTTPTimeoutError) {
        throw new AssetUnreachableError(href, `timed out after ${error.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      throw new AssetUnreachableError(href, describeError(error), undefined, { cause: error });
    }
  }

  private async probeObject(href: string): Promise<void> {
    const location = parseS3Url(href);
    if (!location) {
      throw new AssetUnreachableError(href, 'invalid s3 URL');
    }

    const signal = AbortSignal.timeout(this.options.timeoutMs);
    try {
      await this.objects.headObject(location.bucket, location.key, { signal });
    } catch (error) {
      if (signal.aborted) {
        throw new AssetUnreachableError(href, `timed out after ${this.options.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      if (error instanceof ObjectStoreError) {
        throw new AssetUnreachableError(href, error.message, error.statusCode, { cause: error });
      }
      throw new AssetUnreachableError(href, describeError(error), undefined, { cause: error });
    }
  }
}
