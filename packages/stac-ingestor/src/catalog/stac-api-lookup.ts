/**
 * Collection lookup against a STAC API
 *
 * `GET {stacApiUrl}/collections/{id}`; any 2xx answer means the collection
 * exists, a 404 means it does not. Any other error status rejects the
 * collection with the status in the message; network failures propagate.
 */

import { HTTPClient, HTTPError } from '../core/http-client.js';
import { UnknownCollectionError } from '../core/errors.js';
import type { CollectionLookup } from './catalog-store.js';

export class StacApiCollectionLookup implements CollectionLookup {
  private readonly baseUrl: string;

  constructor(
    stacApiUrl: string,
    private readonly http: HTTPClient = new HTTPClient({ maxRetries: 2 })
  ) {
    this.baseUrl = stacApiUrl.replace(/\/+$/, '');
  }

  collectionUrl(collectionId: string): string {
    return `${this.baseUrl}/collections/${encodeURIComponent(collectionId)}`;
  }

  async collectionExists(collectionId: string): Promise<boolean> {
    try {
      const response = await this.http.fetchWithRetry(this.collectionUrl(collectionId));
      await response.body?.cancel();
      return true;
    } catch (error) {
      if (error instanceof HTTPError) {
        if (error.statusCode === 404) {
          return false;
        }
        throw new UnknownCollectionError(
          collectionId,
          `received ${error.statusCode} response code from STAC API`
        );
      }
      throw error;
    }
  }
}
