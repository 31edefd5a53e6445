/**
 * Amazon S3 (or S3-compatible) object store
 *
 * Credentials come from the SDK's default provider chain; credential vending
 * is handled outside this package.
 */

import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import type {
  ListObjectsOptions,
  ObjectHead,
  ObjectListing,
  ObjectRequestOptions,
  ObjectStore,
} from './object-store.js';
import { ObjectStoreError } from './object-store.js';

export interface S3ObjectStoreOptions {
  readonly region?: string | null;
  /** Custom endpoint for S3-compatible stores; enables path-style addressing */
  readonly endpoint?: string | null;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(options: S3ObjectStoreOptions = {}, client?: S3Client) {
    const config: S3ClientConfig = {};
    if (options.region) {
      config.region = options.region;
    }
    if (options.endpoint) {
      config.endpoint = options.endpoint;
      config.forcePathStyle = true;
    }
    this.client = client ?? new S3Client(config);
  }

  async headObject(
    bucket: string,
    key: string,
    options?: ObjectRequestOptions
  ): Promise<ObjectHead> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: key }),
        { abortSignal: options?.signal }
      );
      return {
        bucket,
        key,
        contentLength: response.ContentLength ?? 0,
        contentType: response.ContentType,
        lastModified: response.LastModified,
      };
    } catch (error) {
      throw this.wrapError(error, bucket, key);
    }
  }

  async listObjects(
    bucket: string,
    prefix: string,
    options?: ListObjectsOptions
  ): Promise<ObjectListing> {
    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          MaxKeys: options?.maxKeys,
          ContinuationToken: options?.continuationToken,
        }),
        { abortSignal: options?.signal }
      );
      return {
        objects: (response.Contents ?? []).flatMap((object) =>
          object.Key === undefined
            ? []
            : [{ key: object.Key, size: object.Size ?? 0, lastModified: object.LastModified }]
        ),
        nextContinuationToken: response.NextContinuationToken ?? null,
      };
    } catch (error) {
      throw this.wrapError(error, bucket, prefix);
    }
  }

  async getObject(
    bucket: string,
    key: string,
    options?: ObjectRequestOptions
  ): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
        { abortSignal: options?.signal }
      );
      if (!response.Body) {
        return new Uint8Array();
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      throw this.wrapError(error, bucket, key);
    }
  }

  private wrapError(error: unknown, bucket: string, key: string): ObjectStoreError {
    if (error instanceof S3ServiceException) {
      return new ObjectStoreError(
        `${error.name}: ${error.message}`,
        bucket,
        key,
        error.$metadata.httpStatusCode,
        { cause: error }
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ObjectStoreError(message, bucket, key, undefined, { cause: error });
  }
}
