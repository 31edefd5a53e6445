/**
 * Object storage contract
 *
 * The validators and the publisher only need three calls from object
 * storage: an existence probe, a bounded prefix listing and a small-object
 * read (array store metadata and coordinate chunks).
 */

export interface ObjectHead {
  readonly bucket: string;
  readonly key: string;
  readonly contentLength: number;
  readonly contentType?: string;
  readonly lastModified?: Date;
}

export interface ObjectSummary {
  readonly key: string;
  readonly size: number;
  readonly lastModified?: Date;
}

export interface ObjectListing {
  readonly objects: readonly ObjectSummary[];
  readonly nextContinuationToken: string | null;
}

export interface ObjectRequestOptions {
  readonly signal?: AbortSignal;
}

export interface ListObjectsOptions extends ObjectRequestOptions {
  /** Page size, the store's own maximum when omitted */
  readonly maxKeys?: number;
  readonly continuationToken?: string;
}

export interface ObjectStore {
  headObject(bucket: string, key: string, options?: ObjectRequestOptions): Promise<ObjectHead>;
  listObjects(bucket: string, prefix: string, options?: ListObjectsOptions): Promise<ObjectListing>;
  getObject(bucket: string, key: string, options?: ObjectRequestOptions): Promise<Uint8Array>;
}

/**
 * Failure talking to object storage
 */
export class ObjectStoreError extends Error {
  constructor(
    message: string,
    public readonly bucket: string,
    public readonly key: string,
    public readonly statusCode?: number,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ObjectStoreError';
  }

  get notFound(): boolean {
    return this.statusCode === 404;
  }
}

export interface ObjectLocation {
  readonly bucket: string;
  readonly key: string;
}

/**
 * Split an `s3://bucket/key` URL
 *
 * @returns null when href is not an s3 URL with a bucket
 */
export function parseS3Url(href: string): ObjectLocation | null {
  let url: URL;
  try {
    url = new URL(href);
  } catch {
    return null;
  }
  if (url.protocol !== 's3:' || url.hostname === '') {
    return null;
  }
  return {
    bucket: url.hostname,
    key: decodeURIComponent(url.pathname.replace(/^\/+/, '')),
  };
}

export function toS3Url(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}
