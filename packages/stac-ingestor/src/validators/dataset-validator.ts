/**
 * Dataset submission validation
 *
 * Runs before a collection is published. Checks, in order:
 * 1. structure (zod)
 * 2. periodicity against time density
 * 3. every sample file is covered by an s3 discovery item
 * 4. every s3 discovery item lists at least one non-empty object
 */

import {
  AssetUnreachableError,
  InvalidTimeDensityError,
  NoDateFoundError,
  SampleFileMismatchError,
  UnreachableAssetsError,
  describeError,
} from '../core/errors.js';
import { TIME_DENSITIES, type TimeDensity } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import type { ObjectStore } from '../storage/object-store.js';
import { ObjectStoreError, toS3Url } from '../storage/object-store.js';
import {
  DatasetSubmissionSchema,
  isS3DiscoveryItem,
  parseOrThrow,
  type DatasetSubmission,
  type DiscoveryItem,
  type S3DiscoveryItem,
} from '../validation/schemas/index.js';
import { extractDates } from './datetime-extraction.js';

const log = createLogger({ module: 'dataset-validator' });

export interface DatasetValidatorOptions {
  /** Objects listed per discovery item when checking for data */
  readonly listPageSize: number;
  readonly timeoutMs: number;
}

function isTimeDensity(value: string): value is TimeDensity {
  return TIME_DENSITIES.some((density) => density === value);
}

/**
 * @returns The density narrowed to day, month or year, or null when not periodic
 * @throws {InvalidTimeDensityError}
 */
export function checkTimeDensity(
  isPeriodic: boolean,
  timeDensity: string | null | undefined
): TimeDensity | null {
  const density = timeDensity ?? null;
  if (!isPeriodic) {
    if (density !== null) {
      throw new InvalidTimeDensityError(false, density);
    }
    return null;
  }
  if (density === null || !isTimeDensity(density)) {
    throw new InvalidTimeDensityError(true, density);
  }
  return density;
}

function basename(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Whether `file` is something `item` would discover
 */
export function sampleFileMatches(file: string, item: S3DiscoveryItem): boolean {
  if (!file.startsWith(item.prefix)) {
    return false;
  }

  const name = basename(file);
  if (!new RegExp(item.filename_regex).test(name)) {
    return false;
  }

  if (item.datetime_range) {
    try {
      extractDates(name, item.datetime_range);
    } catch (error) {
      if (error instanceof NoDateFoundError) {
        return false;
      }
      throw error;
    }
  }

  return true;
}

/**
 * Sample files can only be checked against s3 discovery items; a dataset
 * discovered purely through cmr has nothing to check them against.
 *
 * @throws {SampleFileMismatchError} Listing every uncovered file
 */
export function checkSampleFiles(
  sampleFiles: readonly string[],
  discoveryItems: readonly DiscoveryItem[]
): void {
  const s3Items = discoveryItems.filter(isS3DiscoveryItem);
  if (s3Items.length === 0) {
    return;
  }

  const mismatched = sampleFiles.filter(
    (file) => !s3Items.some((item) => sampleFileMatches(file, item))
  );
  if (mismatched.length > 0) {
    throw new SampleFileMismatchError(mismatched);
  }
}

export class DatasetValidator {
  constructor(
    private readonly objects: ObjectStore,
    private readonly options: DatasetValidatorOptions
  ) {}

  /**
   * @returns The parsed submission with defaults applied
   * @throws {ValidationError} (or a subclass) on the first failing check
   */
  async validate(input: unknown): Promise<DatasetSubmission> {
    const parsed = parseOrThrow(DatasetSubmissionSchema, input, 'dataset');
    const dataset: DatasetSubmission = {
      ...parsed,
      time_density: checkTimeDensity(parsed.is_periodic, parsed.time_density),
    };

    checkSampleFiles(dataset.sample_files, dataset.discovery_items);
    await this.checkDiscoveryItemsHaveData(dataset.discovery_items);

    log.debug('Dataset valid', {
      collection: dataset.collection,
      dataType: dataset.data_type,
    });
    return dataset;
  }

  private async checkDiscoveryItemsHaveData(items: readonly DiscoveryItem[]): Promise<void> {
    const s3Items = items.filter(isS3DiscoveryItem);
    const results = await Promise.all(s3Items.map((item) => this.findDataFailure(item)));
    const failures = results.filter(
      (failure): failure is AssetUnreachableError => failure !== null
    );

    const [first] = failures;
    if (first !== undefined) {
      throw failures.length === 1 ? first : new UnreachableAssetsError(failures);
    }
  }

  private async findDataFailure(item: S3DiscoveryItem): Promise<AssetUnreachableError | null> {
    const location = toS3Url(item.bucket, item.prefix);
    try {
      const listing = await this.objects.listObjects(item.bucket, item.prefix, {
        maxKeys: this.options.listPageSize,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (listing.objects.some((object) => object.size > 0)) {
        return null;
      }
      return new AssetUnreachableError(location, 'no non-empty objects under prefix');
    } catch (error) {
      if (error instanceof ObjectStoreError) {
        return new AssetUnreachableError(location, error.message, error.statusCode, {
          cause: error,
        });
      }
      return new AssetUnreachableError(location, describeError(error), undefined, {
        cause: error,
      });
    }
  }
}
