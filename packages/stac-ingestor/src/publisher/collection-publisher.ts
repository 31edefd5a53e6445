/**
 * Collection publisher
 *
 * Publishing validates a dataset, builds its collection, loads it into the
 * catalog store and, for COG datasets, starts one discovery workflow per s3
 * discovery item. A collection that loaded stays published even when some
 * discovery triggers fail; those failures are reported per item.
 */

import { PublishError, describeError } from '../core/errors.js';
import type { StacCollection } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import type { CatalogStore } from '../catalog/catalog-store.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { CollectionRegistry } from '../validators/collection-registry.js';
import type { DatasetValidator } from '../validators/dataset-validator.js';
import {
  isS3DiscoveryItem,
  type CogDataset,
  type DatasetSubmission,
  type S3DiscoveryItem,
  type ZarrDataset,
} from '../validation/schemas/index.js';
import type { DiscoveryWorkflowClient, WorkflowRun } from '../workflows/discovery-workflow.js';
import {
  DATACUBE_EXTENSION,
  buildCogCollection,
  buildZarrTemplate,
  zarrStoreHref,
} from './collection-template.js';
import { introspectZarrStore, DEFAULT_DIMENSIONS } from './zarr-introspection.js';
import { ZarrStoreReader, ZarrStoreError } from './zarr-store.js';

const log = createLogger({ module: 'publisher' });

export type DiscoveryDispatch =
  | { readonly index: number; readonly collection: string; readonly run: WorkflowRun }
  | { readonly index: number; readonly collection: string; readonly error: string };

export interface PublishResult {
  readonly collection: StacCollection;
  readonly discoveries: readonly DiscoveryDispatch[];
}

export interface CollectionPublisherDeps {
  readonly validator: DatasetValidator;
  readonly catalog: CatalogStore;
  readonly objects: ObjectStore;
  /** Null when no workflow service is configured; triggers are then reported as failed */
  readonly workflows: DiscoveryWorkflowClient | null;
  /** Cached existence answers to drop when a collection is deleted */
  readonly collections?: CollectionRegistry;
}

export class CollectionPublisher {
  constructor(private readonly deps: CollectionPublisherDeps) {}

  /**
   * Build the collection document for a validated dataset
   *
   * @throws {PublishError} When a zarr store cannot be described
   */
  async generate(dataset: DatasetSubmission): Promise<StacCollection> {
    return dataset.data_type === 'zarr'
      ? this.generateZarr(dataset)
      : buildCogCollection(dataset);
  }

  /**
   * @throws {ValidationError} When the dataset is rejected
   * @throws {PublishError} When the collection cannot be built or loaded
   */
  async publish(input: unknown): Promise<PublishResult> {
    const dataset = await this.deps.validator.validate(input);
    const collection = await this.generate(dataset);

    try {
      await this.deps.catalog.loadCollection(collection, 'insert');
    } catch (error) {
      throw new PublishError(collection.id, describeError(error), { cause: error });
    }
    log.info('Published collection', { collectionId: collection.id, dataType: dataset.data_type });

    const discoveries = dataset.data_type === 'cog' ? await this.triggerDiscoveries(dataset) : [];
    return { collection, discoveries };
  }

  async deleteCollection(collectionId: string): Promise<void> {
    await this.deps.catalog.deleteCollection(collectionId);
    this.deps.collections?.invalidate(collectionId);
    log.info('Deleted collection', { collectionId });
  }

  async updateCollectionSummaries(collectionId: string): Promise<void> {
    await this.deps.catalog.updateCollectionSummaries(collectionId);
  }

  private async generateZarr(dataset: ZarrDataset): Promise<StacCollection> {
    const [discovery] = dataset.discovery_items;
    if (discovery === undefined || !isS3DiscoveryItem(discovery)) {
      throw new PublishError(dataset.collection, 'zarr datasets need an s3 discovery item');
    }

    const href = zarrStoreHref(discovery);
    const template = buildZarrTemplate(dataset, href);
    try {
      const fields = await introspectZarrStore(ZarrStoreReader.fromHref(this.deps.objects, href), {
        consolidated: dataset.xarray_kwargs.consolidated === true,
        names: {
          x: dataset.x_dimension ?? DEFAULT_DIMENSIONS.x,
          y: dataset.y_dimension ?? DEFAULT_DIMENSIONS.y,
          time: dataset.temporal_dimension ?? DEFAULT_DIMENSIONS.time,
          referenceSystem: dataset.reference_system ?? DEFAULT_DIMENSIONS.referenceSystem,
        },
      });
      return {
        ...template,
        stac_extensions: [DATACUBE_EXTENSION],
        ...fields,
      };
    } catch (error) {
      if (error instanceof ZarrStoreError) {
        throw new PublishError(dataset.collection, error.message, { cause: error });
      }
      throw error;
    }
  }

  private async triggerDiscoveries(dataset: CogDataset): Promise<DiscoveryDispatch[]> {
    const dispatches: DiscoveryDispatch[] = [];

    for (const [index, item] of dataset.discovery_items.entries()) {
      if (!isS3DiscoveryItem(item)) continue;
      dispatches.push(await this.triggerDiscovery(index, item, dataset.collection));
    }
    return dispatches;
  }

  private async triggerDiscovery(
    index: number,
    item: S3DiscoveryItem,
    datasetCollection: string
  ): Promise<DiscoveryDispatch> {
    const collection = item.collection ?? datasetCollection;
    if (!this.deps.workflows) {
      return { index, collection, error: 'discovery workflows are not configured' };
    }

    try {
      const run = await this.deps.workflows.trigger({ ...item, collection });
      return { index, collection, run };
    } catch (error) {
      log.warn('Discovery trigger failed', { collection, index, error: describeError(error) });
      return { index, collection, error: describeError(error) };
    }
  }
}
