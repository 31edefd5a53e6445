/**
 * Ingestion service
 *
 * Entry point for submissions and status queries, shared by the CLI and any
 * HTTP adapter. Callers pass the authenticated principal as `createdBy`.
 *
 * Cancellation and the batch loader's write-back both overwrite the whole
 * record without comparing the stored status first. A cancel landing while
 * the loader holds a batch can be overwritten by `succeeded` (and the loader
 * only acts on records it saw as `queued`), so the last write wins.
 */

import type {
  IngestionPage,
  IngestionRecord,
  IngestionStatus,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import type { IngestionRepository } from '../persistence/repository.js';
import type { StacItem } from '../validation/schemas/index.js';
import { validateItemSubmission, type ItemValidatorDeps } from '../validators/item-validator.js';
import { cancelIngestion, createIngestion } from './ingestion-record.js';

const log = createLogger({ module: 'ingestion-service' });

export interface IngestionServiceOptions {
  /** Page size when a listing does not name one */
  readonly defaultPageSize: number;
}

export interface SubmitOptions {
  /** Ingestion id, the item id when omitted */
  readonly id?: string;
}

export interface ListOptions {
  readonly status?: IngestionStatus;
  readonly limit?: number;
  readonly cursor?: string | null;
}

export class IngestionService {
  constructor(
    private readonly repository: IngestionRepository,
    private readonly validators: ItemValidatorDeps,
    private readonly options: IngestionServiceOptions
  ) {}

  /**
   * Validate an item and queue it
   *
   * @throws {ValidationError} When the item is rejected; nothing is stored
   */
  async submit(
    createdBy: string,
    input: unknown,
    options: SubmitOptions = {}
  ): Promise<IngestionRecord<StacItem>> {
    const item = await validateItemSubmission(input, this.validators);
    const record = createIngestion({ id: options.id ?? item.id, created_by: createdBy, item });
    const saved = await this.repository.save(record);

    log.info('Ingestion queued', { createdBy, id: saved.id, collection: item.collection });
    return saved;
  }

  /**
   * @throws {NotFoundError}
   */
  async get(createdBy: string, id: string): Promise<IngestionRecord> {
    return this.repository.get(createdBy, id);
  }

  async list(options: ListOptions = {}): Promise<IngestionPage> {
    return this.repository.list({
      status: options.status ?? 'queued',
      limit: options.limit ?? this.options.defaultPageSize,
      cursor: options.cursor,
    });
  }

  /**
   * @throws {NotFoundError}
   * @throws {InvalidStateTransitionError} Unless the record is queued
   */
  async cancel(createdBy: string, id: string): Promise<IngestionRecord> {
    const record = await this.repository.get(createdBy, id);
    const cancelled = await this.repository.save(cancelIngestion(record));

    log.info('Ingestion cancelled', { createdBy, id });
    return cancelled;
  }
}
