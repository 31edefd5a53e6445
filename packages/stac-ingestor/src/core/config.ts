/**
 * STAC Ingestor Configuration
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides passed to loadConfig()
 * 2. Environment variables (STAC_INGESTOR_*)
 * 3. Config file (.stac-ingestorrc, YAML, or --config path)
 * 4. DEFAULT_CONFIG
 *
 * The merged result is validated with zod; a bad value fails at startup rather
 * than on first use.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ============================================================================
// Schema
// ============================================================================

const positiveInt = z.coerce.number().int().positive();

const nullableUrl = z
  .string()
  .url()
  .nullable()
  .or(z.literal('').transform(() => null));

export const ConfigSchema = z.object({
  /** sqlite:///path, sqlite://:memory: or postgresql://... */
  ingestionDatabaseUrl: z.string().min(1),
  /** pgstac database holding items and collections */
  catalogDatabaseUrl: nullableUrl,
  /** STAC API used for collection existence checks when set */
  stacApiUrl: nullableUrl,
  feed: z.object({
    consumerName: z.string().min(1),
    batchSize: positiveInt,
    maxWaitMs: z.coerce.number().int().nonnegative(),
    pollIntervalMs: positiveInt,
    shardCount: positiveInt,
    /** Failed deliveries of one batch before its records are failed and it is skipped */
    maxDeliveries: positiveInt,
  }),
  validation: z.object({
    probeTimeoutMs: positiveInt,
    collectionCacheTtlMs: positiveInt,
    collectionCacheMaxEntries: positiveInt,
    listPageSize: positiveInt,
  }),
  catalog: z.object({
    statementTimeoutMs: positiveInt,
  }),
  workflows: z.object({
    airflowUrl: nullableUrl,
    airflowToken: z.string().nullable(),
    dagId: z.string().min(1),
    timeoutMs: positiveInt,
  }),
  storage: z.object({
    region: z.string().nullable(),
    endpoint: nullableUrl,
  }),
});

export type IngestorConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: IngestorConfig = {
  ingestionDatabaseUrl: 'sqlite:///.stac-ingestor/ingestions.db',
  catalogDatabaseUrl: null,
  stacApiUrl: null,
  feed: {
    consumerName: 'batch-loader',
    batchSize: 100,
    maxWaitMs: 1_000,
    pollIntervalMs: 250,
    shardCount: 4,
    maxDeliveries: 5,
  },
  validation: {
    probeTimeoutMs: 10_000,
    collectionCacheTtlMs: 5 * 60_000,
    collectionCacheMaxEntries: 1_000,
    listPageSize: 10,
  },
  catalog: {
    statementTimeoutMs: 30_000,
  },
  workflows: {
    airflowUrl: null,
    airflowToken: null,
    dagId: 'discover',
    timeoutMs: 30_000,
  },
  storage: {
    region: null,
    endpoint: null,
  },
};

// ============================================================================
// Environment mapping
// ============================================================================

type ConfigPath = readonly [string, ...string[]];

const ENV_VARIABLES: ReadonlyArray<readonly [string, ConfigPath]> = [
  ['STAC_INGESTOR_DATABASE_URL', ['ingestionDatabaseUrl']],
  ['STAC_INGESTOR_CATALOG_DATABASE_URL', ['catalogDatabaseUrl']],
  ['STAC_INGESTOR_STAC_API_URL', ['stacApiUrl']],
  ['STAC_INGESTOR_FEED_CONSUMER', ['feed', 'consumerName']],
  ['STAC_INGESTOR_FEED_BATCH_SIZE', ['feed', 'batchSize']],
  ['STAC_INGESTOR_FEED_MAX_WAIT_MS', ['feed', 'maxWaitMs']],
  ['STAC_INGESTOR_FEED_POLL_INTERVAL_MS', ['feed', 'pollIntervalMs']],
  ['STAC_INGESTOR_FEED_SHARDS', ['feed', 'shardCount']],
  ['STAC_INGESTOR_FEED_MAX_DELIVERIES', ['feed', 'maxDeliveries']],
  ['STAC_INGESTOR_PROBE_TIMEOUT_MS', ['validation', 'probeTimeoutMs']],
  ['STAC_INGESTOR_COLLECTION_CACHE_TTL_MS', ['validation', 'collectionCacheTtlMs']],
  ['STAC_INGESTOR_COLLECTION_CACHE_MAX_ENTRIES', ['validation', 'collectionCacheMaxEntries']],
  ['STAC_INGESTOR_LIST_PAGE_SIZE', ['validation', 'listPageSize']],
  ['STAC_INGESTOR_CATALOG_STATEMENT_TIMEOUT_MS', ['catalog', 'statementTimeoutMs']],
  ['STAC_INGESTOR_AIRFLOW_URL', ['workflows', 'airflowUrl']],
  ['STAC_INGESTOR_AIRFLOW_TOKEN', ['workflows', 'airflowToken']],
  ['STAC_INGESTOR_AIRFLOW_DAG_ID', ['workflows', 'dagId']],
  ['STAC_INGESTOR_WORKFLOW_TIMEOUT_MS', ['workflows', 'timeoutMs']],
  ['STAC_INGESTOR_S3_REGION', ['storage', 'region']],
  ['STAC_INGESTOR_S3_ENDPOINT', ['storage', 'endpoint']],
];

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: PlainObject, path: ConfigPath, value: unknown): void {
  const [head, ...rest] = path;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const child: PlainObject = isPlainObject(existing) ? existing : {};
  target[head] = child;
  const [next, ...remaining] = rest;
  if (next !== undefined) {
    setPath(child, [next, ...remaining], value);
  }
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

/**
 * Collect STAC_INGESTOR_* variables into a partial config object
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const partial: PlainObject = {};
  for (const [name, path] of ENV_VARIABLES) {
    const value = env[name];
    if (value !== undefined) {
      setPath(partial, path, value);
    }
  }
  return partial;
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path; .stac-ingestorrc in cwd is used when present */
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: PlainObject;
}

function readConfigFile(configPath: string | undefined): PlainObject {
  const path = configPath ? resolve(configPath) : resolve('.stac-ingestorrc');
  if (!existsSync(path)) {
    if (configPath) {
      throw new Error(`Config file not found: ${path}`);
    }
    return {};
  }

  const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${path}`);
  }
  return parsed;
}

/**
 * Load, merge and validate configuration
 *
 * @throws {Error} When the merged configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): IngestorConfig {
  const merged = [
    readConfigFile(options.configPath),
    configFromEnv(options.env ?? process.env),
    options.overrides ?? {},
  ].reduce<PlainObject>((acc, layer) => deepMerge(acc, layer), { ...DEFAULT_CONFIG });

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}
