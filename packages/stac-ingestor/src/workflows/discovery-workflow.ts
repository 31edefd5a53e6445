/**
 * Discovery workflow client
 *
 * Publishing a COG collection hands each s3 discovery item to a discovery
 * workflow that lists the source files, builds items and submits them.
 * Workflows run on Airflow; this client talks to its stable REST API.
 */

import { randomUUID } from 'node:crypto';
import { HTTPClient, HTTPError } from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'discovery-workflow' });

export type WorkflowStatus =
  | 'queued'
  | 'started'
  | 'succeeded'
  | 'failed'
  | 'cancelled'
  | 'nonexistent';

export interface WorkflowRun {
  readonly id: string;
  readonly status: WorkflowStatus;
}

export type WorkflowConf = Readonly<Record<string, unknown>>;

export interface DiscoveryWorkflowClient {
  trigger(conf: WorkflowConf): Promise<WorkflowRun>;
  getStatus(runId: string): Promise<WorkflowRun>;
}

/**
 * Airflow DAG run states to workflow statuses
 */
export function mapDagRunState(state: string | null | undefined): WorkflowStatus {
  switch (state) {
    case 'queued':
      return 'queued';
    case 'running':
      return 'started';
    case 'success':
      return 'succeeded';
    case 'failed':
      return 'failed';
    default:
      return 'queued';
  }
}

export interface AirflowDiscoveryClientOptions {
  readonly baseUrl: string;
  readonly dagId: string;
  readonly token?: string | null;
  readonly timeoutMs: number;
  readonly generateRunId?: () => string;
}

interface DagRunResponse {
  readonly dag_run_id?: string;
  readonly state?: string | null;
}

export class AirflowDiscoveryClient implements DiscoveryWorkflowClient {
  private readonly baseUrl: string;
  private readonly generateRunId: () => string;

  constructor(
    private readonly options: AirflowDiscoveryClientOptions,
    private readonly http: HTTPClient = new HTTPClient({ maxRetries: 2 })
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.generateRunId = options.generateRunId ?? randomUUID;
  }

  private get dagRunsUrl(): string {
    return `${this.baseUrl}/api/v1/dags/${encodeURIComponent(this.options.dagId)}/dagRuns`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  /**
   * @throws {HTTPError} When Airflow rejects the run
   */
  async trigger(conf: WorkflowConf): Promise<WorkflowRun> {
    const runId = this.generateRunId();
    await this.http.fetchJSON<DagRunResponse>(this.dagRunsUrl, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ dag_run_id: runId, conf }),
      timeoutMs: this.options.timeoutMs,
      // A replayed POST would collide on dag_run_id
      retries: 0,
    });

    log.info('Triggered discovery', { dagId: this.options.dagId, runId });
    return { id: runId, status: 'started' };
  }

  async getStatus(runId: string): Promise<WorkflowRun> {
    try {
      const run = await this.http.fetchJSON<DagRunResponse>(
        `${this.dagRunsUrl}/${encodeURIComponent(runId)}`,
        { headers: this.headers(), timeoutMs: this.options.timeoutMs }
      );
      return { id: runId, status: mapDagRunState(run.state) };
    } catch (error) {
      if (error instanceof HTTPError && error.statusCode === 404) {
        return { id: runId, status: 'nonexistent' };
      }
      throw error;
    }
  }
}
