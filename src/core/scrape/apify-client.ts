// src/core/scrape/apify-client.ts
import { z } from 'zod';
import { ErrorCode, PipelineError } from '../errors.js';
import { APIFY_BASE_URL, DEFAULT_ACTOR_WAIT_SECS, DEFAULT_RETRY, DEFAULT_TIMEOUT } from '../config/constants.js';
import { fetchWithTimeout, releaseAndFail } from '../utils/http.js';
import { sleep, withRetry } from '../utils/retry.js';
import type { JsonObject, RawRecord, RetryPolicy, ScrapingConfig } from '../types/index.js';
import type { ScrapingClient, ScrapingResult } from './types.js';

// Apify caps a single waitForFinish at 60 seconds
const MAX_WAIT_PER_REQUEST_SECS = 60;

// Starting a run is not idempotent: a retry after a lost response would pay for a second run
const START_RUN_POLICY: RetryPolicy = { attempts: 1, baseDelayMs: 0 };

const TERMINAL_STATUSES = new Set(['SUCCEEDED', 'FAILED', 'TIMED-OUT', 'ABORTED']);

const runSchema = z.object({
  data: z.object({
    id: z.string(),
    status: z.string(),
    defaultDatasetId: z.string(),
  }),
});

type ActorRun = z.infer<typeof runSchema>['data'];

const itemsSchema = z.array(z.record(z.unknown()));

export interface ApifyClientOptions {
  token: string;
  baseUrl?: string;
  requestTimeoutMs?: number;
  actorWaitSecs?: number;
  retry?: RetryPolicy;
  verbose?: boolean;
  wait?: (ms: number) => Promise<void>;
}

export class ApifyScrapingClient implements ScrapingClient {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly actorWaitSecs: number;
  private readonly retry: RetryPolicy;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: ApifyClientOptions) {
    this.baseUrl = options.baseUrl ?? APIFY_BASE_URL;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT;
    this.actorWaitSecs = options.actorWaitSecs ?? DEFAULT_ACTOR_WAIT_SECS;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.wait = options.wait ?? sleep;
  }

  async scrape(config: ScrapingConfig): Promise<ScrapingResult> {
    const startedAt = Date.now();

    if (config.datasetId) {
      this.log(`Reusing dataset ${config.datasetId} for ${config.name}`);
      return this.fetchDataset(config.datasetId, config);
    }

    this.log(`Starting actor ${config.actorId} for ${config.name}`);
    const started = await this.request(
      `/v2/acts/${encodeActorId(config.actorId)}/runs?waitForFinish=${this.waitSlice(0)}`,
      `Actor ${config.actorId}`,
      config.input
    );
    const run = await this.waitForRun(parseRun(started), startedAt);

    if (run.status !== 'SUCCEEDED') {
      throw new PipelineError(
        ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
        `Actor run ${run.id} for ${config.name} ended with status ${run.status}`,
        run.status === 'TIMED-OUT',
        'Check the run log in the Apify console',
        { runId: run.id, status: run.status }
      );
    }

    const items = await this.listItems(run.defaultDatasetId);
    return {
      items,
      datasetId: run.defaultDatasetId,
      totalItems: items.length,
      executionTimeMs: Date.now() - startedAt,
      config,
      fetchedAt: new Date().toISOString(),
    };
  }

  async fetchDataset(datasetId: string, config?: ScrapingConfig): Promise<ScrapingResult> {
    const startedAt = Date.now();
    const items = await this.listItems(datasetId);
    return {
      items,
      datasetId,
      totalItems: items.length,
      executionTimeMs: Date.now() - startedAt,
      ...(config ? { config } : {}),
      fetchedAt: new Date().toISOString(),
    };
  }

  private async waitForRun(run: ActorRun, startedAt: number): Promise<ActorRun> {
    let current = run;
    while (!TERMINAL_STATUSES.has(current.status)) {
      const elapsedSecs = Math.floor((Date.now() - startedAt) / 1000);
      if (elapsedSecs >= this.actorWaitSecs) {
        throw new PipelineError(
          ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
          `Actor run ${current.id} still ${current.status} after ${this.actorWaitSecs}s`,
          false,
          'Raise timeouts.actorWaitSecs or re-process the dataset later with fetch-dataset',
          { runId: current.id, datasetId: current.defaultDatasetId }
        );
      }
      this.log(`Run ${current.id} is ${current.status}, waiting`);
      const body = await this.request(
        `/v2/actor-runs/${current.id}?waitForFinish=${this.waitSlice(elapsedSecs)}`,
        `Actor run ${current.id}`
      );
      current = parseRun(body);
    }
    return current;
  }

  private async listItems(datasetId: string): Promise<RawRecord[]> {
    const body = await this.request(
      `/v2/datasets/${encodeURIComponent(datasetId)}/items?clean=true&format=json`,
      `Dataset ${datasetId}`
    );
    const parsed = itemsSchema.safeParse(body);
    if (!parsed.success) {
      throw new PipelineError(
        ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
        `Dataset ${datasetId} did not return a list of objects`
      );
    }
    this.log(`Dataset ${datasetId}: ${parsed.data.length} items`);
    return parsed.data;
  }

  /** POSTs `body` as JSON when given, otherwise GETs. Only GETs are retried. */
  private async request(path: string, what: string, body?: Readonly<JsonObject>): Promise<unknown> {
    // Long polls need room beyond the server-side wait
    const timeoutMs = this.requestTimeoutMs + MAX_WAIT_PER_REQUEST_SECS * 1000;

    return withRetry(
      async () => {
        const response = await fetchWithTimeout(
          `${this.baseUrl}${path}`,
          body === undefined
            ? { method: 'GET', headers: { Authorization: `Bearer ${this.options.token}` } }
            : {
                method: 'POST',
                body: JSON.stringify(body),
                headers: {
                  Authorization: `Bearer ${this.options.token}`,
                  'Content-Type': 'application/json',
                },
              },
          timeoutMs
        );
        if (!response.ok) {
          throw await releaseAndFail(response, what);
        }
        try {
          return await response.json();
        } catch {
          throw new PipelineError(ErrorCode.TRANSIENT_EXTERNAL_FAILURE, `${what} returned a non-JSON body`, true);
        }
      },
      body === undefined ? this.retry : START_RUN_POLICY,
      {
        wait: this.wait,
        onRetry: (error, attempt, delayMs) =>
          this.log(`${what} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${String(error)}`),
      }
    );
  }

  private waitSlice(elapsedSecs: number): number {
    return Math.max(1, Math.min(MAX_WAIT_PER_REQUEST_SECS, this.actorWaitSecs - elapsedSecs));
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[Scrape] ${message}`);
    }
  }
}

/** `owner/name` actor ids travel as `owner~name` in API paths */
export function encodeActorId(actorId: string): string {
  return encodeURIComponent(actorId.replace('/', '~'));
}

function parseRun(body: unknown): ActorRun {
  const parsed = runSchema.safeParse(body);
  if (!parsed.success) {
    throw new PipelineError(ErrorCode.TRANSIENT_EXTERNAL_FAILURE, 'Unexpected actor run response from Apify');
  }
  return parsed.data.data;
}
