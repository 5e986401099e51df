/**
 * LobstrClient - thin wrapper over the Lobstr.io REST API
 *
 * Resource model:
 * - squid   : a saved crawler configuration (here always the LinkedIn profile crawler)
 * - account : a connected LinkedIn login ("linkedin-sync") the crawler scrapes with
 * - task    : one input URL attached to a squid
 * - run     : one execution of a squid over its tasks
 *
 * Nothing here retries. Transport failures surface as TransportError, non-2xx
 * answers and unexpected bodies as ApiError.
 */
import { z } from 'zod';
import { ApiError, TransportError, errorMessage } from '../errors.js';
import {
  accountListSchema,
  createdSchema,
  downloadSchema,
  resultPageSchema,
  runStatsSchema,
  squidListSchema,
  squidSchema,
  RunStatsPayload,
  SquidPayload,
} from '../schemas.js';
import { Account, ResultRecord, RunProgress, RunStatus, ScraperConfig, Squid } from '../types.js';
import { logger } from '../utils/logger.js';

export const LINKEDIN_PROFILE_CRAWLER_ID = '5c11752d8687df2332c08247c4fb655a';
export const LINKEDIN_ACCOUNT_TYPE = 'linkedin-sync';
export const RESULTS_PAGE_SIZE = 100;

export interface SubmitRequest {
  squidId: string;
  accountId: string;
  urls: string[];
  enrichEmail: boolean;
  /** Drop the squid's previous tasks before adding the new ones */
  empty?: boolean;
}

/** What the orchestrator needs from the remote side */
export interface JobClient {
  listConfigurations(): Promise<Squid[]>;
  getConfiguration(id: string): Promise<Squid | null>;
  createConfiguration(name?: string): Promise<string>;
  listAccounts(): Promise<Account[]>;
  submit(request: SubmitRequest): Promise<string>;
  poll(runId: string): Promise<RunProgress>;
  fetchResults(runId: string): Promise<ResultRecord[]>;
  cancel(runId: string): Promise<void>;
  getExportUrl(runId: string): Promise<string | null>;
  downloadExport(url: string): Promise<string>;
}

type ClientConfig = Pick<ScraperConfig, 'apiKey' | 'apiUrl' | 'requestTimeoutMs'>;

type Query = Record<string, string | number>;

interface RawResponse {
  status: number;
  text: string;
}

const STATUS_ALIASES: Record<string, RunStatus> = {
  pending: 'queued',
  queued: 'queued',
  waiting: 'queued',
  running: 'running',
  in_progress: 'running',
  active: 'running',
  done: 'done',
  finished: 'done',
  completed: 'done',
  success: 'done',
  succeeded: 'done',
  error: 'failed',
  failed: 'failed',
  failure: 'failed',
  aborted: 'cancelled',
  cancelled: 'cancelled',
  canceled: 'cancelled',
  stopped: 'cancelled',
};

export type TerminalStatus = Exclude<RunStatus, 'queued' | 'running'>;

export const isTerminal = (status: RunStatus): status is TerminalStatus =>
  status !== 'queued' && status !== 'running';

/**
 * Maps a `/runs/{id}/stats` payload to one of the five run statuses. A
 * recognised `status` string wins; otherwise `is_done` and `percent_done`
 * decide.
 */
export function toRunProgress(stats: RunStatsPayload): RunProgress {
  const raw = stats.percent_done ?? 0;
  const parsed = typeof raw === 'number' ? raw : parseFloat(raw);
  const percentDone = Number.isFinite(parsed) ? parsed : 0;

  const named = stats.status ? STATUS_ALIASES[stats.status.trim().toLowerCase()] : undefined;
  let status: RunStatus;
  if (stats.is_done) {
    status = named && isTerminal(named) ? named : 'done';
  } else if (named) {
    status = named;
  } else {
    status = percentDone > 0 ? 'running' : 'queued';
  }
  return { status, percentDone };
}

const toSquid = (s: SquidPayload): Squid => ({
  id: s.id,
  name: s.name ?? s.id,
  crawler: s.crawler ?? '',
  createdAt: s.created_at ?? undefined,
});

export class LobstrClient implements JobClient {
  constructor(private config: ClientConfig) {}

  // ---- squids ----

  async listConfigurations(): Promise<Squid[]> {
    const body = await this.request('GET', '/squids', squidListSchema);
    const squids = body.data.filter(s => s.crawler === LINKEDIN_PROFILE_CRAWLER_ID).map(toSquid);
    logger.info(`Fetched ${body.data.length} squids, ${squids.length} LinkedIn profile squids`);
    return squids;
  }

  /** Null when the squid no longer exists */
  async getConfiguration(id: string): Promise<Squid | null> {
    try {
      return toSquid(await this.request('GET', `/squids/${encodeURIComponent(id)}`, squidSchema));
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) return null;
      throw error;
    }
  }

  async createConfiguration(name?: string): Promise<string> {
    logger.info(`Creating new squid for crawler ${LINKEDIN_PROFILE_CRAWLER_ID}...`);
    const { id } = await this.request('POST', '/squids', createdSchema, {
      body: { crawler: LINKEDIN_PROFILE_CRAWLER_ID, ...(name ? { name } : {}) },
    });
    logger.info(`Squid created: ${id}`);
    return id;
  }

  async updateConfiguration(id: string, accountId: string, enrichEmail: boolean): Promise<void> {
    logger.info(`Updating squid ${id} with account ${accountId} (email enrichment: ${enrichEmail})`);
    await this.request('POST', `/squids/${encodeURIComponent(id)}`, z.unknown(), {
      body: {
        accounts: [accountId],
        no_line_breaks: true,
        params: { functions: { email: enrichEmail } },
      },
    });
  }

  async emptyConfiguration(id: string): Promise<void> {
    logger.info(`Emptying squid ${id}...`);
    await this.request('POST', `/squids/${encodeURIComponent(id)}/empty`, z.unknown(), { body: { type: 'url' } });
  }

  async deleteConfiguration(id: string): Promise<void> {
    logger.info(`Deleting squid ${id}...`);
    await this.request('DELETE', `/squids/${encodeURIComponent(id)}`, z.unknown());
  }

  // ---- accounts ----

  async listAccounts(): Promise<Account[]> {
    const body = await this.request('GET', '/accounts', accountListSchema);
    const accounts = body.data
      .filter(a => a.type === LINKEDIN_ACCOUNT_TYPE)
      .map(a => ({ id: a.id, label: a.username ?? a.id, type: a.type ?? LINKEDIN_ACCOUNT_TYPE }));
    logger.info(`Fetched ${body.data.length} accounts, ${accounts.length} LinkedIn accounts`);
    return accounts;
  }

  // ---- tasks & runs ----

  async addTasks(squidId: string, urls: string[]): Promise<number> {
    logger.info(`Adding ${urls.length} tasks to squid ${squidId}...`);
    await this.request('POST', '/tasks', z.unknown(), {
      body: { tasks: urls.map(url => ({ url })), squid: squidId },
    });
    return urls.length;
  }

  async startRun(squidId: string): Promise<string> {
    const { id } = await this.request('POST', '/runs', createdSchema, { body: { squid: squidId } });
    logger.info(`Run started: ${id}`);
    return id;
  }

  /** Configure the squid, load the URLs and start a run */
  async submit(request: SubmitRequest): Promise<string> {
    await this.updateConfiguration(request.squidId, request.accountId, request.enrichEmail);
    if (request.empty) await this.emptyConfiguration(request.squidId);
    await this.addTasks(request.squidId, request.urls);
    return this.startRun(request.squidId);
  }

  async poll(runId: string): Promise<RunProgress> {
    const stats = await this.request('GET', `/runs/${encodeURIComponent(runId)}/stats`, runStatsSchema);
    return toRunProgress(stats);
  }

  async cancel(runId: string): Promise<void> {
    logger.info(`Aborting run ${runId}...`);
    await this.request('POST', `/runs/${encodeURIComponent(runId)}/abort`, z.unknown());
  }

  // ---- results ----

  async fetchResults(runId: string): Promise<ResultRecord[]> {
    const records: ResultRecord[] = [];
    for (let page = 1; ; page++) {
      const body = await this.request('GET', '/results', resultPageSchema, {
        query: { run: runId, page, page_size: RESULTS_PAGE_SIZE },
      });
      if (Array.isArray(body)) {
        records.push(...body);
        break;
      }
      records.push(...body.data);
      const total = body.total_results;
      if (body.data.length < RESULTS_PAGE_SIZE || (total != null && records.length >= total)) break;
    }
    logger.info(`Fetched ${records.length} results for run ${runId}`);
    return records;
  }

  /** Signed URL of the vendor-generated CSV, or null when none is offered */
  async getExportUrl(runId: string): Promise<string | null> {
    const body = await this.request('GET', `/runs/${encodeURIComponent(runId)}/download`, downloadSchema);
    return body.s3 ?? null;
  }

  async downloadExport(url: string): Promise<string> {
    const { text } = await this.send('GET', url, undefined, false);
    return text;
  }

  // ---- plumbing ----

  private url(path: string, query?: Query): string {
    const url = new URL(this.config.apiUrl + path);
    for (const [key, value] of Object.entries(query ?? {})) url.searchParams.set(key, String(value));
    return url.toString();
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    init: { body?: unknown; query?: Query } = {},
  ): Promise<z.output<S>> {
    const { status, text } = await this.send(method, this.url(path, init.query), init.body, true);

    let json: unknown = {};
    if (text.trim()) {
      try {
        json = JSON.parse(text);
      } catch {
        throw new ApiError(`${method} ${path}: response is not JSON`, status, text);
      }
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ApiError(`${method} ${path}: unexpected response (${parsed.error.issues[0]?.message})`, status, text);
    }
    return parsed.data;
  }

  private async send(method: string, url: string, body: unknown, auth: boolean): Promise<RawResponse> {
    const headers: Record<string, string> = {};
    if (auth) {
      headers['Authorization'] = `Token ${this.config.apiKey}`;
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new TransportError(`${method} ${new URL(url).pathname} failed: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      const detail = text.trim().slice(0, 200) || response.statusText;
      throw new ApiError(`${method} ${new URL(url).pathname} returned ${response.status}: ${detail}`, response.status, text);
    }
    return { status: response.status, text };
  }
}
