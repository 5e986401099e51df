/** Orchestrates one scraping run: squid -> account -> input -> submit -> poll -> export */
import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { SelectionError, TransportError, errorMessage } from '../errors.js';
import { Account, OutputFiles, RunOptions, RunOutcome, RunReport, RunState, ScraperConfig, Squid } from '../types.js';
import { logger } from '../utils/logger.js';
import { resolveInput } from './InputReader.js';
import { JobClient, LINKEDIN_PROFILE_CRAWLER_ID, TerminalStatus, isTerminal } from './LobstrClient.js';
import { SquidCache } from './SquidCache.js';
import { StorageService } from './StorageService.js';
import { Prompter } from './TerminalPrompter.js';

/** Consecutive transport failures tolerated while polling */
const MAX_POLL_FAILURES = 5;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves early, without throwing, when the signal fires */
export const interruptibleSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!(error instanceof Error && error.name === 'AbortError')) throw error;
  }
};

export interface OrchestratorDeps {
  client: JobClient;
  cache: SquidCache;
  storage: StorageService;
  prompter: Prompter;
  /** Source of SIGINT; the process unless a test substitutes one */
  signals?: EventEmitter;
  sleep?: Sleep;
}

interface SquidChoice {
  squidId: string;
  reused: boolean;
}

export class ScraperOrchestrator {
  private current: RunState = 'idle';
  private readonly signals: EventEmitter;
  private readonly sleep: Sleep;

  constructor(
    private config: Pick<ScraperConfig, 'pollIntervalMs' | 'csvGenerationWaitMs'>,
    private deps: OrchestratorDeps,
  ) {
    this.signals = deps.signals ?? process;
    this.sleep = deps.sleep ?? interruptibleSleep;
  }

  get state(): RunState {
    return this.current;
  }

  private transition(next: RunState): void {
    logger.debug(`State: ${this.current} -> ${next}`);
    this.current = next;
  }

  async run(options: RunOptions): Promise<RunReport> {
    if (this.current !== 'idle') throw new Error('This orchestrator has already driven a run');

    const startedAt = new Date();
    const interactive = options.interactive ?? false;
    const { client, storage } = this.deps;

    // Input problems must surface before anything touches the API
    const urls = await resolveInput(options.input);
    logger.info(`🚀 Starting scrape of ${urls.length} URL(s) (${interactive ? 'interactive' : 'non-interactive'})`);

    const { squidId, reused } = await this.selectSquid(options, interactive);
    this.transition('config-selected');

    const accountId = await this.selectAccount(options, interactive);
    this.transition('account-selected');

    let empty = false;
    if (reused) {
      empty = options.emptySquid ?? false;
      if (!empty && interactive) empty = await this.confirm('Empty existing tasks from this Squid? (y/N): ');
    }
    this.transition('input-loaded');

    const runId = await client.submit({
      squidId,
      accountId,
      urls,
      enrichEmail: options.enrichEmail ?? false,
      empty,
    });
    this.transition('submitted');

    const status = await this.pollUntilDone(runId);

    let outcome: RunOutcome;
    let recordCount = 0;
    let files: OutputFiles | undefined;
    if (status === 'done') {
      const records = await client.fetchResults(runId);
      const at = new Date();
      files = await storage.saveResults(records, at);
      if (options.vendorCsv) {
        try {
          const vendorCsv = await this.downloadVendorCsv(runId, at);
          if (vendorCsv) files.vendorCsv = vendorCsv;
        } catch (error) {
          logger.warn(`Vendor CSV export failed, keeping local results: ${errorMessage(error)}`);
        }
      }
      recordCount = records.length;
      logger.info(`✅ Saved ${recordCount} profiles`, { csv: files.csv, json: files.json });
      outcome = 'completed';
    } else if (status === 'failed') {
      logger.error(`❌ Run ${runId} failed on the remote side; no result files written`);
      outcome = 'failed';
    } else {
      logger.warn(`Run ${runId} was cancelled; no result files written`);
      outcome = 'cancelled';
    }
    this.transition(outcome);

    const completedAt = new Date();
    return {
      status: outcome,
      squidId,
      runId,
      urlCount: urls.length,
      recordCount,
      files,
      startedAt,
      completedAt,
      duration: (completedAt.getTime() - startedAt.getTime()) / 1000,
    };
  }

  // ---- squid selection ----

  private async selectSquid(options: RunOptions, interactive: boolean): Promise<SquidChoice> {
    const { client, cache } = this.deps;

    if (options.squidId) {
      const squid = await client.getConfiguration(options.squidId);
      if (!squid) throw new SelectionError(`Squid ${options.squidId} does not exist`);
      if (!runsProfileCrawler(squid)) {
        throw new SelectionError(`Squid ${squid.id} does not run the LinkedIn profile crawler`);
      }
      logger.info(`Using squid ${squid.id} (${squid.name})`);
      return this.remember(squid.id, true);
    }
    if (options.newSquid) return this.createSquid();

    const cachedId = await cache.read();
    if (interactive) return this.promptSquid(cachedId);

    if (cachedId) {
      const cached = await client.getConfiguration(cachedId);
      if (cached && !runsProfileCrawler(cached)) {
        logger.warn(`Cached squid ${cachedId} runs another crawler, creating a new one`);
        return this.createSquid();
      }
      if (cached) {
        logger.info(`Reusing cached squid ${cached.id} (${cached.name})`);
        return this.remember(cached.id, true);
      }
      logger.warn(`Cached squid ${cachedId} no longer exists, creating a new one`);
      return this.createSquid();
    }

    const squids = await client.listConfigurations();
    if (squids.length === 0) return this.createSquid();
    if (squids.length === 1) {
      logger.info(`Using the only LinkedIn squid ${squids[0].id} (${squids[0].name})`);
      return this.remember(squids[0].id, true);
    }
    throw new SelectionError(
      `Found ${squids.length} LinkedIn squids and no cached default; pass --squid <id> or --new-squid`,
    );
  }

  private async promptSquid(cachedId: string | null): Promise<SquidChoice> {
    const { client, prompter } = this.deps;
    const squids = await client.listConfigurations();
    if (squids.length === 0) {
      logger.info('No existing LinkedIn squids found. Creating a new one.');
      return this.createSquid();
    }

    const last = squids.find(s => s.id === cachedId);
    if (cachedId && !last) logger.warn(`Cached squid ${cachedId} no longer exists`);

    prompter.print('\n--- Available LinkedIn Squids ---');
    squids.forEach((s, i) => prompter.print(describeSquid(s, i, s === last)));
    prompter.print('[N] Create New Squid');
    prompter.print('---------------------------------');

    const answer = await prompter.ask(
      last ? `Select a Squid (number), 'N' for new, Enter for ${last.id}: ` : "Select a Squid (number) or 'N' for new: ",
    );
    if (!answer && last) return this.remember(last.id, true);
    if (answer.toLowerCase() === 'n') return this.createSquid();

    const picked = pickByNumber(squids, answer);
    if (picked) {
      logger.info(`Selected existing squid: ${picked.id}`);
      return this.remember(picked.id, true);
    }
    prompter.print('Invalid selection. Creating new squid.');
    return this.createSquid();
  }

  private async createSquid(): Promise<SquidChoice> {
    return this.remember(await this.deps.client.createConfiguration(), false);
  }

  private async remember(squidId: string, reused: boolean): Promise<SquidChoice> {
    await this.deps.cache.write(squidId);
    return { squidId, reused };
  }

  // ---- account selection ----

  private async selectAccount(options: RunOptions, interactive: boolean): Promise<string> {
    const { client, prompter } = this.deps;
    const accounts = await client.listAccounts();
    if (accounts.length === 0) {
      throw new SelectionError('No LinkedIn accounts found. Connect a LinkedIn account on Lobstr.io first.');
    }

    if (options.accountId) {
      const account = accounts.find(a => a.id === options.accountId);
      if (!account) throw new SelectionError(`Account ${options.accountId} is not a connected LinkedIn account`);
      return account.id;
    }
    if (accounts.length === 1) {
      logger.info(`Auto-selecting only available LinkedIn account: ${accounts[0].label}`);
      return accounts[0].id;
    }
    if (!interactive) {
      throw new SelectionError(`Found ${accounts.length} LinkedIn accounts; pass --account <id>`);
    }

    prompter.print('\n--- Available Accounts ---');
    accounts.forEach((a, i) => prompter.print(describeAccount(a, i)));
    prompter.print('--------------------------');
    for (;;) {
      const picked = pickByNumber(accounts, await prompter.ask('Select an Account (number): '));
      if (picked) {
        logger.info(`Selected account: ${picked.id}`);
        return picked.id;
      }
      prompter.print('Invalid selection. Try again.');
    }
  }

  // ---- polling ----

  /**
   * Polls until the run leaves queued/running. SIGINT only wakes the sleep
   * between polls; the request in flight always completes first.
   */
  private async pollUntilDone(runId: string): Promise<TerminalStatus> {
    const { client } = this.deps;
    let interrupted = false;
    let wake = new AbortController();
    const onInterrupt = () => {
      interrupted = true;
      wake.abort();
    };

    this.transition('polling');
    this.signals.on('SIGINT', onInterrupt);
    try {
      let failures = 0;
      for (;;) {
        try {
          const { status, percentDone } = await client.poll(runId);
          failures = 0;
          logger.info(`Progress: ${percentDone}% done (${status})`);
          if (isTerminal(status)) return status;
        } catch (error) {
          if (!(error instanceof TransportError) || ++failures >= MAX_POLL_FAILURES) throw error;
          logger.warn(`Polling run ${runId} failed (${failures}/${MAX_POLL_FAILURES}): ${errorMessage(error)}`);
        }

        await this.sleep(this.config.pollIntervalMs, wake.signal);
        if (!interrupted) continue;

        interrupted = false;
        wake = new AbortController();
        this.signals.off('SIGINT', onInterrupt);
        this.deps.prompter.print('\n[!] Execution interrupted by user.');
        const abort = await this.confirm('Abort the remote run as well? (y/N): ');
        this.signals.on('SIGINT', onInterrupt);

        if (abort) {
          await client.cancel(runId);
          logger.info(`Run ${runId} aborted by user`);
          return 'cancelled';
        }
        logger.info('Resuming polling');
      }
    } finally {
      this.signals.off('SIGINT', onInterrupt);
    }
  }

  // ---- exports ----

  private async downloadVendorCsv(runId: string, at: Date): Promise<string | undefined> {
    const { client, storage } = this.deps;
    const url = await client.getExportUrl(runId);
    if (!url) {
      logger.warn(`No CSV export offered for run ${runId}`);
      return undefined;
    }
    logger.info(`Waiting ${this.config.csvGenerationWaitMs}ms for CSV generation...`);
    await this.sleep(this.config.csvGenerationWaitMs);
    return storage.saveVendorCsv(await client.downloadExport(url), at);
  }

  private async confirm(question: string): Promise<boolean> {
    const answer = (await this.deps.prompter.ask(question)).toLowerCase();
    return answer === 'y' || answer === 'yes';
  }
}

/** Squid payloads without a crawler field are taken at their word */
function runsProfileCrawler(s: Squid): boolean {
  return !s.crawler || s.crawler === LINKEDIN_PROFILE_CRAWLER_ID;
}

function describeSquid(s: Squid, i: number, isLast: boolean): string {
  const created = s.createdAt ? ` | Created: ${s.createdAt}` : '';
  return `[${i + 1}] ID: ${s.id} | Name: ${s.name}${created}${isLast ? ' (last used)' : ''}`;
}

function describeAccount(a: Account, i: number): string {
  return `[${i + 1}] ID: ${a.id} | Username: ${a.label} | Type: ${a.type}`;
}

function pickByNumber<T>(items: T[], answer: string): T | undefined {
  if (!/^\d+$/.test(answer)) return undefined;
  return items[parseInt(answer, 10) - 1];
}
