/** Shared types for the scraper */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ScraperConfig {
  apiKey: string;
  apiUrl: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  csvGenerationWaitMs: number;
  outputDir: string;
  logFile: string;
  cacheFile: string;
  logLevel: LogLevel;
}

/** A saved scraping task definition on the vendor platform */
export interface Squid {
  id: string;
  name: string;
  crawler: string;
  createdAt?: string;
}

/** A LinkedIn login connected to the vendor platform */
export interface Account {
  id: string;
  label: string;
  type: string;
}

export type RunStatus = 'queued' | 'running' | 'done' | 'failed' | 'cancelled';

export interface RunProgress {
  status: RunStatus;
  percentDone: number;
}

/** One scraped profile, as returned by the vendor */
export type ResultRecord = Record<string, unknown>;

export type RunState =
  | 'idle'
  | 'config-selected'
  | 'account-selected'
  | 'input-loaded'
  | 'submitted'
  | 'polling'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type RunOutcome = Extract<RunState, 'completed' | 'failed' | 'cancelled'>;

export interface InputSource {
  url?: string;
  list?: string;
}

export interface RunOptions {
  input: InputSource;
  enrichEmail?: boolean;
  interactive?: boolean;
  squidId?: string;
  accountId?: string;
  newSquid?: boolean;
  emptySquid?: boolean;
  vendorCsv?: boolean;
}

export interface OutputFiles {
  csv: string;
  json: string;
  vendorCsv?: string;
}

export interface RunReport {
  status: RunOutcome;
  squidId: string;
  runId: string;
  urlCount: number;
  recordCount: number;
  files?: OutputFiles;
  startedAt: Date;
  completedAt: Date;
  duration: number;
}
