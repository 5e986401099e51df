/** Error kinds surfaced to the CLI */

export type ErrorCode =
  | 'CONFIG'
  | 'INPUT'
  | 'SELECTION'
  | 'TRANSPORT'
  | 'API'
  | 'RUN_FAILED'
  | 'INTERRUPTED';

export class AppError extends Error {
  constructor(message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Missing or malformed API key / environment value */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** Missing URL list, empty list or a malformed URL */
export class InputError extends AppError {
  constructor(message: string, public readonly line?: number) {
    super(message, 'INPUT');
    this.name = 'InputError';
  }
}

/** A squid or account could not be resolved without asking */
export class SelectionError extends AppError {
  constructor(message: string) {
    super(message, 'SELECTION');
    this.name = 'SelectionError';
  }
}

/** Network unreachable, DNS failure or request timeout */
export class TransportError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSPORT', { cause });
    this.name = 'TransportError';
  }
}

/** The API answered, but with a failure (bad key, no credits, unknown id...) */
export class ApiError extends AppError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string = '',
  ) {
    super(message, 'API');
    this.name = 'ApiError';
  }
}

/** The remote run finished in a failed state */
export class RunFailedError extends AppError {
  constructor(public readonly runId: string) {
    super(`Run ${runId} failed on the remote side`, 'RUN_FAILED');
    this.name = 'RunFailedError';
  }
}

/** Ctrl+C while a prompt was open */
export class InterruptError extends AppError {
  constructor() {
    super('Interrupted by user', 'INTERRUPTED');
    this.name = 'InterruptError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
