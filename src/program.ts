/** Command-line surface: flags, sub-commands and exit codes */
import { Command, InvalidArgumentError } from 'commander';
import { AppError } from './errors.js';
import { RunOptions } from './types.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INTERRUPTED = 130;

export interface ScrapeFlags {
  url?: string;
  list?: string;
  email?: boolean;
  squid?: string;
  account?: string;
  newSquid?: boolean;
  empty?: boolean;
  interactive?: boolean;
  interval?: number;
  outputDir?: string;
  vendorCsv?: boolean;
}

/** Each handler resolves with the process exit code */
export interface CommandHandlers {
  scrape(flags: ScrapeFlags): Promise<number>;
  squids(): Promise<number>;
  accounts(): Promise<number>;
  deleteSquid(id: string): Promise<number>;
}

/** Polling interval in seconds; anything under a second would hammer the API */
export const parseSeconds = (value: string): number => {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 1) throw new InvalidArgumentError('Expected a number of seconds, at least 1.');
  return n;
};

/** Neither --url nor --list means prompts, unless -i forces them anyway */
export function toRunOptions(flags: ScrapeFlags): RunOptions {
  const explicitInput = flags.url !== undefined || flags.list !== undefined;
  return {
    input: { url: flags.url, list: flags.list },
    enrichEmail: flags.email ?? false,
    interactive: flags.interactive ?? !explicitInput,
    squidId: flags.squid,
    accountId: flags.account,
    newSquid: flags.newSquid ?? false,
    emptySquid: flags.empty ?? false,
    vendorCsv: flags.vendorCsv ?? false,
  };
}

export function exitCodeFor(error: unknown): number {
  return error instanceof AppError && error.code === 'INTERRUPTED' ? EXIT_INTERRUPTED : EXIT_ERROR;
}

/**
 * Builds the commander program. `settle` receives the handler's promise so
 * the caller decides how to turn it into an exit code.
 */
export function buildProgram(
  handlers: CommandHandlers,
  settle: (task: Promise<number>) => Promise<void>,
): Command {
  const program = new Command();

  program
    .name('li-squid')
    .description('Scrape LinkedIn profiles through Lobstr.io squids')
    .option('-u, --url <url>', 'single LinkedIn profile URL to scrape')
    .option('-l, --list <path>', 'file with one profile URL per line (default: urls.txt)')
    .option('-e, --email', 'enable email enrichment')
    .option('-s, --squid <id>', 'squid to use instead of the cached or prompted one')
    .option('-a, --account <id>', 'connected LinkedIn account to scrape with')
    .option('--new-squid', 'always create a new squid')
    .option('--empty', 'remove previous tasks from a reused squid')
    .option('-i, --interactive', 'prompt for choices even when an input is given')
    .option('--interval <seconds>', 'polling interval', parseSeconds)
    .option('-o, --output-dir <dir>', 'where results, log and squid cache are written')
    .option('--vendor-csv', "also download Lobstr's own CSV export")
    .action((flags: ScrapeFlags) => settle(handlers.scrape(flags)));

  program
    .command('squids')
    .description('list LinkedIn profile squids')
    .action(() => settle(handlers.squids()));

  program
    .command('accounts')
    .description('list connected LinkedIn accounts')
    .action(() => settle(handlers.accounts()));

  program
    .command('delete-squid <id>')
    .description('delete a squid (and forget it if it is the cached one)')
    .action((id: string) => settle(handlers.deleteSquid(id)));

  return program;
}
