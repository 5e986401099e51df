#!/usr/bin/env node
/**
 * li-squid CLI
 *
 * Usage:
 *   li-squid                          - Interactive run over ./urls.txt
 *   li-squid -l profiles.txt -e       - Non-interactive run, with email enrichment
 *   li-squid -u <profile_url>         - Scrape a single profile
 *   li-squid squids | accounts        - List LinkedIn squids / connected accounts
 *   li-squid delete-squid <id>        - Delete a squid
 */
import path from 'path';
import { createConfig, loadConfig, loadEnvFile } from './config.js';
import { RunFailedError, errorMessage } from './errors.js';
import {
  CommandHandlers,
  EXIT_ERROR,
  EXIT_INTERRUPTED,
  EXIT_OK,
  ScrapeFlags,
  buildProgram,
  exitCodeFor,
  toRunOptions,
} from './program.js';
import { LobstrClient } from './services/LobstrClient.js';
import { ScraperOrchestrator } from './services/ScraperOrchestrator.js';
import { SquidCache } from './services/SquidCache.js';
import { StorageService } from './services/StorageService.js';
import { TerminalPrompter } from './services/TerminalPrompter.js';
import { RunReport, ScraperConfig } from './types.js';
import { configureLogger, logger } from './utils/logger.js';

function setup(flags: Pick<ScrapeFlags, 'outputDir' | 'interval'> = {}): ScraperConfig {
  const overrides: Partial<ScraperConfig> = {};
  if (flags.outputDir) overrides.outputDir = flags.outputDir;
  if (flags.interval) overrides.pollIntervalMs = Math.round(flags.interval * 1000);
  const config = createConfig(loadConfig(), overrides);
  configureLogger({ level: config.logLevel, file: config.logFile });
  return config;
}

const handlers: CommandHandlers = {
  async scrape(flags) {
    const config = setup(flags);
    const prompter = new TerminalPrompter();
    const orchestrator = new ScraperOrchestrator(config, {
      client: new LobstrClient(config),
      cache: new SquidCache(config.cacheFile),
      storage: new StorageService(config.outputDir),
      prompter,
    });

    let report: RunReport;
    try {
      report = await orchestrator.run(toRunOptions(flags));
    } finally {
      prompter.close();
    }
    logger.info(`📊 Run ${report.runId} ${report.status} in ${report.duration.toFixed(1)}s`, {
      squid: report.squidId,
      urls: report.urlCount,
      records: report.recordCount,
    });
    if (report.status === 'failed') throw new RunFailedError(report.runId);
    return report.status === 'cancelled' ? EXIT_INTERRUPTED : EXIT_OK;
  },

  async squids() {
    const config = setup();
    const cached = await new SquidCache(config.cacheFile).read();
    for (const s of await new LobstrClient(config).listConfigurations()) {
      console.log(`${s.id}\t${s.name}\t${s.createdAt ?? ''}${s.id === cached ? '\t(last used)' : ''}`);
    }
    return EXIT_OK;
  },

  async accounts() {
    const config = setup();
    for (const a of await new LobstrClient(config).listAccounts()) console.log(`${a.id}\t${a.label}`);
    return EXIT_OK;
  },

  async deleteSquid(id) {
    const config = setup();
    await new LobstrClient(config).deleteConfiguration(id);
    const cache = new SquidCache(config.cacheFile);
    if ((await cache.read()) === id) await cache.clear();
    logger.info(`Squid ${id} deleted`);
    return EXIT_OK;
  },
};

async function main(): Promise<void> {
  loadEnvFile();
  // Errors raised before the config loads still reach a log file
  configureLogger({
    file: process.env.LOG_FILE || path.join(process.env.OUTPUT_DIR || '.', 'scraper.log'),
  });

  const settle = async (task: Promise<number>): Promise<void> => {
    try {
      process.exitCode = await task;
    } catch (error) {
      const code = exitCodeFor(error);
      if (code === EXIT_INTERRUPTED) logger.info('Script execution interrupted by user (exit)');
      else logger.error(`Scraper execution failed: ${errorMessage(error)}`);
      process.exitCode = code;
    }
  };
  await buildProgram(handlers, settle).parseAsync(process.argv);
}

main().catch(error => {
  console.error('❌ Error:', error);
  process.exit(EXIT_ERROR);
});
