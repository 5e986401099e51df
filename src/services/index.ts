export { LobstrClient, LINKEDIN_PROFILE_CRAWLER_ID, isTerminal, toRunProgress } from './LobstrClient.js';
export type { JobClient, SubmitRequest, TerminalStatus } from './LobstrClient.js';
export { ScraperOrchestrator, interruptibleSleep } from './ScraperOrchestrator.js';
export type { OrchestratorDeps, Sleep } from './ScraperOrchestrator.js';
export { SquidCache } from './SquidCache.js';
export { StorageService, formatTimestamp, toCsv } from './StorageService.js';
export { TerminalPrompter } from './TerminalPrompter.js';
export type { Prompter } from './TerminalPrompter.js';
export { readUrlList, resolveInput, parseUrlList, DEFAULT_INPUT_FILE } from './InputReader.js';
