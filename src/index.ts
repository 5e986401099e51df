/** li-squid - LinkedIn profile scraping through Lobstr.io squids */
export * from './services/index.js';
export * from './types.js';
export * from './errors.js';
export { loadConfig, createConfig, loadEnvFile, DEFAULT_API_URL } from './config.js';
export { logger, configureLogger } from './utils/logger.js';
