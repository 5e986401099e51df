/* Leveled logger: console plus an append-only run log */
import fs from 'node:fs';
import path from 'node:path';
import { LogLevel } from '../types.js';

export type { LogLevel } from '../types.js';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Run log to append to; null logs to the console only */
  file?: string | null;
  console?: boolean;
}

const state: Required<LoggerOptions> = {
  level: 'info',
  file: null,
  console: true,
};

export function configureLogger(options: LoggerOptions): void {
  if (options.level) state.level = options.level;
  if (options.file !== undefined) state.file = options.file;
  if (options.console !== undefined) state.console = options.console;
  if (state.file) fs.mkdirSync(path.dirname(state.file), { recursive: true });
}

export function formatLine(level: LogLevel, msg: string, meta?: Record<string, unknown>, at = new Date()): string {
  const prefix = `[${at.toISOString()}] [${level.toUpperCase()}]`;
  return meta ? `${prefix} ${msg} ${JSON.stringify(meta)}` : `${prefix} ${msg}`;
}

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (levelOrder[level] < levelOrder[state.level]) return;
  const line = formatLine(level, msg, meta);
  if (state.console) (level === 'error' || level === 'warn' ? console.error : console.log)(line);
  if (state.file) fs.appendFileSync(state.file, line + '\n', 'utf-8');
}

export const logger = {
  debug: (m: string, meta?: Record<string, unknown>) => log('debug', m, meta),
  info: (m: string, meta?: Record<string, unknown>) => log('info', m, meta),
  warn: (m: string, meta?: Record<string, unknown>) => log('warn', m, meta),
  error: (m: string, meta?: Record<string, unknown>) => log('error', m, meta),
};
