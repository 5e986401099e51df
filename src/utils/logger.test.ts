import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, formatLine, logger } from './logger.js';

describe('logger', () => {
  let dir: string | undefined;

  afterEach(() => {
    configureLogger({ level: 'info', file: null, console: true });
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('formats timestamped lines with optional metadata', () => {
    const at = new Date('2024-01-02T03:04:05.000Z');

    expect(formatLine('info', 'hello', undefined, at)).toBe('[2024-01-02T03:04:05.000Z] [INFO] hello');
    expect(formatLine('warn', 'slow', { runId: 'r1' }, at)).toBe('[2024-01-02T03:04:05.000Z] [WARN] slow {"runId":"r1"}');
  });

  it('appends lines at or above the level to the run log', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'li-squid-log-'));
    const file = path.join(dir, 'nested', 'scraper.log');
    configureLogger({ level: 'info', file, console: false });

    logger.debug('hidden');
    logger.info('first');
    logger.error('second', { code: 'API' });

    const lines = fs.readFileSync(file, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\S+\] \[INFO\] first$/);
    expect(lines[1]).toMatch(/^\[\S+\] \[ERROR\] second \{"code":"API"\}$/);
  });
});
