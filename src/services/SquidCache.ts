/** Remembers the last squid used, so the next run can reuse it */
import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

export class SquidCache {
  constructor(private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<string | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    const id = content.split(/\r?\n/, 1)[0].trim();
    return id || null;
  }

  /** A failed write only costs the reuse on the next run, so it is logged, not thrown */
  async write(id: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, id, 'utf-8');
    } catch (error) {
      logger.warn(`Failed to write squid cache ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
