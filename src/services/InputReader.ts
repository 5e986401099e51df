/** Loads the target profile URLs */
import fs from 'fs/promises';
import { InputError } from '../errors.js';
import { InputSource } from '../types.js';

export const DEFAULT_INPUT_FILE = 'urls.txt';

export function validateUrl(value: string, line?: number): string {
  const where = line === undefined ? '' : ` (line ${line})`;
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new InputError(`Invalid URL${where}: ${value}`, line);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InputError(`Unsupported protocol ${parsed.protocol}${where}: ${value}`, line);
  }
  return value;
}

/** One URL per line; lines are trimmed, blank ones skipped, order kept */
export function parseUrlList(content: string): string[] {
  const urls: string[] = [];
  content.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line) urls.push(validateUrl(line, i + 1));
  });
  return urls;
}

export async function readUrlList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    throw new InputError(`Task file not found or unreadable: ${filePath}`);
  }
  const urls = parseUrlList(content.replace(/^\uFEFF/, ''));
  if (urls.length === 0) throw new InputError(`No URLs found in ${filePath}`);
  return urls;
}

/** `url` wins over `list`; with neither, the default list file is read */
export async function resolveInput(source: InputSource): Promise<string[]> {
  if (source.url !== undefined) {
    const url = source.url.trim();
    if (!url) throw new InputError('Empty --url value');
    return [validateUrl(url)];
  }
  return readUrlList(source.list ?? DEFAULT_INPUT_FILE);
}
