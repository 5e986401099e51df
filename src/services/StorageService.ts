/** Storage service for run results */
import fs from 'fs/promises';
import path from 'path';
import { OutputFiles, ResultRecord } from '../types.js';

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** Union of record keys, in the order they are first seen */
export function csvHeaders(records: ResultRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

export function escapeCsv(value: unknown): string {
  let s: string;
  if (value === null || value === undefined) s = '';
  else if (typeof value === 'object') s = JSON.stringify(value);
  else s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(records: ResultRecord[]): string {
  if (records.length === 0) return '';
  const headers = csvHeaders(records);
  const lines = [headers.map(escapeCsv).join(',')].concat(
    records.map(r => headers.map(h => escapeCsv(r[h])).join(',')),
  );
  return lines.join('\n') + '\n';
}

export class StorageService {
  constructor(private outputDir: string) {}

  getPath(kind: 'json' | 'csv' | 'vendor.csv', at: Date): string {
    return path.join(this.outputDir, `results_${formatTimestamp(at)}.${kind}`);
  }

  private async write(filePath: string, content: string): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  async saveJson(records: ResultRecord[], at = new Date()): Promise<string> {
    return this.write(this.getPath('json', at), JSON.stringify(records, null, 2));
  }

  async saveCsv(records: ResultRecord[], at = new Date()): Promise<string> {
    return this.write(this.getPath('csv', at), toCsv(records));
  }

  async saveVendorCsv(content: string, at = new Date()): Promise<string> {
    return this.write(this.getPath('vendor.csv', at), content);
  }

  /** CSV and JSON under one shared timestamp */
  async saveResults(records: ResultRecord[], at = new Date()): Promise<OutputFiles> {
    const csv = await this.saveCsv(records, at);
    const json = await this.saveJson(records, at);
    return { csv, json };
  }
}
