// src/etl/loaders.ts — line-delimited JSON helpers shared by the catalog, the ETL CLI and scripts
import fs from 'node:fs/promises';
import path from 'node:path';

/** Parses every non-blank line; a malformed line fails with its 1-based line number. */
export function parseJsonl(content: string, source = 'input'): unknown[] {
  const rows: unknown[] = [];
  content.split(/\r?\n/).forEach((line, idx) => {
    if (!line.trim()) return;
    try {
      rows.push(JSON.parse(line));
    } catch (err) {
      throw new Error(`${source}:${idx + 1}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
  });
  return rows;
}

export async function readJsonl(filePath: string): Promise<unknown[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseJsonl(content, filePath);
}

export async function writeJsonl(filePath: string, rows: Iterable<unknown>): Promise<number> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const lines: string[] = [];
  for (const row of rows) lines.push(JSON.stringify(row));
  await fs.writeFile(filePath, lines.length ? `${lines.join('\n')}\n` : '', 'utf-8');
  return lines.length;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
