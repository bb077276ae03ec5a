import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ValidationError, assertTaskId, parseExchangeRecord, type Exchange } from '@refract/shared';

export interface TraceSnapshots {
  path: string;
  exchanges: Exchange[];
  /** Lines that were not valid trace records */
  skipped: number;
}

/** Trace files in `dir`, newest name first. A missing directory has no traces. */
export async function listTraceFiles(dir: string, limit = 10): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (e) {
    if (isMissing(e)) return [];
    throw e;
  }

  return entries
    .filter(name => name.endsWith('.jsonl'))
    .sort()
    .reverse()
    .slice(0, Math.max(0, limit))
    .map(name => join(dir, name));
}

export async function readTraceSnapshots(path: string): Promise<TraceSnapshots> {
  const content = await readFile(path, 'utf-8');
  const exchanges: Exchange[] = [];
  let skipped = 0;

  for (const line of content.split('\n')) {
    if (line.trim() === '') continue;
    try {
      exchanges.push(parseExchangeRecord(line));
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      skipped++;
    }
  }

  return { path, exchanges, skipped };
}

/** Throws `ValidationError` for ids that are not a plain file name. */
export async function readLatestSnapshot(dir: string, taskId: string): Promise<Exchange | undefined> {
  assertTaskId(taskId);
  let snapshots: TraceSnapshots;
  try {
    snapshots = await readTraceSnapshots(join(dir, `${taskId}.jsonl`));
  } catch (e) {
    if (isMissing(e)) return undefined;
    throw e;
  }
  return snapshots.exchanges.at(-1);
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
