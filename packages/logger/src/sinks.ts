/** Log sinks */

import { appendFile } from 'node:fs/promises';
import type { LogEntry, LogSink } from './types';

/**
 * Appends entries to a file, one JSON object per line
 */
export function createFileSink(path: string): LogSink {
  return {
    async write(entries: LogEntry[]): Promise<void> {
      const lines = entries.map((entry) => JSON.stringify(entry)).join('\n');
      await appendFile(path, `${lines}\n`, 'utf8');
    },
  };
}

/**
 * Keeps entries in memory; `entries` holds everything written so far
 */
export interface MemorySink extends LogSink {
  readonly entries: LogEntry[];
}

export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    entries,
    async write(batch: LogEntry[]): Promise<void> {
      entries.push(...batch);
    },
  };
}
