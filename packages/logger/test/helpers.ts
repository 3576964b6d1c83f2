import type { LogEntry, LogSink } from '../src/types.js';

/** In-memory sink standing in for a persistent log store */
export class MemorySink implements LogSink {
  entries: LogEntry[] = [];
  writes = 0;
  failNext = false;

  async write(entries: readonly LogEntry[]): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('sink unavailable');
    }
    this.writes++;
    this.entries.push(...entries);
  }

  get count(): number {
    return this.entries.length;
  }

  last(): LogEntry | null {
    return this.entries.at(-1) ?? null;
  }

  clear(): void {
    this.entries = [];
    this.writes = 0;
  }
}

/** Collects console lines instead of printing them */
export function captureLines(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

export function waitForFlush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 10));
}
