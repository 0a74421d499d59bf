/**
 * @file Memory Transport
 * @description Keeps entries in memory so tests can inspect what was logged
 */

import type { ITransport, LogEntry, LogLevel } from "../types";

export class MemoryTransport implements ITransport {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
