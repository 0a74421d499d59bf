/**
 * @file Console Transport
 * @description Writes logs to stderr; stdout belongs to the prompt
 */

import { LOG_LEVELS, type ITransport, type IFormatter, type LogEntry, type LogFormat, type LogLevel } from "../types";
import { PrettyFormatter } from "../formatters/pretty";
import { JsonFormatter } from "../formatters/json";

export interface ConsoleTransportOptions {
  level?: LogLevel;
  format?: LogFormat;
  colors?: boolean;
  /** Destination, defaults to process.stderr */
  stream?: { write(chunk: string): unknown };
}

export class ConsoleTransport implements ITransport {
  private formatter: IFormatter;
  private minLevel: number;
  private stream: { write(chunk: string): unknown };

  constructor(options: ConsoleTransportOptions = {}) {
    const format = options.format || "pretty";
    this.formatter = format === "json"
      ? new JsonFormatter()
      : new PrettyFormatter({ colors: options.colors });
    this.minLevel = LOG_LEVELS[options.level || "trace"];
    this.stream = options.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    if (LOG_LEVELS[entry.level] < this.minLevel) return;
    this.stream.write(this.formatter.format(entry) + "\n");
  }
}
