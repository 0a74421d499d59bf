/**
 * @file Pretty Formatter
 * @description Human-readable log lines for terminals
 *
 * Colors follow the same NO_COLOR rules as prompt output.
 */

import { shouldUseColors } from "../../format/style";
import type { IFormatter, LogEntry, LogLevel } from "../types";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m", // Gray
  debug: "\x1b[36m", // Cyan
  info: "\x1b[32m", // Green
  warn: "\x1b[33m", // Yellow
  error: "\x1b[31m", // Red
  fatal: "\x1b[35m", // Magenta
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

export class PrettyFormatter implements IFormatter {
  private useColors: boolean;

  constructor(options: { colors?: boolean } = {}) {
    this.useColors = options.colors ?? shouldUseColors();
  }

  format(entry: LogEntry): string {
    const parts: string[] = [];

    parts.push(this.dimText(clockTime(entry.timestamp)));
    parts.push(this.colorText(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]));

    if (entry.component) {
      parts.push(this.dimText(`[${entry.component}]`));
    }

    parts.push(entry.message);

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = Object.entries(entry.metadata)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(this.dimText(metaStr));
    }

    if (entry.durationMs !== undefined) {
      parts.push(this.dimText(`${entry.durationMs}ms`));
    }

    let output = parts.join(" ");

    if (entry.error) {
      output += "\n" + this.colorText(entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`, LEVEL_COLORS.error);
    }

    return output;
  }

  private colorText(text: string, color: string): string {
    if (!this.useColors) return text;
    return `${color}${text}${RESET}`;
  }

  private dimText(text: string): string {
    if (!this.useColors) return text;
    return `${DIM}${text}${RESET}`;
  }
}

/** HH:MM:SS.mmm of an ISO timestamp, in UTC */
function clockTime(iso: string): string {
  return iso.slice(11, 23);
}
