import type { Writable } from "node:stream";
import type { OutputFormat } from "../types/config.js";

export type LogLevel = "error" | "warn" | "info" | "debug";

export type LogEvent = {
  level: LogLevel;
  code: string;
  message: string;
  component?: string;
  step?: number;
  details?: Record<string, unknown>;
};

export interface BuildLogger {
  log(event: LogEvent): void;
}

export type LoggerOptions = {
  format: OutputFormat;
  verbose?: boolean;
  stdout?: Writable;
  stderr?: Writable;
};

function humanLine(event: LogEvent): string {
  const scope =
    event.component === undefined ? "" : event.step === undefined ? `[${event.component}] ` : `[${event.component}#${event.step}] `;
  const prefix = event.level === "error" ? "error: " : event.level === "warn" ? "warning: " : "";
  return `${scope}${prefix}${event.message}`;
}

/**
 * Logger writing either one readable line or one JSON object per event.
 * Warnings and errors go to stderr. Debug events (command output) are dropped
 * unless verbose.
 */
export function createLogger(opts: LoggerOptions): BuildLogger {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;

  return {
    log(event: LogEvent): void {
      if (event.level === "debug" && !opts.verbose) return;
      const line = opts.format === "jsonl" ? JSON.stringify(event) : humanLine(event);
      const out = event.level === "error" || event.level === "warn" ? stderr : stdout;
      out.write(line + "\n");
    },
  };
}

/** Collects events in memory; for tests and for callers that render later. */
export class MemoryLogger implements BuildLogger {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  codes(): string[] {
    return this.events.map((e) => e.code);
  }
}
