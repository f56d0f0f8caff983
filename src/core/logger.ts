import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

interface EventLoggerOptions {
  level?: LogLevel;
  filePath?: string | null;
  bindings?: LogFields;
}

/**
 * Writes one JSON line per event: `{ ts, level, event, ...fields }`.
 * Errors go to stderr, the rest to stdout; lines are also appended to
 * `filePath` when one is configured.
 */
export class EventLogger implements Logger {
  private readonly level: LogLevel;
  private readonly filePath: string | null;
  private readonly bindings: LogFields;

  constructor(options: EventLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.filePath = options.filePath ?? null;
    this.bindings = options.bindings ?? {};
    if (this.filePath) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  debug(event: string, fields?: LogFields): void {
    this.write("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.write("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.write("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.write("error", event, fields);
  }

  child(bindings: LogFields): Logger {
    return new EventLogger({
      level: this.level,
      filePath: this.filePath,
      bindings: { ...this.bindings, ...bindings }
    });
  }

  private write(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...this.bindings,
      ...fields
    }, jsonReplacer);

    if (this.filePath) {
      fs.appendFileSync(this.filePath, `${line}\n`);
    }
    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const jsonReplacer = (_key: string, value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
};
