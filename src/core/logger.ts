import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: string;
  level: LogLevel;
  type: string;
  run_id: string;
  host?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  host?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type ReaperLogger = {
  log(event: LogEventInput): void;
  close?(): void;
};

type EventDefaults = {
  runId: string;
  host?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// FILE LOGGER
// =============================================================================

export class JsonlLogger implements ReaperLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults,
    private readonly debugEnabled = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(eventWithTs(event, this.defaults))}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.debugEnabled));
    }
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.debugEnabled));
    } finally {
      this.closed = true;
    }
  }
}

// =============================================================================
// STREAM LOGGERS
// =============================================================================

export function createStdoutLogger(defaults: EventDefaults): ReaperLogger {
  return {
    log(event: LogEventInput) {
      process.stdout.write(`${JSON.stringify(eventWithTs(event, defaults))}\n`);
    },
  };
}

export function createTeeLogger(loggers: ReaperLogger[]): ReaperLogger {
  return {
    log(event) {
      for (const logger of loggers) logger.log(event);
    },
    close() {
      for (const logger of loggers) logger.close?.();
    },
  };
}

// Drops debug-level events unless enabled.
export function withLevelFilter(logger: ReaperLogger, debugEnabled: boolean): ReaperLogger {
  return {
    log(event) {
      if (event.level === "debug" && !debugEnabled) return;
      logger.log(event);
    },
    close() {
      logger.close?.();
    },
  };
}

export function createRunLogger(options: {
  runId: string;
  logPath?: string;
  debug: boolean;
  stdout?: boolean;
}): ReaperLogger {
  const defaults = { runId: options.runId };
  const sinks: ReaperLogger[] = [];

  if (options.stdout ?? true) {
    sinks.push(createStdoutLogger(defaults));
  }
  if (options.logPath) {
    sinks.push(new JsonlLogger(options.logPath, defaults, options.debug));
  }

  return withLevelFilter(createTeeLogger(sinks), options.debug);
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults): LogEvent {
  const { ts, level, type, host, payload } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    level: level ?? "info",
    type,
    run_id: defaults.runId,
  };

  const resolvedHost = host ?? defaults.host;
  if (resolvedHost) {
    result.host = resolvedHost;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logHostEvent(
  logger: ReaperLogger,
  type: string,
  host: string,
  payload: JsonObject = {},
  level: LogLevel = "info",
): void {
  logger.log({ type, host, payload, level });
}

export function logError(logger: ReaperLogger, type: string, error: unknown, host?: string): void {
  logger.log({ type, host, level: "error", payload: { error: formatErrorMessage(error) } });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
