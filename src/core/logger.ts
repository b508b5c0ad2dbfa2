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

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  level: LogLevel;
  run_id: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  runId?: string;
  message?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

/** Event sink handed to every component that needs to report something. */
export type ScanLogger = {
  log: (event: LogEventInput) => void;
};

type EventDefaults = {
  runId?: string;
};

type LogFailureAction = "write" | "close";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements ScanLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly isDebugEnabled = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export function createConsoleLogger(
  options: { debug?: boolean; write?: (line: string) => void } = {},
): ScanLogger {
  const minimum: LogLevel = options.debug ? "debug" : "warn";
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    log(event) {
      const level = event.level ?? "info";
      if (LEVEL_ORDER[level] < LEVEL_ORDER[minimum]) return;
      write(formatConsoleLine(event, level));
    },
  };
}

export function combineLoggers(...loggers: Array<ScanLogger | undefined>): ScanLogger {
  const active = loggers.filter((logger): logger is ScanLogger => logger !== undefined);
  return {
    log(event) {
      for (const logger of active) {
        logger.log(event);
      }
    },
  };
}

export const silentLogger: ScanLogger = {
  log: () => undefined,
};

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const runId = event.runId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const result: LogEvent = {
    ts,
    type: event.type,
    level: event.level ?? "info",
    run_id: runId,
  };

  if (event.message) {
    result.message = event.message;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logWarning(
  logger: ScanLogger,
  type: string,
  message: string,
  payload: JsonObject = {},
): void {
  logger.log({ type, level: "warn", message, payload });
}

export function logDebug(
  logger: ScanLogger,
  type: string,
  message: string,
  payload: JsonObject = {},
): void {
  logger.log({ type, level: "debug", message, payload });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatConsoleLine(event: LogEventInput, level: LogLevel): string {
  const label = level === "warn" ? "warning" : level;
  const text = event.message ?? event.type;
  return `${label}: ${text}`;
}

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
