import type { RunLogLevel, RunLogRow } from "../types.js";

export interface RunLoggerStats {
  event_count: number;
  model_event_count: number;
  warning_count: number;
  flush_error_count: number;
}

export type InsertRunLogs = (rows: RunLogRow[]) => Promise<void>;

interface RunLoggerOptions {
  runId: string;
  retentionHours: number;
  flushBatchSize: number;
  insertBatch: InsertRunLogs;
  consoleWrite?: (line: string) => void;
  now?: () => Date;
  minConsoleLevel?: RunLogLevel;
}

const LEVEL_ORDER: Record<RunLogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const MAX_PAYLOAD_BYTES = 16_000;
const MAX_DEPTH = 4;
const MAX_ARRAY_ITEMS = 25;
const MAX_OBJECT_KEYS = 40;
const MAX_STRING_CHARS = 600;

function shrink(value: unknown, depth: number): unknown {
  if (depth >= MAX_DEPTH) {
    return "[depth_limit]";
  }
  if (typeof value === "string") {
    return value.length > MAX_STRING_CHARS ? `${value.slice(0, MAX_STRING_CHARS)}…` : value;
  }
  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_ITEMS).map((item) => shrink(item, depth + 1));
    if (value.length > MAX_ARRAY_ITEMS) {
      items.push(`[+${value.length - MAX_ARRAY_ITEMS} items]`);
    }
    return items;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value);
    const output: Record<string, unknown> = {};
    for (const [key, entry] of entries.slice(0, MAX_OBJECT_KEYS)) {
      output[key] = shrink(entry, depth + 1);
    }
    if (entries.length > MAX_OBJECT_KEYS) {
      output.__dropped_keys = entries.length - MAX_OBJECT_KEYS;
    }
    return output;
  }
  return value;
}

function toPayload(value: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!value) {
    return {};
  }

  let serialized: string;
  try {
    serialized = JSON.stringify(value);
  } catch {
    return { payload_serialization_error: true };
  }

  const parsed: unknown = JSON.parse(serialized);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { value: parsed };
  }

  const size = Buffer.byteLength(serialized, "utf8");
  if (size <= MAX_PAYLOAD_BYTES) {
    return Object.fromEntries(Object.entries(parsed));
  }

  const shrunk = shrink(parsed, 0);
  return {
    __payload_truncated: true,
    __original_size_bytes: size,
    ...(typeof shrunk === "object" && shrunk !== null ? Object.fromEntries(Object.entries(shrunk)) : {}),
  };
}

/**
 * Structured run log. Every event is written as one JSON line and buffered
 * for batched persistence; persistence failures are counted and reported as
 * log lines but never raised to the caller.
 */
export class RunLogger {
  private readonly runId: string;
  private readonly retentionMs: number;
  private readonly flushBatchSize: number;
  private readonly insertBatch: InsertRunLogs;
  private readonly consoleWrite: (line: string) => void;
  private readonly now: () => Date;
  private readonly minConsoleLevel: RunLogLevel;

  private readonly buffer: RunLogRow[] = [];
  private nextSeq = 1;
  private flushChain: Promise<void> = Promise.resolve();

  private readonly stats: RunLoggerStats = {
    event_count: 0,
    model_event_count: 0,
    warning_count: 0,
    flush_error_count: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.runId = options.runId;
    this.retentionMs = options.retentionHours * 60 * 60 * 1000;
    this.flushBatchSize = options.flushBatchSize;
    this.insertBatch = options.insertBatch;
    // eslint-disable-next-line no-console
    this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
    this.minConsoleLevel = options.minConsoleLevel ?? "debug";
  }

  getStats(): RunLoggerStats {
    return { ...this.stats };
  }

  log(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): void {
    const row = this.createRow(level, stage, event, message, payload);
    this.write(row);
    this.buffer.push(row);

    if (this.buffer.length >= this.flushBatchSize) {
      this.scheduleFlush();
    }
  }

  debug(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("debug", stage, event, message, payload);
  }

  info(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("info", stage, event, message, payload);
  }

  warn(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("warn", stage, event, message, payload);
  }

  error(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("error", stage, event, message, payload);
  }

  /** Drains the buffer, including rows logged while a flush was in flight. */
  async flush(): Promise<void> {
    do {
      this.scheduleFlush();
      await this.flushChain;
    } while (this.buffer.length > 0);
  }

  private scheduleFlush(): void {
    this.flushChain = this.flushChain.then(() => this.flushBuffered());
  }

  private createRow(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): RunLogRow {
    const createdAt = this.now();

    this.stats.event_count += 1;
    if (event.startsWith("model.") || event.startsWith("cascade.")) {
      this.stats.model_event_count += 1;
    }
    if (level === "warn" || level === "error") {
      this.stats.warning_count += 1;
    }

    return {
      runId: this.runId,
      seq: this.nextSeq++,
      level,
      stage,
      event,
      message,
      payload: toPayload(payload),
      timestamp: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.retentionMs).toISOString(),
    };
  }

  private write(row: RunLogRow): void {
    if (LEVEL_ORDER[row.level] < LEVEL_ORDER[this.minConsoleLevel]) {
      return;
    }
    this.consoleWrite(
      JSON.stringify({
        timestamp: row.timestamp,
        run_id: row.runId,
        seq: row.seq,
        level: row.level,
        stage: row.stage,
        event: row.event,
        message: row.message,
        payload: row.payload,
      }),
    );
  }

  private async flushBuffered(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }

    const rows = this.buffer.splice(0, this.buffer.length);
    try {
      await this.insertBatch(rows);
    } catch (error) {
      this.stats.flush_error_count += 1;
      this.write(
        this.createRow("error", "persistence", "logs.flush.failed", "Run logs could not be persisted.", {
          row_count: rows.length,
          error_message: error instanceof Error ? error.message : String(error),
        }),
      );
    }
  }
}
