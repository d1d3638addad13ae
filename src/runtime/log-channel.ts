import { LogLevel } from "../core/types.js";
import { RuntimeLock } from "./lock.js";

export type LogSink = (line: string) => void;

const SEVERITY_LABELS: Record<number, string> = {
  [LogLevel.Error]: "ERROR",
  [LogLevel.Warn]: "WARN",
  [LogLevel.Info]: "INFO",
  [LogLevel.Debug]: "DEBUG",
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}/${pad2(date.getMonth() + 1)}/${pad2(date.getDate())} ` +
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

const isSeverity = (level: number): boolean =>
  Number.isInteger(level) && level >= LogLevel.Error && level <= LogLevel.Debug;

const isSettableLevel = (level: number): level is LogLevel =>
  Number.isInteger(level) && level >= LogLevel.Disable && level < LogLevel.Inherit;

const formatTraceArg = (arg: unknown): string => (typeof arg === "string" ? `"${arg}"` : String(arg));

export type SinkErrorHandler = (error: unknown) => void;

const reportSinkError: SinkErrorHandler = (error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Log sink failed: ${message}\n`);
};

/**
 * Unbounded FIFO between the log channel and its sink. Lines are delivered on a
 * microtask after the first push, or right away through `flush()`. A line stays
 * queued until the sink accepts it.
 */
export class LogQueue {
  private readonly pending: string[] = [];
  private scheduled = false;

  constructor(
    private readonly sink: LogSink,
    private readonly onSinkError: SinkErrorHandler = reportSinkError
  ) {}

  get size(): number {
    return this.pending.length;
  }

  push(line: string): void {
    this.pending.push(line);
    if (!this.scheduled) {
      this.scheduled = true;
      queueMicrotask(() => this.flushScheduled());
    }
  }

  /** Delivers queued lines in order; a sink failure is rethrown with the failed line still queued. */
  flush(): void {
    this.scheduled = false;
    while (this.pending.length > 0) {
      this.sink(this.pending[0]);
      this.pending.shift();
    }
  }

  private flushScheduled(): void {
    try {
      this.flush();
    } catch (error) {
      this.onSinkError(error);
    }
  }
}

export interface LogChannelOptions {
  queue: LogQueue;
  level?: LogLevel;
  now?: () => Date;
}

export class LogChannel {
  private current: LogLevel;
  private readonly queue: LogQueue;
  private readonly now: () => Date;
  private readonly lock = new RuntimeLock("log");

  constructor(options: LogChannelOptions) {
    this.queue = options.queue;
    this.current = options.level ?? LogLevel.Info;
    this.now = options.now ?? (() => new Date());
  }

  get level(): LogLevel {
    return this.lock.run(() => this.current);
  }

  /** Returns the level in effect before the call; out-of-range values are ignored. */
  setLevel(next: number): LogLevel {
    return this.lock.run(() => {
      const previous = this.current;
      if (isSettableLevel(next)) {
        this.current = next;
      }
      return previous;
    });
  }

  emit(level: number, message: string): void {
    if (!isSeverity(level)) {
      return;
    }
    this.lock.run(() => {
      if (level > this.current) {
        return;
      }
      this.queue.push(`[${SEVERITY_LABELS[level]}] ${formatTimestamp(this.now())} ${message}`);
    });
  }

  trace(name: string, args: unknown[]): boolean {
    this.emit(LogLevel.Debug, `=> ${name}(${args.map(formatTraceArg).join(", ")})`);
    return true;
  }
}
