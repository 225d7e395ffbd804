/**
 * Minimal host logger: builds LogRecords, formats them as JSON and hands
 * each line to a caller-owned sink. Every call is emitted; choosing what to
 * log is left to the caller.
 */

import { exceptionInfoFromError } from "../formatter/exception.js";
import { RecordFormatter } from "../formatter/record-formatter.js";
import type { LogLevel, LogRecord } from "../formatter/types.js";
import { captureStack, parseCallSite, stackFrames } from "./call-site.js";

/** Extra fields attached to a log call or bound to a child logger */
export type LogContext = Record<string, unknown>;

/** Receives one formatted line per record, newline included */
export type LogSink = (line: string) => void;

/** Per-call options beyond the extra fields */
export interface LogCallOptions {
  /** Thrown value to attach as the record's exception */
  error?: unknown;
  /** Attach the stack of the log call as stack_info */
  stackInfo?: boolean;
}

export interface LoggerOptions {
  formatter?: RecordFormatter;
  write?: LogSink;
  /** Time source for record timestamps */
  now?: () => Date;
}

type Boundary = (...args: never[]) => unknown;

function defaultSink(line: string): void {
  process.stderr.write(line);
}

/** Logger that renders every call through a RecordFormatter */
export class Logger {
  readonly name: string;
  private formatter: RecordFormatter;
  private write: LogSink;
  private now: () => Date;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.formatter = options.formatter ?? new RecordFormatter();
    this.write = options.write ?? defaultSink;
    this.now = options.now ?? (() => new Date());
  }

  /** Create a child logger with bound context */
  child(ctx: LogContext): ChildLogger {
    return new ChildLogger(this, ctx);
  }

  /** Build the record for a log call made just outside `boundary` */
  private createRecord(
    level: LogLevel,
    msg: string,
    fields: LogContext | undefined,
    options: LogCallOptions,
    boundary: Boundary
  ): LogRecord {
    const stack = captureStack(boundary);
    const record: LogRecord = {
      timestamp: this.now(),
      level,
      loggerName: this.name,
      message: msg,
      ...parseCallSite(stack),
      extra: fields ?? {},
    };
    if (options.error !== undefined) {
      record.exceptionInfo = exceptionInfoFromError(options.error);
    }
    if (options.stackInfo) {
      record.stackInfo = ["Stack (most recent call first):", ...stackFrames(stack)].join("\n");
    }
    return record;
  }

  /** Core log method */
  log(
    level: LogLevel,
    msg: string,
    fields?: LogContext,
    options: LogCallOptions = {},
    boundary: Boundary = this.log
  ): void {
    const line = this.formatter.format(this.createRecord(level, msg, fields, options, boundary));
    try {
      this.write(line + "\n");
    } catch {
      // A failing sink must not take the application down with it
    }
  }

  /** Log debug message */
  debug(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.log("debug", msg, fields, options, this.debug);
  }

  /** Log info message */
  info(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.log("info", msg, fields, options, this.info);
  }

  /** Log warning message */
  warning(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.log("warning", msg, fields, options, this.warning);
  }

  /** Log error message */
  error(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.log("error", msg, fields, options, this.error);
  }

  /** Log critical message */
  critical(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.log("critical", msg, fields, options, this.critical);
  }

  /** Log an error-level message with the thrown value attached */
  exception(msg: string, error: unknown, fields?: LogContext): void {
    this.log("error", msg, fields, { error }, this.exception);
  }
}

/** Child logger that adds bound context to every log entry */
export class ChildLogger {
  private parent: Logger;
  private ctx: LogContext;

  constructor(parent: Logger, ctx: LogContext) {
    this.parent = parent;
    this.ctx = ctx;
  }

  /** Create a child of this logger, with this logger's context underneath */
  child(ctx: LogContext): ChildLogger {
    return new ChildLogger(this.parent, { ...this.ctx, ...ctx });
  }

  /** Log debug message */
  debug(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.parent.log("debug", msg, { ...this.ctx, ...fields }, options, this.debug);
  }

  /** Log info message */
  info(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.parent.log("info", msg, { ...this.ctx, ...fields }, options, this.info);
  }

  /** Log warning message */
  warning(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.parent.log("warning", msg, { ...this.ctx, ...fields }, options, this.warning);
  }

  /** Log error message */
  error(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.parent.log("error", msg, { ...this.ctx, ...fields }, options, this.error);
  }

  /** Log critical message */
  critical(msg: string, fields?: LogContext, options?: LogCallOptions): void {
    this.parent.log("critical", msg, { ...this.ctx, ...fields }, options, this.critical);
  }

  /** Log an error-level message with the thrown value attached */
  exception(msg: string, error: unknown, fields?: LogContext): void {
    this.parent.log("error", msg, { ...this.ctx, ...fields }, { error }, this.exception);
  }
}
