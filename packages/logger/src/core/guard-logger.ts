import { NullLogger } from "../adapters/null/null-logger"
import type { LogContext, LogContextPatch, LogMeta } from "../ports/log-context"
import type { LogLevelName } from "../ports/log-level"
import type { Logger } from "../ports/logger"

/**
 * Wraps a logger so that no log call can throw into the caller.
 *
 * A sink failure is reported once to `onFailure` (stderr by default) and the
 * entry is dropped.
 */
export class GuardedLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly inner: Logger<TContext>,
    private readonly onFailure: (err: unknown, level: LogLevelName) => void = reportToStderr,
  ) {}

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.emit("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.emit("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.emit("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.emit("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.emit("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.emit("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    try {
      return new GuardedLogger(this.inner.child(context), this.onFailure)
    } catch (err) {
      this.report(err, "debug")
      return new NullLogger<TContext & U>()
    }
  }

  private emit(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    try {
      this.inner[level](message, meta)
    } catch (err) {
      this.report(err, level)
    }
  }

  private report(err: unknown, level: LogLevelName): void {
    try {
      this.onFailure(err, level)
    } catch {
      return undefined
    }
  }
}

function reportToStderr(err: unknown, level: LogLevelName): void {
  const reason = err instanceof Error ? err.message : String(err)
  process.stderr.write(`logger failed to write a ${level} entry: ${reason}\n`)
}

export function guardLogger<TContext extends LogContext = LogContext>(
  logger: Logger<TContext>,
): Logger<TContext> {
  return logger instanceof GuardedLogger ? logger : new GuardedLogger(logger)
}
