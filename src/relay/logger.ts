// src/relay/logger.ts — Structured relay logger
//
// Writes one JSON object per line to the console, filtered by level.

export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export interface RelayLogger {
  debug(msg: string, fields?: Record<string, unknown>): void
  info(msg: string, fields?: Record<string, unknown>): void
  warn(msg: string, fields?: Record<string, unknown>): void
  error(msg: string, fields?: Record<string, unknown>): void
  /** Derive a logger tagged with a component name */
  child(component: string): RelayLogger
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK
}

class ConsoleRelayLogger implements RelayLogger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly component: string,
  ) {}

  debug(msg: string, fields?: Record<string, unknown>): void {
    this.write("debug", msg, fields)
  }

  info(msg: string, fields?: Record<string, unknown>): void {
    this.write("info", msg, fields)
  }

  warn(msg: string, fields?: Record<string, unknown>): void {
    this.write("warn", msg, fields)
  }

  error(msg: string, fields?: Record<string, unknown>): void {
    this.write("error", msg, fields)
  }

  child(component: string): RelayLogger {
    return new ConsoleRelayLogger(this.minLevel, component)
  }

  private write(level: LogLevel, msg: string, fields?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      component: this.component,
      msg,
      ...(fields ?? {}),
    })
    if (level === "error") console.error(line)
    else if (level === "warn") console.warn(line)
    else console.log(line)
  }
}

/** Create a console logger. Default component is "relay". */
export function createRelayLogger(level: LogLevel = "info", component = "relay"): RelayLogger {
  return new ConsoleRelayLogger(level, component)
}

/** Discards everything. Default when no logger is configured. */
export const noopLogger: RelayLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return noopLogger
  },
}

/** Render an unknown thrown value for a log field. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
