/*
Purpose: winston loggers for the host. Each identity keeps its own severity threshold while
sharing the stderr console transport, so scheduler noise can be silenced without touching
host diagnostics.
Usage: const loggers = createHostLoggers(); suppressSchedulerDiagnostics(loggers);
*/

import winston from "winston";
import { z } from "zod";

// =============================================================================
// TYPES
// =============================================================================

export const LOG_LEVELS = winston.config.syslog.levels;

export type LogLevel = "emerg" | "alert" | "crit" | "error" | "warning" | "notice" | "info" | "debug";

export type HostLoggers = {
  host: winston.Logger;
  scheduler: winston.Logger;
};

export type StderrLoggerOptions = {
  name: string;
  level: LogLevel;
  prefix?: boolean;
  transports?: winston.LoggerOptions["transports"];
};

const LogLevelSchema = z.enum(["emerg", "alert", "crit", "error", "warning", "notice", "info", "debug"]);

export const DEFAULT_HOST_LOG_LEVEL: LogLevel = "warning";
export const SCHEDULER_SUPPRESSED_LEVEL: LogLevel = "crit";

// =============================================================================
// FACTORIES
// =============================================================================

export function createStderrLogger(opts: StderrLoggerOptions): winston.Logger {
  const withPrefix = opts.prefix ?? true;

  return winston.createLogger({
    levels: LOG_LEVELS,
    level: opts.level,
    defaultMeta: { logger: opts.name },
    format: winston.format.printf((info) => {
      const text = `${info.level}: ${String(info.message)}`;
      return withPrefix ? `[${opts.name}] ${text}` : text;
    }),
    transports: opts.transports ?? [
      new winston.transports.Console({ stderrLevels: Object.keys(LOG_LEVELS) }),
    ],
  });
}

export function createHostLoggers(env: NodeJS.ProcessEnv = process.env): HostLoggers {
  return {
    host: createStderrLogger({ name: "host", level: resolveLogLevel(env.STACK_HOST_LOG_LEVEL) }),
    scheduler: createStderrLogger({ name: "scheduler", level: "warning" }),
  };
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(raw?.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_HOST_LOG_LEVEL;
}

/**
 * Raise the scheduler channel to critical-only. An abnormal run can leave rejected operations
 * nobody awaited; the warnings about them are expected and must stay out of the engine's view.
 */
export function suppressSchedulerDiagnostics(loggers: HostLoggers): void {
  loggers.scheduler.level = SCHEDULER_SUPPRESSED_LEVEL;
}
