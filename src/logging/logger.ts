import pino, { type Logger, type LoggerOptions } from "pino";

function buildOptions(): LoggerOptions {
  const base: LoggerOptions = {
    level: process.env.LOG_LEVEL || "info",
    name: "pm-snapshot-cache",
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err
    }
  };

  if (process.env.LOG_PRETTY === "true") {
    return {
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: true
        }
      }
    };
  }

  return base;
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(buildOptions());
  }
  return rootLogger;
}

/** Children created from the root afterwards inherit the new level. */
export function setLogLevel(level: string): void {
  getLogger().level = level;
}

export type LogMethod = (bindings: Record<string, unknown>, message: string) => void;

// Narrow logger facade the services depend on; tests substitute plain objects.
export interface AppLogger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
  child?(bindings: Record<string, unknown>): AppLogger;
}

function adapt(base: Logger): AppLogger {
  return {
    debug: (bindings, message) => base.debug(bindings, message),
    info: (bindings, message) => base.info(bindings, message),
    warn: (bindings, message) => base.warn(bindings, message),
    error: (bindings, message) => base.error(bindings, message),
    child: (bindings) => adapt(base.child(bindings))
  };
}

export function getAppLogger(): AppLogger {
  return adapt(getLogger());
}
