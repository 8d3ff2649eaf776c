import pino from "pino";

export interface ILogger {
  debug: pino.LogFn;
  info: pino.LogFn;
  warn: pino.LogFn;
  error: pino.LogFn;
  child: (bindings: pino.Bindings) => ILogger;
}

export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export const isLogLevel = (s: string): s is LogLevel =>
  LOG_LEVELS.some((level) => level === s);

/* silent loggers skip the pretty transport so no worker thread is spawned */
export const makeLogger = (level: LogLevel = "info"): ILogger =>
  level === "silent"
    ? pino({ level })
    : pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      });
