import pino from "pino";

export type LogLevel = pino.LevelWithSilent;

export interface ILogger {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
  child(bindings: Record<string, unknown>): ILogger;
}

export const makeLogger = (level: LogLevel = "warn", pretty = false): ILogger =>
  pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });
