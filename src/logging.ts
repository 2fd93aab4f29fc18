import pino from "pino";

type LogFn = (objOrMsg: object | string, msg?: string) => void;

export interface ILogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  opts: { pretty?: boolean } = {},
): ILogger =>
  pino({
    level,
    ...(opts.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

export const silentLogger = (): ILogger => makeLogger("silent");
