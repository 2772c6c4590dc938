import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Named pino logger on stderr. stdout belongs to the command's own output.
 */
export function createLogger(name: string, opts: LoggerOptions = {}): Logger {
  const pretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test" && process.stderr.isTTY === true;
  const options: LoggerOptions = { name, level: defaultLevel(), ...opts };
  if (pretty) {
    return pino({
      ...options,
      transport: { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard", destination: 2 } },
    });
  }
  return pino(options, pino.destination(2));
}
