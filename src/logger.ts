import { pino, type LevelWithSilent, type Logger } from "pino";

export type { Logger };
export type LogLevel = LevelWithSilent;

export function createLogger(level: LogLevel, bindings?: Record<string, unknown>): Logger {
  const logger = pino({ level });
  return bindings ? logger.child(bindings) : logger;
}

/** Default for library use: wallets and clients stay quiet unless handed a logger. */
export const silentLogger: Logger = pino({ level: "silent" });
