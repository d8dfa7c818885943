import pino from "pino";

const loggers = new Set<pino.Logger>();
let currentLevel: string = process.env["LOG_LEVEL"] ?? "info";

/**
 * Named pino logger. The level starts from LOG_LEVEL (default "info")
 * and follows later calls to setLogLevel.
 */
export function createLogger(name: string): pino.Logger {
  const logger = pino({ name, level: currentLevel });
  loggers.add(logger);
  return logger;
}

/** Apply a level to every logger created so far and to those created later. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  currentLevel = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

export function getLogLevel(): string {
  return currentLevel;
}
