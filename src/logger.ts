import pino from "pino";

const rootLogger = pino(
  {
    name: "media-gather",
    level: process.env.LOG_LEVEL ?? "warn",
  },
  pino.destination({ dest: 2, sync: true })
);

// Children keep the level they were created with, so track them for setLogLevel
const moduleLoggers: pino.Logger[] = [];

export type Logger = pino.Logger;

export function createLogger(module: string): Logger {
  const logger = rootLogger.child({ module });
  moduleLoggers.push(logger);
  return logger;
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  rootLogger.level = level;
  for (const logger of moduleLoggers) {
    logger.level = level;
  }
}
