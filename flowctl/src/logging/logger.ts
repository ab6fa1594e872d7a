import pino, { type Logger } from "pino";

const DEFAULT_LEVEL = "info";

/** Root logger: JSON lines on stderr, so stdout stays free for command output. */
export const logger: Logger = pino(
  {
    name: "flowctl",
    level: process.env.FLOWCTL_LOG_LEVEL ?? DEFAULT_LEVEL,
    base: null,
  },
  pino.destination(2),
);

export const createLogger = (component: string): Logger => logger.child({ component });

export const loggers = {
  engine: createLogger("engine"),
  gate: createLogger("gate"),
  git: createLogger("git"),
  resolver: createLogger("resolver"),
  notify: createLogger("notify"),
  cli: createLogger("cli"),
};

export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of Object.values(loggers)) child.level = level;
}
