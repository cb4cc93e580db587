import pino, { type LevelWithSilent } from "pino";

const isDev = process.env.NODE_ENV !== "production";
const logLevel = process.env.LOG_LEVEL || (isDev ? "debug" : "info");

export const logger = pino(
  isDev
    ? {
        level: logLevel,
        name: "dnsprobe",
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {
        level: logLevel,
        name: "dnsprobe",
      },
);

/**
 * Verbosity levels accepted by `-v`: 0 is the most verbose.
 */
export const VERBOSITY_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type Verbosity = (typeof VERBOSITY_LEVELS)[number];

/**
 * Map a numeric verbosity to a pino level, clamping out-of-range values
 */
export function verbosityToLevel(verbosity: number): Verbosity {
  const index = Math.min(Math.max(Math.trunc(verbosity), 0), VERBOSITY_LEVELS.length - 1);
  return VERBOSITY_LEVELS[index] ?? "info";
}

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}

export default logger;
