import pino, { type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { SP_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((l) => l === value);
}

export function parseLogLevel(value: string | undefined): LevelWithSilent {
  const level = (value ?? SP_CONSTANTS.DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ValidationError(`Unknown log level "${value}"; expected one of ${LEVELS.join(", ")}`);
  }
  return level;
}

/** JSON lines on stderr so stdout stays free for command output. */
export function createLogger(
  level: LevelWithSilent = parseLogLevel(undefined),
  destination: DestinationStream = pino.destination({ dest: 2, sync: true })
): Logger {
  return pino({ name: "sealed-page", level }, destination);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
