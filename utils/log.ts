// Filename: utils/log.ts

/**
 * Leveled console logger.
 *
 * Lower numbers are more severe. A message is written when its level is at or
 * below the threshold taken from LOG_LEVEL (a number or one of the names below).
 */

export const ERR = 1;
export const WARN = 3;
export const LOG = 5;
export const INFO = 7;
export const TMI = 9;

export type LogLevel = typeof ERR | typeof WARN | typeof LOG | typeof INFO | typeof TMI;

const LEVEL_NAMES: Record<string, LogLevel> = {
  ERR,
  WARN,
  LOG,
  INFO,
  TMI,
};

/**
 * Resolves the active threshold from an environment value.
 * Unknown values fall back to LOG.
 */
export function resolveLogLevel(raw: string | undefined): number {
  if (!raw) {
    return LOG;
  }
  const named = LEVEL_NAMES[raw.trim().toUpperCase()];
  if (named !== undefined) {
    return named;
  }
  const numeric = Number(raw);
  return Number.isFinite(numeric) ? numeric : LOG;
}

/**
 * Writes a message if `level` passes the LOG_LEVEL threshold.
 */
export function log(message: string, level: LogLevel = LOG): void {
  if (level > resolveLogLevel(process.env.LOG_LEVEL)) {
    return;
  }

  if (level === ERR) {
    console.error(message);
  } else if (level === WARN) {
    console.warn(message);
  } else {
    console.log(message);
  }
}
