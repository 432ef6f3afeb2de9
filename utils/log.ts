// Filename: utils/log.ts

/**
 * Leveled console logger.
 *
 * Lower numbers are more severe. A message is printed when its level is at or
 * below the active threshold, read once from LOG_LEVEL (name or number).
 */

export const ERR = 1;
export const WARN = 3;
export const LOG = 5;
export const INFO = 7;
export const TMI = 9;

export type LogLevel = typeof ERR | typeof WARN | typeof LOG | typeof INFO | typeof TMI;

const LEVEL_NAMES: Record<string, LogLevel> = {
  ERR,
  ERROR: ERR,
  WARN,
  LOG,
  INFO,
  TMI,
  DEBUG: TMI,
};

function resolveThreshold(raw: string | undefined): number {
  if (!raw) {
    return INFO;
  }
  const named = LEVEL_NAMES[raw.toUpperCase()];
  if (named !== undefined) {
    return named;
  }
  const numeric = Number(raw);
  return Number.isFinite(numeric) ? numeric : INFO;
}

let threshold = resolveThreshold(process.env.LOG_LEVEL);

/**
 * Overrides the threshold set by LOG_LEVEL.
 */
export function setLogLevel(level: number | string): void {
  threshold = typeof level === 'number' ? level : resolveThreshold(level);
}

export function log(message: string, level: LogLevel = LOG): void {
  if (level > threshold) {
    return;
  }

  const stamp = new Date().toISOString();
  if (level <= ERR) {
    console.error(`${stamp} ${message}`);
  } else if (level <= WARN) {
    console.warn(`${stamp} ${message}`);
  } else {
    console.log(`${stamp} ${message}`);
  }
}
