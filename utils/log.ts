// Filename: utils/log.ts

/**
 * Leveled logger.
 *
 * Everything goes to stderr so stdout only ever carries the rendered ratio.
 * The threshold comes from LOG_LEVEL (a number or one of the names below)
 * and defaults to silent.
 */

export const ERR = 1;
export const WARN = 3;
export const LOG = 5;
export const INFO = 7;
export const TMI = 9;

const LEVEL_NAMES: Record<string, number> = {
  silent: 0,
  err: ERR,
  error: ERR,
  warn: WARN,
  log: LOG,
  info: INFO,
  tmi: TMI,
  debug: TMI,
};

const LEVEL_LABELS: Record<number, string> = {
  [ERR]: 'ERR',
  [WARN]: 'WARN',
  [LOG]: 'LOG',
  [INFO]: 'INFO',
  [TMI]: 'TMI',
};

/**
 * Resolves the active threshold. Read on every call so tests and the CLI can
 * change LOG_LEVEL at runtime.
 */
export function currentLogLevel(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 0;

  const numeric = Number(raw);
  if (Number.isInteger(numeric)) return numeric;

  return LEVEL_NAMES[raw] ?? 0;
}

export function log(message: string, level: number = LOG): void {
  if (level > currentLogLevel()) return;
  const label = LEVEL_LABELS[level] ?? String(level);
  // eslint-disable-next-line no-console
  console.error(`[${label}] ${message}`);
}
