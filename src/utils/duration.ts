const UNIT_MS = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
} as const;

type DurationUnit = keyof typeof UNIT_MS;

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
const FULL = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;

function isUnit(value: string): value is DurationUnit {
  return value in UNIT_MS;
}

/**
 * Parse a duration into milliseconds.
 *
 * Strings combine segments such as `500ms`, `30s`, `1h30m`. Plain numbers, and
 * numeric strings, are seconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`invalid duration ${value}: must be a non-negative number of seconds`);
    }
    return value * 1000;
  }

  const trimmed = value.trim();
  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  if (!FULL.test(trimmed)) {
    throw new Error(`invalid duration "${value}": use units ms, s, m or h (e.g. "30s")`);
  }

  let total = 0;
  for (const match of trimmed.matchAll(SEGMENT)) {
    const unit = match[2];
    if (isUnit(unit)) {
      total += Number(match[1]) * UNIT_MS[unit];
    }
  }
  return total;
}

/**
 * Parse an optional duration, returning `fallback` when absent.
 */
export function parseOptionalDuration(
  value: string | number | undefined,
  fallback: number
): number {
  return value === undefined ? fallback : parseDuration(value);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(ms % 1000 === 0 ? 0 : 1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return seconds > 0 ? `${minutes}m${seconds}s` : `${minutes}m`;
}
