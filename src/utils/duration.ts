/**
 * Durations in config are written like "1h", "24h", "1h30m" or "500ms".
 * A bare number is read as seconds.
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

const BARE_NUMBER_REGEX = /^\d+$/;
const SEGMENT_REGEX = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/g;
const FULL_REGEX = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h|d))+$/;

/**
 * Parse a duration string and return milliseconds.
 */
export function parseDuration(value: string): number {
  const trimmed = value.trim();

  if (BARE_NUMBER_REGEX.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  if (!FULL_REGEX.test(trimmed)) {
    throw new Error(`invalid duration "${value}"`);
  }

  let total = 0;
  for (const [, amount, unit] of trimmed.matchAll(SEGMENT_REGEX)) {
    total += parseFloat(amount) * UNIT_MS[unit];
  }

  return Math.round(total);
}

export const toSeconds = (ms: number): number => Math.floor(ms / 1000);

export const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);
