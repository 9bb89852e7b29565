const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
};

/**
 * Parses `12h`, `7d`, `30m`, `45s` or a bare number of seconds.
 * Returns undefined for anything else.
 */
export function parseDurationSeconds(value: string): number | undefined {
  const match = /^(\d+)([smhd]?)$/.exec(value.trim());
  if (!match) return undefined;
  const amount = Number(match[1]);
  const unit = match[2] || 's';
  const seconds = amount * UNIT_SECONDS[unit];
  return seconds > 0 ? seconds : undefined;
}
