const unitMap: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/** Parses `1500`, `90s`, `30m`, `6h` or `7d` into milliseconds. */
export function parseDurationToMs(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }

  const match = trimmed.match(/^(\d+)(ms|s|m|h|d)$/i);
  const amountStr = match?.[1];
  const unitRaw = match?.[2];
  if (!amountStr || !unitRaw) {
    return undefined;
  }

  const multiplier = unitMap[unitRaw.toLowerCase()];
  if (!multiplier) {
    return undefined;
  }

  return Number.parseInt(amountStr, 10) * multiplier;
}

// Whole seconds, as Redis EXPIRE takes them. Sub-second durations yield undefined.
export function parseDurationToSeconds(value: string | undefined): number | undefined {
  const ms = parseDurationToMs(value);
  if (ms === undefined || ms < 1000) {
    return undefined;
  }

  return Math.floor(ms / 1000);
}
