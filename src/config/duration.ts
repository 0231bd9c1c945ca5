export class DurationParseError extends Error {
  constructor(readonly input: string) {
    super(`Invalid duration string: "${input}"`);
    this.name = "DurationParseError";
  }
}

const UNIT_MS: Readonly<Record<string, number>> = {
  h: 3600_000,
  m: 60_000,
  s: 1000,
  ms: 1,
};

/**
 * Parse a duration like "5s", "1m30s" or "250ms" into milliseconds.
 * Units: h, m, s, ms. The total must be positive.
 */
export function parseDuration(input: string): number {
  const trimmed = input.trim();
  if (trimmed === "") {
    throw new DurationParseError(input);
  }

  // Repeated "<number><unit>" segments, e.g. "1h30m10s500ms"
  const tokenRe = /(\d+)(ms|s|m|h)/g;
  let totalMs = 0;
  let matchedLen = 0;

  for (const [token, digits = "", unit = ""] of trimmed.matchAll(tokenRe)) {
    const scale = UNIT_MS[unit];
    if (scale === undefined) throw new DurationParseError(input);
    totalMs += parseInt(digits, 10) * scale;
    matchedLen += token.length;
  }

  if (matchedLen !== trimmed.length || totalMs <= 0) {
    throw new DurationParseError(input);
  }
  return totalMs;
}
