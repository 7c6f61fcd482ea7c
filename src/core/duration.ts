const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const GROUP = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Parse a duration such as "30s", "1m30s" or "1.5h" into milliseconds.
 * Returns null when the string is not a well-formed duration. A bare "0" is
 * accepted and yields 0.
 */
export function parseDurationMs(input: string): number | null {
  let raw = input.trim();
  if (!raw) return null;

  let sign = 1;
  if (raw[0] === "-" || raw[0] === "+") {
    if (raw[0] === "-") sign = -1;
    raw = raw.slice(1);
  }
  if (raw === "0") return 0;
  if (!raw) return null;

  let total = 0;
  GROUP.lastIndex = 0;
  while (GROUP.lastIndex < raw.length) {
    const start = GROUP.lastIndex;
    const match = GROUP.exec(raw);
    if (!match || match.index !== start) return null;
    const value = Number.parseFloat(match[1]);
    const unit = UNIT_MS[match[2]];
    if (!Number.isFinite(value) || unit === undefined) return null;
    total += value * unit;
  }

  return Number.isFinite(total) ? sign * total : null;
}
