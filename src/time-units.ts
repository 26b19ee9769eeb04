export type TimeUnitName =
  | "nanoseconds"
  | "microseconds"
  | "milliseconds"
  | "seconds"
  | "minutes"
  | "hours";

export type TimeUnit = {
  name: TimeUnitName;
  /** Short label for axes and tooltips. */
  symbol: string;
  /** Nanoseconds in one unit. */
  ns: number;
  /** Codes accepted as a user override. */
  codes: readonly string[];
};

// Ascending; resolution picks the largest unit not exceeding the total.
export const TIME_UNITS: readonly TimeUnit[] = [
  { name: "nanoseconds",  symbol: "ns",  ns: 1,         codes: ["ns", "nsec"] },
  { name: "microseconds", symbol: "µs",  ns: 1e3,       codes: ["us", "usec"] },
  { name: "milliseconds", symbol: "ms",  ns: 1e6,       codes: ["ms", "msec"] },
  { name: "seconds",      symbol: "s",   ns: 1e9,       codes: ["s", "sec"] },
  { name: "minutes",      symbol: "min", ns: 60e9,      codes: ["m", "min"] },
  { name: "hours",        symbol: "h",   ns: 3600e9,    codes: ["h", "hour"] },
];

export const TIME_UNIT_CODES: readonly string[] = TIME_UNITS.flatMap(unit => unit.codes);

/** Unit for an override code or full unit name, or null when unknown. */
export function parseTimeUnit(code: string): TimeUnit | null {
  const key = code.trim().toLowerCase();
  return TIME_UNITS.find(unit => unit.name === key || unit.codes.includes(key)) ?? null;
}

/**
 * Display unit for a span of `timeTotal` ns. An override wins; a
 * non-positive total falls back to nanoseconds.
 */
export function resolveTimeUnit(timeTotal: number, override?: TimeUnit | null): TimeUnit {
  if (override) return override;
  let chosen = TIME_UNITS[0];
  for (const unit of TIME_UNITS) {
    if (timeTotal >= unit.ns) chosen = unit;
  }
  return chosen;
}

/** `1500000` ns in milliseconds → `"1.5 ms"`. */
export function formatDuration(ns: number, unit: TimeUnit, digits = 3): string {
  const value = ns / unit.ns;
  const text = Number.isInteger(value) ? String(value) : String(Number(value.toFixed(digits)));
  return `${text} ${unit.symbol}`;
}
