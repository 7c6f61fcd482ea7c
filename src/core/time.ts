import { ProtocolError } from "./errors.js";

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Strict RFC 3339 timestamp parse. Fractions past milliseconds are dropped;
 * anything else the daemon sends is a ProtocolError.
 */
export function parseRfc3339(value: string): Date {
  const match = RFC3339.exec(value);
  if (!match) throw new ProtocolError(`invalid timestamp "${value}"`);
  const fraction = match[2] ? `.${match[2].slice(0, 3).padEnd(3, "0")}` : "";
  const date = new Date(`${match[1]}${fraction}${match[3].toUpperCase()}`);
  if (Number.isNaN(date.getTime())) throw new ProtocolError(`invalid timestamp "${value}"`);
  return date;
}

export function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
