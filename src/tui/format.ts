const BYTE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB"];

/** First 12 characters of an ID, without the sha256: prefix. */
export function shortId(id: string): string {
  return id.replace(/^sha256:/, "").slice(0, 12);
}

/** 0 B, 1023 B, 1.0 KiB, 1.5 MiB ... up to EiB. */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/** Layer command without the shell wrapper, cut to max characters. */
export function truncateCommand(command: string, max = 60): string {
  const cleaned = command
    .replace(/^\/bin\/sh -c /, "")
    .replace(/^#\(nop\)\s*/, "")
    .trim();
  if (cleaned.length <= max) return cleaned;
  return `${cleaned.slice(0, Math.max(0, max - 3))}...`;
}

/** Local time as YYYY-MM-DD HH:MM:SS, "-" for a missing date. */
export function formatDate(date: Date | null): string {
  if (!date || Number.isNaN(date.getTime())) return "-";
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}
