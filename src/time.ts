// ─── ISO-8601 parsing ───
// Kalshi returns "2024-01-01T00:00:00Z"; naive timestamps are taken as UTC.

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function offsetSeconds(tz: string | undefined): number | null {
  if (!tz || tz.toUpperCase() === "Z") return 0;
  const sign = tz[0] === "-" ? -1 : 1;
  const digits = tz.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 3600 + minutes * 60);
}

/** Epoch seconds for an ISO-8601 string, or null when absent or unparseable. */
export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const m = ISO_RE.exec(value.trim());
  if (!m) return null;

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "", tz] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  // Date.UTC rolls Feb 30 over into March; reject instead
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return null;

  const offset = offsetSeconds(tz);
  if (offset === null) return null;

  const fraction = frac ? Number(`0.${frac}`) : 0;
  return Math.floor(ms / 1000 + fraction) - offset;
}

// ─── Durations ───

export function toEpochSeconds(now: Date): number {
  return Math.floor(now.getTime() / 1000);
}

export function hoursUntil(closeTs: number | null, now: Date): number | null {
  if (closeTs === null) return null;
  return (closeTs - now.getTime() / 1000) / 3600;
}

export function formatHours(hours: number | null): string {
  if (hours === null) return "unknown";
  if (hours <= 0) return "closed";
  if (hours >= 24) return `${(hours / 24).toFixed(1)}d`;
  return `${hours.toFixed(1)}h`;
}
