const DAY_MS = 24 * 60 * 60 * 1000;

/** Parses the upstream `20240101T093000.000Z` format (milliseconds optional). */
export function parseRoyaleTime(input: string | null | undefined): Date | null {
  if (!input) return null;
  const m = input.match(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(?:\.(\d{1,3}))?Z$/);
  if (!m) return null;
  const [, y, mo, d, h, mi, s, ms] = m;
  const date = new Date(
    Date.UTC(
      Number(y),
      Number(mo) - 1,
      Number(d),
      Number(h),
      Number(mi),
      Number(s),
      ms ? Number(ms.padEnd(3, "0")) : 0
    )
  );
  return Number.isNaN(date.getTime()) ? null : date;
}

/** First parseable timestamp of the given candidates. */
export function firstRoyaleTime(...candidates: Array<string | null | undefined>): Date | null {
  for (const candidate of candidates) {
    const parsed = parseRoyaleTime(candidate);
    if (parsed) return parsed;
  }
  return null;
}

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone }).format(0);
    return true;
  } catch {
    return false;
  }
}

/** The zone itself when the runtime knows it, UTC otherwise. Called once at start-up. */
export function resolveTimeZone(timeZone: string): string {
  if (isKnownTimeZone(timeZone)) return timeZone;
  console.warn(`[time] unknown time zone tz=${timeZone}, falling back to UTC`);
  return "UTC";
}

function zonedParts(date: Date, timeZone: string): Record<string, string> {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone: isKnownTimeZone(timeZone) ? timeZone : "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);
  const out: Record<string, string> = {};
  for (const part of parts) out[part.type] = part.value;
  return out;
}

/** Wall-clock hour (0-23) of `date` in `timeZone`. */
export function localHour(date: Date, timeZone: string): number {
  return Number(zonedParts(date, timeZone).hour);
}

/** `dd.mm.yyyy` in the given zone, `unknown` without a date. */
export function formatDate(date: Date | null, timeZone: string): string {
  if (!date) return "unknown";
  const p = zonedParts(date, timeZone);
  return `${p.day}.${p.month}.${p.year}`;
}

/** `HH:MM:SS` in the given zone. */
export function formatClock(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.hour}:${p.minute}:${p.second}`;
}

/** Relative age such as `3h ago`; dates older than ten weeks render as a date. */
export function formatAgo(date: Date | null, now: Date, timeZone: string): string {
  if (!date) return "unknown";
  const secs = Math.floor((now.getTime() - date.getTime()) / 1000);
  if (secs < 90) return "1m ago";
  const mins = Math.floor(secs / 60);
  if (mins < 90) return `${mins}m ago`;
  const hours = Math.floor(secs / 3600);
  if (hours < 36) return `${hours}h ago`;
  const days = Math.floor(secs / 86400);
  if (days < 14) return `${days}d ago`;
  const weeks = Math.floor(secs / 604800);
  if (weeks < 10) return `${weeks}w ago`;
  return `on ${formatDate(date, timeZone)}`;
}

/** Fractional days between `date` and `now`; 0 without a date. */
export function daysSince(date: Date | null, now: Date): number {
  if (!date) return 0;
  return (now.getTime() - date.getTime()) / DAY_MS;
}
