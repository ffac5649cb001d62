/**
 * Date utilities
 *
 * Watermarks and comparisons always use UTC instants. Local renderings exist
 * only for logs and the status report.
 */

const MINUTE_MS = 60 * 1000;
export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Wait, resolving early when the signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Render an instant as "YYYY-MM-DD HH:mm:ss" in the given IANA time zone.
 */
export function formatLocalTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")}:${get("second")}`;
}

/**
 * Check that a string names a time zone Intl understands.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function floorToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

export function sameMinute(a: Date, b: Date): boolean {
  return floorToMinute(a).getTime() === floorToMinute(b).getTime();
}

/**
 * Format a date as YYYY-MM-DD after shifting it by a UTC offset.
 */
export function formatDate(date: Date, utcOffsetMinutes: number = 0): string {
  return new Date(date.getTime() + utcOffsetMinutes * MINUTE_MS)
    .toISOString()
    .slice(0, 10);
}

/**
 * Format the wall-clock time of an instant at a UTC offset, without zone
 * suffix ("YYYY-MM-DDTHH:mm:ss.SSS").
 */
export function formatLocalIso(date: Date, utcOffsetMinutes: number): string {
  return new Date(date.getTime() + utcOffsetMinutes * MINUTE_MS)
    .toISOString()
    .slice(0, 23);
}

/**
 * Parse a wall-clock date and time recorded at a UTC offset into an instant.
 */
export function localToUtc(
  date: string,
  time: string,
  utcOffsetMinutes: number
): Date {
  const [hh = "00", mm = "00", ss = "00"] = time.split(":");
  const asUtc = new Date(`${date}T${hh.padStart(2, "0")}:${mm.padStart(2, "0")}:${ss.padStart(2, "0")}Z`);
  return new Date(asUtc.getTime() - utcOffsetMinutes * MINUTE_MS);
}
