/**
 * Surgery date/time used as the zero point for relative phrases. `at` holds
 * the local wall-clock time encoded in UTC fields so arithmetic and
 * formatting never depend on the host time zone.
 */
export interface SurgeryAnchor {
  at: Date;
  hasTime: boolean;
}

export interface SurgeryDateFields {
  date?: string | null;
  time?: string | null;
}

const DATE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const TIME_RE = /^(\d{1,2}):(\d{1,2})$/;

/** Parse `YYYY-MM-DD` plus optional `HH:MM`. Null when either part is malformed. */
export function parseSurgeryAnchor(details: SurgeryDateFields | null | undefined): SurgeryAnchor | null {
  const dateStr = details?.date?.trim();
  if (!dateStr) return null;

  const dateMatch = DATE_RE.exec(dateStr);
  if (!dateMatch) return null;
  const [year, month, day] = dateMatch.slice(1).map(Number);

  let hour = 0;
  let minute = 0;
  const timeStr = details?.time?.trim();
  if (timeStr) {
    const timeMatch = TIME_RE.exec(timeStr);
    if (!timeMatch) return null;
    [hour, minute] = timeMatch.slice(1).map(Number);
    if (hour > 23 || minute > 59) return null;
  }

  const at = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Date.UTC rolls 2025-02-30 over into March
  if (at.getUTCFullYear() !== year || at.getUTCMonth() !== month - 1 || at.getUTCDate() !== day) {
    return null;
  }

  return { at, hasTime: Boolean(timeStr) };
}

export function subtractTime(at: Date, offset: { days?: number; hours?: number; minutes?: number }): Date {
  const ms = (((offset.days ?? 0) * 24 + (offset.hours ?? 0)) * 60 + (offset.minutes ?? 0)) * 60_000;
  return new Date(at.getTime() - ms);
}

export function atTimeOfDay(at: Date, hour: number, minute = 0): Date {
  return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate(), hour, minute));
}

/** ISO-8601 without zone designator, e.g. `2025-03-05T08:00:00`. */
export function formatLocalIso(at: Date): string {
  return at.toISOString().slice(0, 19);
}
