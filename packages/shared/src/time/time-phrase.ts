import { parseCount } from './number-words';
import {
  atTimeOfDay,
  formatLocalIso,
  parseSurgeryAnchor,
  subtractTime,
  type SurgeryAnchor,
  type SurgeryDateFields,
} from './surgery-anchor';

const DAYS_BEFORE_RE = /(\d+|[a-z-]+)\s+days?\s+(before|prior)/;
const HOURS_BEFORE_RE = /(\d+|[a-z-]+)\s+(hours?|hrs?|hr)\s+(before|prior)/;
const NO_CHANGE_PHRASES: ReadonlySet<string> = new Set(['continue', 'as usual', 'no change']);

export type TimePhraseResolution =
  | { kind: 'absolute'; at: Date }
  /** The phrase says to carry on as usual: there is nothing to stop */
  | { kind: 'no-change' }
  | { kind: 'unresolved' };

const UNRESOLVED: TimePhraseResolution = { kind: 'unresolved' };
const absolute = (at: Date): TimePhraseResolution => ({ kind: 'absolute', at });

/** "continue" / "as usual" / "no change": nothing to stop, with or without a surgery date. */
export function isNoChangePhrase(phrase: unknown): boolean {
  return typeof phrase === 'string' && NO_CHANGE_PHRASES.has(phrase.trim().toLowerCase());
}

/**
 * Interpret a relative instruction ("5 days before surgery", "night before")
 * against the surgery anchor. Rules are tried in a fixed priority order.
 */
export function classifyTimePhrase(anchor: SurgeryAnchor | null, phrase: unknown): TimePhraseResolution {
  if (!anchor || typeof phrase !== 'string') return UNRESOLVED;

  const text = phrase.trim().toLowerCase();
  if (!text) return UNRESOLVED;

  const days = DAYS_BEFORE_RE.exec(text);
  if (days) {
    const n = parseCount(days[1]);
    if (n !== null) return absolute(subtractTime(anchor.at, { days: n }));
  }

  const hours = HOURS_BEFORE_RE.exec(text);
  if (hours) {
    const n = parseCount(hours[1]);
    if (n !== null) return absolute(subtractTime(anchor.at, { hours: n }));
  }

  if (text.includes('day of procedure') || text === 'day of' || text === 'day of surgery') {
    return absolute(atTimeOfDay(anchor.at, 0));
  }

  // Night before: 21:00 the previous day by convention
  if (text.includes('night before')) {
    return absolute(atTimeOfDay(subtractTime(anchor.at, { days: 1 }), 21));
  }

  if (text.includes('morning of')) {
    return absolute(atTimeOfDay(anchor.at, 8));
  }

  if (text.includes('after midnight') || text === 'midnight') {
    return absolute(atTimeOfDay(anchor.at, 0));
  }

  if (isNoChangePhrase(text)) return { kind: 'no-change' };

  return UNRESOLVED;
}

export function resolveTimePhrase(anchor: SurgeryAnchor | null, phrase: unknown): Date | null {
  const resolution = classifyTimePhrase(anchor, phrase);
  return resolution.kind === 'absolute' ? resolution.at : null;
}

/** Convenience wrapper: surgery details + phrase -> ISO string or null. */
export function computeStopTime(details: SurgeryDateFields | null | undefined, phrase: unknown): string | null {
  const resolved = resolveTimePhrase(parseSurgeryAnchor(details), phrase);
  return resolved ? formatLocalIso(resolved) : null;
}
