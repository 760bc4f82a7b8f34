import type { ReportingPeriod } from '../config.js';

const DAY_FIRST = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const ISO = /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})?)?$/;

export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string' || !value.trim().length) return null;

  const trimmed = value.trim();
  const dayFirst = DAY_FIRST.exec(trimmed);
  if (dayFirst) {
    const [, day, month, year, hours = '0', minutes = '0', seconds = '0'] = dayFirst;
    const date = new Date(
      Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes), Number(seconds))
    );
    // Date.UTC rolls 31/02 over into March; reject instead.
    if (date.getUTCDate() !== Number(day) || date.getUTCMonth() !== Number(month) - 1) return null;
    return date;
  }

  // Anything else would go through `Date`'s host-timezone guessing.
  const iso = ISO.exec(trimmed);
  if (!iso) return null;
  const [, day, time = '00:00', offset] = iso;
  // No offset means UTC, the zone periods are cut in.
  const parsed = new Date(`${day}T${time}${offset ?? 'Z'}`);
  if (Number.isNaN(parsed.getTime())) return null;
  if (!offset && parsed.toISOString().slice(0, 10) !== day) return null;
  return parsed;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function periodKey(date: Date, granularity: ReportingPeriod): string {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  switch (granularity) {
    case 'day':
      return `${year}-${pad(month)}-${pad(date.getUTCDate())}`;
    case 'month':
      return `${year}-${pad(month)}`;
    case 'quarter':
      return `${year}-Q${Math.ceil(month / 3)}`;
    case 'year':
      return String(year);
    case 'all':
      return 'ALL';
  }
}
