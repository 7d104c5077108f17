// All arithmetic is UTC so the weekday rules and exported timestamps do not
// depend on the host time zone.

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * MS_PER_SECOND);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_PER_HOUR);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/** Whole days between two instants, truncated toward zero. */
export function diffDays(later: Date, earlier: Date): number {
  return Math.trunc((later.getTime() - earlier.getTime()) / MS_PER_DAY);
}

export function diffHours(later: Date, earlier: Date): number {
  return (later.getTime() - earlier.getTime()) / MS_PER_HOUR;
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function isSunday(date: Date): boolean {
  return date.getUTCDay() === 0;
}

export function isWeekday(date: Date): boolean {
  const day = date.getUTCDay();
  return day >= 1 && day <= 5;
}

export function isValidDate(date: Date | null | undefined): date is Date {
  return date instanceof Date && !Number.isNaN(date.getTime());
}

export function maxDate(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

export function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}

/** YYYY-MM-DD */
export function formatDate(date: Date): string {
  return date.toISOString().substring(0, 10);
}

/** YYYY-MM-DD HH:MM:SS */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace("T", " ").substring(0, 19);
}

export function parseDateOnly(value: string): Date {
  return new Date(`${value}T00:00:00Z`);
}
