const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const MS_PER_MINUTE = 60 * 1000;

/** UTC calendar day of `date` as YYYY-MM-DD. */
export function toIsoDate(date: Date): string {
     return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
     const base = Date.parse(`${isoDate}T00:00:00Z`);
     return toIsoDate(new Date(base + days * MS_PER_DAY));
}

/** Whole days from the UTC day of `now` to `isoDate`; negative once the date has passed. */
export function daysUntil(isoDate: string, now: Date): number {
     const target = Date.parse(`${isoDate}T00:00:00Z`);
     const today = Date.parse(`${toIsoDate(now)}T00:00:00Z`);
     return Math.round((target - today) / MS_PER_DAY);
}

export function subtractDays(now: Date, days: number): Date {
     return new Date(now.getTime() - days * MS_PER_DAY);
}

export function isIsoDate(value: string): boolean {
     return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}
