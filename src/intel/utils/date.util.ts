const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDateToIso(value: string): string {
  if (!value) {
    return '';
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString();
}

export function windowCutoff(now: Date, windowDays: number): Date {
  return new Date(now.getTime() - windowDays * DAY_MS);
}

export function isWithinWindow(iso: string, cutoff: Date): boolean {
  const time = new Date(iso).getTime();
  return Number.isFinite(time) && time >= cutoff.getTime();
}
