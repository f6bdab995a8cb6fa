/** Calendar day as the prompts and fallback content describe it. */
export type DayContext = {
  /** YYYY-MM-DD in the configured zone. */
  dateKey: string;
  /** English weekday name, e.g. "Monday". */
  weekday: string;
};

function zonedParts(d: Date, timeZone: string): { yyyy: number; mm: number; dd: number; weekday: string } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    weekday: 'long',
  }).formatToParts(d);
  const get = (t: string) => parts.find((p) => p.type === t)?.value ?? '';
  return { yyyy: Number(get('year')), mm: Number(get('month')), dd: Number(get('day')), weekday: get('weekday') };
}

function toKey(p: { yyyy: number; mm: number; dd: number }): string {
  const yyyy = String(p.yyyy).padStart(4, '0');
  const mm = String(p.mm).padStart(2, '0');
  const dd = String(p.dd).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function dayContext(d: Date, timeZone: string): DayContext {
  const p = zonedParts(d, timeZone);
  return { dateKey: toKey(p), weekday: p.weekday };
}
