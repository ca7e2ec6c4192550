type Parts = { year: string; month: string; day: string; hour: string; minute: string; second: string };

function partsIn(d: Date, timeZone?: string): Parts {
  const fmt = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  });
  const out: Parts = { year: '', month: '', day: '', hour: '', minute: '', second: '' };
  for (const p of fmt.formatToParts(d)) {
    if (p.type === 'year' || p.type === 'month' || p.type === 'day' || p.type === 'hour' || p.type === 'minute' || p.type === 'second') {
      out[p.type] = p.value;
    }
  }
  return out;
}

/** Calendar date of `d` in `timeZone` (process-local zone when omitted). */
export function ymd(d: Date, timeZone?: string): string {
  const p = partsIn(d, timeZone);
  return `${p.year}-${p.month}-${p.day}`;
}

export function addDaysYmd(value: string, days: number): string {
  // Interpret YYYY-MM-DD as a date in UTC (safe for just day arithmetic).
  const [y, m, d] = value.split('-').map(Number);
  const dt = new Date(Date.UTC(y, m - 1, d, 12, 0, 0));
  dt.setUTCDate(dt.getUTCDate() + days);
  const yyyy = dt.getUTCFullYear();
  const mm = String(dt.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(dt.getUTCDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

/** `YYYY_MM_DD`, used in archived report filenames. */
export function archiveStamp(d: Date, timeZone?: string): string {
  return ymd(d, timeZone).replace(/-/g, '_');
}

/** `YYYY-MM-DD HH:MM:SS`, used in the report title. */
export function formatTimestamp(d: Date, timeZone?: string): string {
  const p = partsIn(d, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}
