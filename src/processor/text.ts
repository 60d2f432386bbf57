const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

/** Collapse whitespace and drop footnote markers like `[3]`. */
export function cleanText(text: string): string {
  return text.replace(/\[\d+\]/g, '').replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max).trimEnd();
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function isoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCMonth() !== month - 1) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Normalize a date string to `YYYY-MM-DD`. Accepts ISO-8601 timestamps,
 * `dd.mm.yyyy`, `mm/dd/yyyy`, `Month d, yyyy`, `d Month yyyy`, RFC-822 dates and
 * `N hours|days ago` relative to `now`. Returns null when unparseable.
 */
export function parseDate(text: string | undefined, now: number): string | null {
  if (!text) return null;
  const value = text.trim();

  let m = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(value);
  if (m) return isoDate(Number(m[3]), Number(m[2]), Number(m[1]));

  // Slashes are month-first.
  m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (m) return isoDate(Number(m[3]), Number(m[1]), Number(m[2]));

  m = /^([A-Za-z]{3})[a-z]*\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(value);
  if (m) {
    const month = MONTHS[(m[1] ?? '').toLowerCase()];
    if (month) return isoDate(Number(m[3]), month, Number(m[2]));
  }

  m = /^(\d{1,2})\s+([A-Za-z]{3})[a-z]*\.?,?\s+(\d{4})$/.exec(value);
  if (m) {
    const month = MONTHS[(m[2] ?? '').toLowerCase()];
    if (month) return isoDate(Number(m[3]), month, Number(m[1]));
  }

  m = /^(\d+)\s+(minute|hour|day|week)s?\s+ago$/i.exec(value);
  if (m) {
    const unitMs: Record<string, number> = { minute: 60_000, hour: 3_600_000, day: 86_400_000, week: 604_800_000 };
    const at = now - Number(m[1]) * (unitMs[(m[2] ?? '').toLowerCase()] ?? 0);
    return new Date(at).toISOString().slice(0, 10);
  }

  // RFC-822 and other formats Date understands
  if (/[A-Za-z]{3},?\s+\d{1,2}\s+[A-Za-z]{3}\s+\d{4}/.test(value)) {
    const at = Date.parse(value);
    if (!Number.isNaN(at)) return new Date(at).toISOString().slice(0, 10);
  }
  return null;
}

/** Plausible year: 1900 through next year. */
export function isPlausibleYear(year: number, now: number): boolean {
  const current = new Date(now).getUTCFullYear();
  return Number.isInteger(year) && year >= 1900 && year <= current + 1;
}

/** Debut year mentioned in running text, e.g. "made his debut in 1998". */
export function extractDebutYear(text: string, now: number): number | null {
  const m = /debut(?:ed)?\s+in\s+(\d{4})/i.exec(text);
  if (!m) return null;
  const year = Number(m[1]);
  return isPlausibleYear(year, now) ? year : null;
}

/** Match keywords as whole words, case-insensitively. */
export function matchesKeywords(text: string, keywords: string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => {
    const escaped = keyword.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(haystack);
  });
}
